import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockQuery } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
}));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery, connect: vi.fn() },
}));

import {
  createSession,
  hashPassword,
  revokeSession,
  toUser,
  validateSession,
  verifyPassword,
} from "../credentials.js";
import type { UserRow } from "../../db/types.js";

const userRow: UserRow = {
  id: 7,
  username: "alice",
  email: "a@x.com",
  password_hash: "not-checked-here",
  first_name: "Alice",
  last_name: null,
  age: 30,
  gender: null,
  height_cm: 168,
  weight_kg: 61,
  activity_level: "Moderately Active",
  fitness_goals: null,
  injuries: null,
  experience_level: "Beginner",
  created_at: new Date("2026-01-01T00:00:00Z"),
};

describe("password hashing", () => {
  it("verifies the password it hashed and nothing else", async () => {
    const record = await hashPassword("secret1");
    expect(record).toMatch(/^[0-9a-f]{32}:[0-9a-f]{128}$/);
    expect(await verifyPassword("secret1", record)).toBe(true);
    expect(await verifyPassword("secret2", record)).toBe(false);
  });

  it("salts every hash", async () => {
    const a = await hashPassword("secret1");
    const b = await hashPassword("secret1");
    expect(a).not.toBe(b);
  });

  it("rejects a tampered digest", async () => {
    const record = await hashPassword("secret1");
    const last = record.slice(-1);
    const tampered = record.slice(0, -1) + (last === "0" ? "1" : "0");
    expect(await verifyPassword("secret1", tampered)).toBe(false);
  });

  it.each([
    "",
    "no-separator",
    "abc:def",
    "a:b:c",
    `${"g".repeat(32)}:${"0".repeat(128)}`,
    `${"0".repeat(32)}:${"0".repeat(127)}`,
  ])("rejects malformed record %j", async (record) => {
    expect(await verifyPassword("secret1", record)).toBe(false);
  });
});

describe("toUser", () => {
  it("drops the password hash", () => {
    const user = toUser(userRow);
    expect(user).not.toHaveProperty("password_hash");
    expect(user.username).toBe("alice");
  });
});

describe("sessions", () => {
  beforeEach(() => {
    mockQuery.mockReset();
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T10:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stores a random token with an absolute expiry", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    const grant = await createSession(7, 60_000);

    expect(grant.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(grant.expiresAt.toISOString()).toBe("2026-03-01T10:01:00.000Z");
    expect(mockQuery).toHaveBeenCalledWith(
      expect.stringContaining("INSERT INTO user_sessions"),
      [7, grant.token, grant.expiresAt]
    );
  });

  it("resolves a live token to its user and an expired one to null", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const grant = await createSession(7, 60 * 60 * 1000);

    const sessionRow = { ...userRow, session_expires_at: grant.expiresAt };
    mockQuery.mockResolvedValueOnce({ rows: [sessionRow] });
    expect(await validateSession(grant.token)).toEqual(toUser(userRow));
    expect(mockQuery).toHaveBeenLastCalledWith(expect.stringContaining("WHERE s.session_token = $1"), [grant.token]);

    vi.setSystemTime(new Date("2026-03-01T11:00:00Z"));
    mockQuery.mockResolvedValueOnce({ rows: [sessionRow] });
    expect(await validateSession(grant.token)).toBeNull();
  });

  it("returns null for an unknown token", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });
    expect(await validateSession("unknown-token")).toBeNull();
  });

  it("returns null for an empty token without querying", async () => {
    expect(await validateSession("")).toBeNull();
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it("revokes by deleting the session row", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    await revokeSession("tok-1");
    expect(mockQuery).toHaveBeenCalledWith("DELETE FROM user_sessions WHERE session_token = $1", ["tok-1"]);
  });
});
