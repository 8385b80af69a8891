import { describe, it, expect, vi, beforeEach } from "vitest";
import { SessionManager } from "../session-manager.js";
import type { CredentialGateway } from "../../auth/credential-gateway.js";
import type { User } from "../../db/types.js";
import { AuthError, InvalidCredentialsError } from "../../helpers/errors.js";

const alice: User = {
  id: 1,
  username: "alice",
  email: "a@x.com",
  first_name: null,
  last_name: null,
  age: 30,
  gender: null,
  height_cm: 168,
  weight_kg: 61,
  activity_level: null,
  fitness_goals: null,
  injuries: null,
  experience_level: null,
  created_at: new Date("2026-01-01T00:00:00Z"),
};

const expiresAt = new Date("2026-03-02T10:00:00Z");

function fakeGateway() {
  return {
    register: vi.fn<CredentialGateway["register"]>(),
    authenticate: vi.fn<CredentialGateway["authenticate"]>().mockResolvedValue(alice),
    createSession: vi.fn<CredentialGateway["createSession"]>().mockResolvedValue({ token: "tok-1", expiresAt }),
    validateSession: vi.fn<CredentialGateway["validateSession"]>().mockResolvedValue(alice),
    revokeSession: vi.fn<CredentialGateway["revokeSession"]>().mockResolvedValue(undefined),
  } satisfies CredentialGateway;
}

describe("SessionManager", () => {
  let gateway: ReturnType<typeof fakeGateway>;
  let session: SessionManager;

  beforeEach(() => {
    gateway = fakeGateway();
    session = new SessionManager(gateway);
  });

  it("starts unauthenticated", () => {
    expect(session.isAuthenticated()).toBe(false);
    expect(session.currentUser()).toBeNull();
    expect(() => session.requireUser()).toThrow(AuthError);
  });

  it("holds the user after login without touching the store again", async () => {
    const result = await session.login("alice", "secret1");

    expect(result).toEqual({ token: "tok-1", expiresAt, user: alice });
    expect(gateway.createSession).toHaveBeenCalledWith(1);
    expect(session.isAuthenticated()).toBe(true);
    expect(session.currentUser()).toBe(alice);
    expect(session.requireContext()).toEqual({ user: alice, token: "tok-1" });
    expect(gateway.validateSession).not.toHaveBeenCalled();
  });

  it("stays unauthenticated after a failed login", async () => {
    gateway.authenticate.mockRejectedValueOnce(new InvalidCredentialsError());

    await expect(session.login("alice", "wrong")).rejects.toBeInstanceOf(InvalidCredentialsError);
    expect(session.isAuthenticated()).toBe(false);
    expect(gateway.createSession).not.toHaveBeenCalled();
  });

  it("revokes the token on logout", async () => {
    await session.login("alice", "secret1");
    await session.logout();

    expect(gateway.revokeSession).toHaveBeenCalledWith("tok-1");
    expect(session.current).toEqual({ status: "unauthenticated" });
  });

  it("clears local state even when revocation fails", async () => {
    await session.login("alice", "secret1");
    gateway.revokeSession.mockRejectedValueOnce(new Error("connection lost"));

    await expect(session.logout()).rejects.toThrow("connection lost");
    expect(session.isAuthenticated()).toBe(false);
  });

  it("logout when unauthenticated is a no-op", async () => {
    await session.logout();
    expect(gateway.revokeSession).not.toHaveBeenCalled();
  });

  it("drops to unauthenticated when revalidation finds the token dead", async () => {
    await session.login("alice", "secret1");
    gateway.validateSession.mockResolvedValueOnce(null);

    expect(await session.revalidate()).toBe(false);
    expect(session.currentUser()).toBeNull();
  });

  it("refreshes the user on successful revalidation", async () => {
    await session.login("alice", "secret1");
    gateway.validateSession.mockResolvedValueOnce({ ...alice, weight_kg: 60 });

    expect(await session.revalidate()).toBe(true);
    expect(session.currentUser()?.weight_kg).toBe(60);
  });

  it("resumes from an existing live token", async () => {
    expect(await session.resume("tok-9")).toBe(true);
    expect(session.requireContext()).toEqual({ user: alice, token: "tok-9" });

    gateway.validateSession.mockResolvedValueOnce(null);
    expect(await session.resume("tok-dead")).toBe(false);
    expect(session.isAuthenticated()).toBe(false);
  });
});
