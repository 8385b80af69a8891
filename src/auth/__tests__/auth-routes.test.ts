import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../db/connection.js", () => ({
  default: { query: vi.fn(), connect: vi.fn() },
}));

import { checkRateLimit, createAuthHandlers } from "../auth-routes.js";
import { authenticateRequest, bearerToken } from "../middleware.js";
import type { CredentialGateway } from "../credential-gateway.js";
import type { User } from "../../db/types.js";
import { AuthError, ConflictError, InvalidCredentialsError } from "../../helpers/errors.js";

const alice: User = {
  id: 1,
  username: "alice",
  email: "a@x.com",
  first_name: null,
  last_name: null,
  age: null,
  gender: null,
  height_cm: null,
  weight_kg: null,
  activity_level: null,
  fitness_goals: null,
  injuries: null,
  experience_level: null,
  created_at: new Date("2026-01-01T00:00:00Z"),
};

function fakeGateway() {
  return {
    register: vi.fn<CredentialGateway["register"]>().mockResolvedValue(5),
    authenticate: vi.fn<CredentialGateway["authenticate"]>().mockResolvedValue(alice),
    createSession: vi.fn<CredentialGateway["createSession"]>().mockResolvedValue({
      token: "tok-1",
      expiresAt: new Date("2026-03-02T10:00:00Z"),
    }),
    validateSession: vi.fn<CredentialGateway["validateSession"]>().mockResolvedValue(alice),
    revokeSession: vi.fn<CredentialGateway["revokeSession"]>().mockResolvedValue(undefined),
  } satisfies CredentialGateway;
}

describe("auth handlers", () => {
  let gateway: ReturnType<typeof fakeGateway>;
  let handlers: ReturnType<typeof createAuthHandlers>;

  beforeEach(() => {
    gateway = fakeGateway();
    handlers = createAuthHandlers(gateway);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("register", () => {
    it("creates the account and returns 201", async () => {
      const res = await handlers.register({ username: "alice", email: " a@x.com ", password: "secret1" });

      expect(res).toEqual({ status: 201, body: { user_id: 5 } });
      expect(gateway.register).toHaveBeenCalledWith("alice", "a@x.com", "secret1", {});
    });

    it("normalizes profile fields before storing them", async () => {
      await handlers.register({
        username: "alice",
        email: "a@x.com",
        password: "secret1",
        profile: { first_name: " Alice ", injuries: "none", age: 30 },
      });

      expect(gateway.register).toHaveBeenCalledWith("alice", "a@x.com", "secret1", {
        first_name: "Alice",
        injuries: null,
        age: 30,
      });
    });

    it("rejects a short password with 400", async () => {
      const res = await handlers.register({ username: "alice", email: "a@x.com", password: "12345" });

      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["password: Password must be at least 6 characters long"]);
      expect(gateway.register).not.toHaveBeenCalled();
    });

    it("rejects mismatched confirmation", async () => {
      const res = await handlers.register({
        username: "alice",
        email: "a@x.com",
        password: "secret1",
        confirm_password: "secret2",
      });

      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["confirm_password: Passwords do not match"]);
    });

    it("maps a taken username to 409", async () => {
      gateway.register.mockRejectedValueOnce(new ConflictError("Username or email already exists"));

      const res = await handlers.register({ username: "alice", email: "a@x.com", password: "secret1" });

      expect(res).toEqual({ status: 409, body: { error: "conflict", message: "Username or email already exists" } });
    });

    it("hides unexpected failures behind a generic 500", async () => {
      gateway.register.mockRejectedValueOnce(new Error("relation \"users\" does not exist"));

      const res = await handlers.register({ username: "alice", email: "a@x.com", password: "secret1" });

      expect(res).toEqual({ status: 500, body: { error: "internal_error", message: "An unexpected error occurred" } });
    });
  });

  describe("login", () => {
    it("returns a token, its expiry and the user", async () => {
      const res = await handlers.login({ identifier: "alice", password: "secret1" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ token: "tok-1", expires_at: "2026-03-02T10:00:00.000Z", user: alice });
      expect(gateway.authenticate).toHaveBeenCalledWith("alice", "secret1");
    });

    it("maps bad credentials to 401", async () => {
      gateway.authenticate.mockRejectedValueOnce(new InvalidCredentialsError());

      const res = await handlers.login({ identifier: "alice", password: "wrong" });

      expect(res).toEqual({ status: 401, body: { error: "unauthorized", message: "Invalid username or password" } });
      expect(gateway.createSession).not.toHaveBeenCalled();
    });

    it("rejects a missing password with 400", async () => {
      const res = await handlers.login({ identifier: "alice" });
      expect(res.status).toBe(400);
    });
  });

  describe("logout and me", () => {
    it("revokes the Bearer token", async () => {
      const res = await handlers.logout("Bearer tok-1");

      expect(res).toEqual({ status: 200, body: { ok: true } });
      expect(gateway.revokeSession).toHaveBeenCalledWith("tok-1");
    });

    it("refuses logout without a token", async () => {
      const res = await handlers.logout(undefined);
      expect(res.status).toBe(401);
      expect(gateway.revokeSession).not.toHaveBeenCalled();
    });

    it("returns the session's user", async () => {
      const res = await handlers.me("Bearer tok-1");
      expect(res).toEqual({ status: 200, body: { user: alice } });
    });

    it("returns 401 for an expired session", async () => {
      gateway.validateSession.mockResolvedValueOnce(null);
      const res = await handlers.me("Bearer tok-1");
      expect(res).toEqual({ status: 401, body: { error: "unauthorized", message: "Invalid or expired session token" } });
    });
  });
});

describe("bearerToken", () => {
  it("extracts the token", () => {
    expect(bearerToken("Bearer abc")).toBe("abc");
  });

  it.each([undefined, "", "Basic abc", "Bearer ", "bearer abc"])("rejects %j", (header) => {
    expect(() => bearerToken(header)).toThrow(AuthError);
  });
});

describe("authenticateRequest", () => {
  it("builds a context for a live session", async () => {
    const gateway = fakeGateway();
    expect(await authenticateRequest("Bearer tok-1", gateway)).toEqual({ user: alice, token: "tok-1" });
  });
});

describe("checkRateLimit", () => {
  it("allows up to the limit per window", () => {
    const now = 1_000_000;
    expect(checkRateLimit("test:1", 2, now)).toBe(true);
    expect(checkRateLimit("test:1", 2, now + 1)).toBe(true);
    expect(checkRateLimit("test:1", 2, now + 2)).toBe(false);
    expect(checkRateLimit("test:1", 2, now + 61_000)).toBe(true);
  });
});
