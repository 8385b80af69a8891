import { Router } from "express";
import { z } from "zod";
import { SessionManager } from "../context/session-manager.js";
import { AuthError, ConflictError, InvalidCredentialsError } from "../helpers/errors.js";
import { normalizeProfileData, profileSchema } from "../helpers/profile-helpers.js";
import { defaultCredentialGateway, type CredentialGateway } from "./credential-gateway.js";
import { authenticateRequest, bearerToken } from "./middleware.js";

export interface AuthResponse {
  status: number;
  body: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const registerSchema = z
  .object({
    username: z.string().trim().min(3).max(50),
    email: z.string().trim().email().max(255),
    password: z.string().min(6, "Password must be at least 6 characters long"),
    confirm_password: z.string().optional(),
    profile: z
      .preprocess((v) => (isRecord(v) ? normalizeProfileData(v) : v), profileSchema)
      .optional(),
  })
  .refine((b) => b.confirm_password === undefined || b.confirm_password === b.password, {
    message: "Passwords do not match",
    path: ["confirm_password"],
  });

const loginSchema = z.object({
  identifier: z.string().trim().min(1),
  password: z.string().min(1),
});

function invalidRequest(error: z.ZodError): AuthResponse {
  return {
    status: 400,
    body: {
      error: "invalid_request",
      details: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
    },
  };
}

function errorResponse(route: string, err: unknown): AuthResponse {
  if (err instanceof ConflictError) {
    return { status: 409, body: { error: "conflict", message: err.message } };
  }
  if (err instanceof InvalidCredentialsError || err instanceof AuthError) {
    return { status: 401, body: { error: "unauthorized", message: err.message } };
  }
  console.error(`[auth] ${route} failed:`, err instanceof Error ? err.stack : err);
  return { status: 500, body: { error: "internal_error", message: "An unexpected error occurred" } };
}

/** Route logic without Express, so it can be exercised with a fake gateway. */
export function createAuthHandlers(gateway: CredentialGateway = defaultCredentialGateway) {
  return {
    async register(body: unknown): Promise<AuthResponse> {
      const parsed = registerSchema.safeParse(body);
      if (!parsed.success) return invalidRequest(parsed.error);
      const { username, email, password, profile } = parsed.data;
      try {
        const userId = await gateway.register(username, email, password, profile ?? {});
        return { status: 201, body: { user_id: userId } };
      } catch (err) {
        return errorResponse("register", err);
      }
    },

    async login(body: unknown): Promise<AuthResponse> {
      const parsed = loginSchema.safeParse(body);
      if (!parsed.success) return invalidRequest(parsed.error);
      try {
        const session = new SessionManager(gateway);
        const result = await session.login(parsed.data.identifier, parsed.data.password);
        return {
          status: 200,
          body: { token: result.token, expires_at: result.expiresAt.toISOString(), user: result.user },
        };
      } catch (err) {
        return errorResponse("login", err);
      }
    },

    async logout(authorization: string | undefined): Promise<AuthResponse> {
      try {
        await gateway.revokeSession(bearerToken(authorization));
        return { status: 200, body: { ok: true } };
      } catch (err) {
        return errorResponse("logout", err);
      }
    },

    async me(authorization: string | undefined): Promise<AuthResponse> {
      try {
        const { user } = await authenticateRequest(authorization, gateway);
        return { status: 200, body: { user } };
      } catch (err) {
        return errorResponse("me", err);
      }
    },
  };
}

// --- Rate limiting (in-memory, per IP and route) ---
const RATE_WINDOW_MS = 60 * 1000;
const rateLimitMap = new Map<string, { count: number; windowStart: number }>();

export function checkRateLimit(key: string, limit: number, now: number = Date.now()): boolean {
  const entry = rateLimitMap.get(key);
  if (!entry || now - entry.windowStart > RATE_WINDOW_MS) {
    rateLimitMap.set(key, { count: 1, windowStart: now });
    return true;
  }
  entry.count++;
  return entry.count <= limit;
}

setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of rateLimitMap) {
    if (now - entry.windowStart > RATE_WINDOW_MS) {
      rateLimitMap.delete(key);
    }
  }
}, 5 * 60 * 1000).unref();

export function createAuthRouter(gateway: CredentialGateway = defaultCredentialGateway): Router {
  const router = Router();
  const handlers = createAuthHandlers(gateway);

  router.post("/auth/register", async (req, res) => {
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    if (!checkRateLimit(`register:${ip}`, 5)) {
      res.status(429).json({ error: "too_many_requests", message: "Rate limit exceeded. Try again later." });
      return;
    }
    const result = await handlers.register(req.body);
    res.status(result.status).json(result.body);
  });

  router.post("/auth/login", async (req, res) => {
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    if (!checkRateLimit(`login:${ip}`, 10)) {
      res.status(429).json({ error: "too_many_requests", message: "Rate limit exceeded. Try again later." });
      return;
    }
    const result = await handlers.login(req.body);
    res.status(result.status).json(result.body);
  });

  router.post("/auth/logout", async (req, res) => {
    const result = await handlers.logout(req.headers.authorization);
    res.status(result.status).json(result.body);
  });

  router.get("/auth/me", async (req, res) => {
    const result = await handlers.me(req.headers.authorization);
    res.status(result.status).json(result.body);
  });

  return router;
}
