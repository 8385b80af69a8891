import { AuthError } from "../helpers/errors.js";
import { SessionManager } from "../context/session-manager.js";
import type { RequestContext } from "../context/request-context.js";
import { defaultCredentialGateway, type CredentialGateway } from "./credential-gateway.js";

export function bearerToken(authorization: string | undefined): string {
  if (!authorization?.startsWith("Bearer ")) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  const token = authorization.slice(7).trim();
  if (!token) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  return token;
}

/**
 * Resolves the Bearer session token of a request into an explicit context.
 * Every request re-validates against user_sessions, so a revoked or expired
 * token stops working on the next call.
 */
export async function authenticateRequest(
  authorization: string | undefined,
  gateway: CredentialGateway = defaultCredentialGateway
): Promise<RequestContext> {
  const token = bearerToken(authorization);
  const session = new SessionManager(gateway);
  if (!(await session.resume(token))) {
    throw new AuthError("Invalid or expired session token");
  }
  return session.requireContext();
}
