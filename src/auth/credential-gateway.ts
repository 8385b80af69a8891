import config from "../config.js";
import type { SessionGrant, User } from "../db/types.js";
import type { ProfileUpdate } from "../helpers/profile-helpers.js";
import { authenticate, createUser } from "../persistence/users.js";
import { createSession, revokeSession, validateSession } from "./credentials.js";

/** Credential Store operations the session layer and auth routes depend on. */
export interface CredentialGateway {
  register(username: string, email: string, password: string, profile?: ProfileUpdate): Promise<number>;
  authenticate(identifier: string, password: string): Promise<User>;
  createSession(userId: number): Promise<SessionGrant>;
  validateSession(token: string): Promise<User | null>;
  revokeSession(token: string): Promise<void>;
}

export const defaultCredentialGateway: CredentialGateway = {
  register: createUser,
  authenticate,
  createSession: (userId) => createSession(userId, config.sessionTtlMs),
  validateSession,
  revokeSession,
};
