import type { SessionGrant, User } from "../db/types.js";
import { AuthError } from "../helpers/errors.js";
import type { CredentialGateway } from "../auth/credential-gateway.js";
import type { RequestContext } from "./request-context.js";

export type SessionState =
  | { status: "unauthenticated" }
  | { status: "authenticated"; user: User; token: string; expiresAt: Date | null };

export interface LoginResult extends SessionGrant {
  user: User;
}

const UNAUTHENTICATED: SessionState = { status: "unauthenticated" };

/**
 * Lifecycle of one client's session: unauthenticated -> authenticated ->
 * unauthenticated. Reads answer from memory; the credential store is only
 * consulted on login, resume, revalidate and logout.
 */
export class SessionManager {
  private state: SessionState = UNAUTHENTICATED;

  constructor(private readonly gateway: CredentialGateway) {}

  get current(): SessionState {
    return this.state;
  }

  isAuthenticated(): boolean {
    return this.state.status === "authenticated";
  }

  currentUser(): User | null {
    return this.state.status === "authenticated" ? this.state.user : null;
  }

  /** Throws InvalidCredentialsError on a bad identifier or password; state is left unchanged. */
  async login(identifier: string, password: string): Promise<LoginResult> {
    const user = await this.gateway.authenticate(identifier, password);
    const grant = await this.gateway.createSession(user.id);
    this.state = { status: "authenticated", user, token: grant.token, expiresAt: grant.expiresAt };
    return { ...grant, user };
  }

  /** Adopts an existing token if it is still live. */
  async resume(token: string): Promise<boolean> {
    const user = await this.gateway.validateSession(token);
    this.state = user
      ? { status: "authenticated", user, token, expiresAt: null }
      : UNAUTHENTICATED;
    return user !== null;
  }

  /**
   * Re-checks the held token against the store. Drops to unauthenticated when
   * it has expired or been revoked, otherwise refreshes the cached user.
   */
  async revalidate(): Promise<boolean> {
    if (this.state.status !== "authenticated") return false;
    const user = await this.gateway.validateSession(this.state.token);
    if (!user) {
      this.state = UNAUTHENTICATED;
      return false;
    }
    this.state = { ...this.state, user };
    return true;
  }

  async logout(): Promise<void> {
    if (this.state.status !== "authenticated") return;
    const { token } = this.state;
    try {
      await this.gateway.revokeSession(token);
    } finally {
      this.state = UNAUTHENTICATED;
    }
  }

  requireUser(): User {
    if (this.state.status !== "authenticated") {
      throw new AuthError("Not authenticated");
    }
    return this.state.user;
  }

  requireContext(): RequestContext {
    if (this.state.status !== "authenticated") {
      throw new AuthError("Not authenticated");
    }
    return { user: this.state.user, token: this.state.token };
  }
}
