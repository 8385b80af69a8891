import type { User } from "../db/types.js";

/**
 * Identity of one authenticated request. Built by the auth middleware and
 * handed to every tool registration; nothing reads identity from module state.
 */
export interface RequestContext {
  user: User;
  token: string;
}
