import crypto from "node:crypto";
import pool from "../db/connection.js";
import type { SessionGrant, User, UserRow } from "../db/types.js";

const SALT_BYTES = 16;
const KEY_LENGTH = 64;
const TOKEN_BYTES = 32;

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

const HEX = /^[0-9a-f]+$/i;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

/**
 * Hashes a password with a fresh random salt.
 * Returns `<salt hex>:<scrypt digest hex>`; everything needed to verify is in the record.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES);
  const digest = await deriveKey(password, salt);
  return `${salt.toString("hex")}:${digest.toString("hex")}`;
}

/** Returns false for a wrong password and for any record it cannot parse. */
export async function verifyPassword(password: string, record: string): Promise<boolean> {
  if (typeof record !== "string") return false;
  const parts = record.split(":");
  if (parts.length !== 2) return false;
  const [saltHex, digestHex] = parts;
  if (saltHex.length !== SALT_BYTES * 2 || digestHex.length !== KEY_LENGTH * 2) return false;
  if (!HEX.test(saltHex) || !HEX.test(digestHex)) return false;

  try {
    const expected = Buffer.from(digestHex, "hex");
    const actual = await deriveKey(password, Buffer.from(saltHex, "hex"));
    return crypto.timingSafeEqual(actual, expected);
  } catch (err) {
    console.warn("[credentials] Password verification failed:", err instanceof Error ? err.message : err);
    return false;
  }
}

export function toUser(row: UserRow): User {
  const { password_hash: _hash, ...user } = row;
  return user;
}

/**
 * Creates a session for a user and returns its opaque token.
 * The token is 256 random bits, base64url-encoded; expiry is absolute.
 */
export async function createSession(
  userId: number,
  ttlMs: number = DEFAULT_SESSION_TTL_MS
): Promise<SessionGrant> {
  const token = crypto.randomBytes(TOKEN_BYTES).toString("base64url");
  const expiresAt = new Date(Date.now() + ttlMs);

  await pool.query(
    `INSERT INTO user_sessions (user_id, session_token, expires_at)
     VALUES ($1, $2, $3)`,
    [userId, token, expiresAt]
  );

  console.log(`[credentials] Session created for user ${userId}`);
  return { token, expiresAt };
}

/**
 * Resolves a session token to its user. Unknown and expired tokens both give
 * null. Expired rows are left in place; expiry is only checked here.
 */
export async function validateSession(token: string): Promise<User | null> {
  if (typeof token !== "string" || token.length === 0) return null;

  const { rows } = await pool.query<UserRow & { session_expires_at: Date }>(
    `SELECT u.*, s.expires_at AS session_expires_at
     FROM user_sessions s
     JOIN users u ON u.id = s.user_id
     WHERE s.session_token = $1
     LIMIT 1`,
    [token]
  );
  if (rows.length === 0) return null;

  const { session_expires_at, ...row } = rows[0];
  if (new Date(session_expires_at).getTime() <= Date.now()) return null;

  return toUser(row);
}

export async function revokeSession(token: string): Promise<void> {
  await pool.query("DELETE FROM user_sessions WHERE session_token = $1", [token]);
}
