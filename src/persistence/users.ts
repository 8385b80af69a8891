import pool from "../db/connection.js";
import type { User, UserRow } from "../db/types.js";
import { hashPassword, verifyPassword, toUser } from "../auth/credentials.js";
import { ConflictError, InvalidCredentialsError, NotFoundError, isUniqueViolation } from "../helpers/errors.js";
import { PROFILE_FIELDS, type ProfileUpdate } from "../helpers/profile-helpers.js";

/**
 * Creates an account and returns its id. Only the password hash is stored.
 * Uniqueness of username and email is left to the table constraints, so two
 * concurrent registrations cannot both succeed.
 */
export async function createUser(
  username: string,
  email: string,
  password: string,
  profile: ProfileUpdate = {}
): Promise<number> {
  const passwordHash = await hashPassword(password);

  const columns = ["username", "email", "password_hash"];
  const params: unknown[] = [username.trim(), email.trim().toLowerCase(), passwordHash];
  for (const field of PROFILE_FIELDS) {
    columns.push(field);
    params.push(profile[field] ?? null);
  }
  const placeholders = params.map((_, i) => `$${i + 1}`);

  try {
    const { rows } = await pool.query<{ id: number }>(
      `INSERT INTO users (${columns.join(", ")})
       VALUES (${placeholders.join(", ")})
       RETURNING id`,
      params
    );
    const userId = rows[0].id;
    console.log(`[persistence] User created: ${username} (ID: ${userId})`);
    return userId;
  } catch (err) {
    if (isUniqueViolation(err)) {
      console.warn(`[persistence] Registration conflict for ${username}`);
      throw new ConflictError("Username or email already exists");
    }
    throw err;
  }
}

/**
 * Checks a username-or-email plus password. Unknown accounts and wrong
 * passwords both raise the same InvalidCredentialsError.
 */
export async function authenticate(identifier: string, password: string): Promise<User> {
  const normalized = identifier.trim();
  const { rows } = await pool.query<UserRow>(
    `SELECT * FROM users
     WHERE username = $1 OR email = LOWER($1)
     ORDER BY (username = $1) DESC
     LIMIT 1`,
    [normalized]
  );

  const row = rows[0];
  if (!row || !(await verifyPassword(password, row.password_hash))) {
    console.warn("[persistence] Authentication failed");
    throw new InvalidCredentialsError();
  }

  console.log(`[persistence] User authenticated: ${row.username}`);
  return toUser(row);
}

export async function getUser(userId: number): Promise<User | null> {
  const { rows } = await pool.query<UserRow>("SELECT * FROM users WHERE id = $1", [userId]);
  return rows[0] ? toUser(rows[0]) : null;
}

/**
 * Writes only the fields present in `update`. Returns false when there was
 * nothing to write.
 */
export async function updateUserProfile(userId: number, update: ProfileUpdate): Promise<boolean> {
  const assignments: string[] = [];
  const params: unknown[] = [];

  for (const field of PROFILE_FIELDS) {
    const value = update[field];
    if (value === undefined) continue;
    params.push(value);
    assignments.push(`${field} = $${params.length}`);
  }

  if (assignments.length === 0) return false;

  params.push(userId);
  const { rowCount } = await pool.query(
    `UPDATE users SET ${assignments.join(", ")} WHERE id = $${params.length}`,
    params
  );
  if (!rowCount) {
    throw new NotFoundError(`User ${userId} not found`);
  }
  return true;
}
