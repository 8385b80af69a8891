import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PoolClient } from "pg";
import pool from "./connection.js";
import config from "../config.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_SCHEMA_PATH = path.join(__dirname, "schema.sql");

/** Applied when no schema file can be found: accounts only, nothing else works. */
export const FALLBACK_SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    username TEXT UNIQUE NOT NULL,
    email TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    first_name TEXT,
    last_name TEXT,
    age INTEGER,
    gender TEXT,
    height_cm REAL,
    weight_kg REAL,
    activity_level TEXT,
    fitness_goals TEXT,
    injuries TEXT,
    experience_level TEXT,
    created_at TIMESTAMPTZ DEFAULT NOW()
);
`;

export type SchemaMode = "full" | "fallback";

/**
 * Applies the schema file (or the users-only fallback) in one transaction and
 * records it in `_migrations`. Safe to call on every startup.
 */
export async function applySchema(client: PoolClient, schemaPath: string): Promise<SchemaMode> {
  let sql: string;
  let mode: SchemaMode;

  if (fs.existsSync(schemaPath)) {
    sql = fs.readFileSync(schemaPath, "utf-8");
    mode = "full";
  } else {
    console.warn(`[migrations] Schema file not found at ${schemaPath}, creating fallback users table only`);
    sql = FALLBACK_SCHEMA;
    mode = "fallback";
  }

  await client.query("BEGIN");
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);
    await client.query(sql);
    await client.query(
      "INSERT INTO _migrations (name) VALUES ($1) ON CONFLICT (name) DO NOTHING",
      [mode === "full" ? path.basename(schemaPath) : "fallback"]
    );
    await client.query("COMMIT");
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  }

  return mode;
}

export async function runMigrations(schemaPath: string = config.schemaPath ?? DEFAULT_SCHEMA_PATH): Promise<SchemaMode> {
  const client = await pool.connect();
  try {
    const mode = await applySchema(client, schemaPath);
    console.log(`[migrations] Schema applied (${mode}).`);
    return mode;
  } finally {
    client.release();
  }
}
