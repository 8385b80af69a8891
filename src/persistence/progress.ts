import pool from "../db/connection.js";
import type { ProgressEntry } from "../db/types.js";

/** Body measurements, oldest first. */
export async function getBodyMetrics(userId: number): Promise<ProgressEntry[]> {
  const { rows } = await pool.query<ProgressEntry>(
    `SELECT id, height_cm, weight_kg, to_char(date, 'YYYY-MM-DD') AS date
     FROM progress_tracking
     WHERE user_id = $1
     ORDER BY date ASC, id ASC`,
    [userId]
  );
  return rows;
}

/** @param date - YYYY-MM-DD; today (UTC) when omitted */
export async function addProgressEntry(
  userId: number,
  weightKg: number,
  heightCm: number,
  date?: string
): Promise<ProgressEntry> {
  const { rows } = await pool.query<ProgressEntry>(
    `INSERT INTO progress_tracking (user_id, weight_kg, height_cm, date)
     VALUES ($1, $2, $3, COALESCE($4::date, (NOW() AT TIME ZONE 'UTC')::date))
     RETURNING id, height_cm, weight_kg, to_char(date, 'YYYY-MM-DD') AS date`,
    [userId, weightKg, heightCm, date ?? null]
  );
  return rows[0];
}
