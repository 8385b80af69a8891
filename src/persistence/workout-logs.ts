import pool from "../db/connection.js";
import { withTransaction } from "../db/transaction.js";
import type { WorkoutHistoryEntry } from "../db/types.js";
import type { WorkoutLogInput } from "../helpers/plan-schemas.js";
import { NotFoundError } from "../helpers/errors.js";
import { windowStart, type DateRange } from "../helpers/date-range.js";
import { upsertExercise } from "./exercise-catalog.js";

/**
 * Records a performed session for one of the user's plan days, with one
 * exercise log per performed exercise, in one transaction.
 */
export async function logWorkout(userId: number, entry: WorkoutLogInput): Promise<number> {
  const logId = await withTransaction(async (client) => {
    const { rows: [day] } = await client.query<{ id: number; workout_plan_id: number }>(
      `SELECT wd.id, wd.workout_plan_id
       FROM workout_days wd
       JOIN workout_plans wp ON wp.id = wd.workout_plan_id
       WHERE wd.id = $1 AND wp.user_id = $2`,
      [entry.workout_day_id, userId]
    );
    if (!day) {
      throw new NotFoundError(`Workout day ${entry.workout_day_id} not found`);
    }

    const { rows: [log] } = await client.query<{ id: number }>(
      `INSERT INTO workout_logs (user_id, workout_plan_id, workout_day_id, completed_at, duration_minutes, notes)
       VALUES ($1, $2, $3, COALESCE($4::timestamptz, NOW()), $5, $6)
       RETURNING id`,
      [
        userId,
        day.workout_plan_id,
        day.id,
        entry.completed_at ?? null,
        entry.duration_minutes ?? null,
        entry.notes ?? null,
      ]
    );

    for (const performed of entry.exercises) {
      const exerciseId = await upsertExercise(client, { name: performed.name });
      await client.query(
        `INSERT INTO exercise_logs (workout_log_id, exercise_id, sets_completed, reps_completed,
                                    weight_used_kg, perceived_exertion, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          log.id,
          exerciseId,
          performed.sets_completed ?? null,
          performed.reps_completed ?? null,
          performed.weight_used_kg ?? null,
          performed.perceived_exertion ?? null,
          performed.notes ?? null,
        ]
      );
    }

    return log.id;
  });

  console.log(`[persistence] Workout logged for user ${userId} (log ID: ${logId})`);
  return logId;
}

export interface WorkoutPerformanceRow {
  day: string;
  plan_name: string;
  day_number: number;
  workout_log_id: number;
  duration_minutes: number | null;
  sets_completed: number | null;
  reps_completed: number | null;
  weight_used_kg: number | null;
}

/**
 * Buckets performance rows by (day, plan, day number). Rows arrive one per
 * exercise log (or one per session without exercise logs), so sessions and
 * durations are counted once per distinct workout log.
 */
export function aggregateWorkoutHistory(rows: WorkoutPerformanceRow[]): WorkoutHistoryEntry[] {
  const buckets = new Map<string, {
    entry: WorkoutHistoryEntry;
    durations: Map<number, number | null>;
  }>();

  for (const row of rows) {
    const key = `${row.day}|${row.plan_name}|${row.day_number}`;
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        entry: {
          date: row.day,
          plan_name: row.plan_name,
          day_number: row.day_number,
          volume: 0,
          sessions: 0,
          duration: null,
        },
        durations: new Map(),
      };
      buckets.set(key, bucket);
    }

    bucket.entry.volume +=
      (row.sets_completed ?? 0) * (row.reps_completed ?? 0) * (row.weight_used_kg ?? 0);
    bucket.durations.set(row.workout_log_id, row.duration_minutes);
  }

  return Array.from(buckets.values()).map(({ entry, durations }) => {
    const recorded = [...durations.values()].filter((d): d is number => d != null);
    return {
      ...entry,
      volume: Math.round(entry.volume * 100) / 100,
      sessions: durations.size,
      duration: recorded.length > 0
        ? Math.round((recorded.reduce((a, b) => a + b, 0) / recorded.length) * 10) / 10
        : null,
    };
  });
}

/** Per-day, per-plan, per-day-number training volume within the trailing window. */
export async function getWorkoutHistory(
  userId: number,
  range: DateRange,
  now: Date = new Date()
): Promise<WorkoutHistoryEntry[]> {
  const { rows } = await pool.query<WorkoutPerformanceRow>(
    `SELECT to_char(wl.completed_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day,
            wp.name AS plan_name,
            wd.day_number,
            wl.id AS workout_log_id,
            wl.duration_minutes,
            el.sets_completed,
            el.reps_completed,
            el.weight_used_kg
     FROM workout_logs wl
     JOIN workout_plans wp ON wp.id = wl.workout_plan_id
     JOIN workout_days wd ON wd.id = wl.workout_day_id
     LEFT JOIN exercise_logs el ON el.workout_log_id = wl.id
     WHERE wl.user_id = $1 AND wl.completed_at >= ($2::timestamp AT TIME ZONE 'UTC')
     ORDER BY wl.completed_at ASC, wl.id ASC, el.id ASC`,
    [userId, windowStart(range, now)]
  );
  return aggregateWorkoutHistory(rows);
}
