import pool from "../db/connection.js";
import { withTransaction } from "../db/transaction.js";
import type { PlannedExercise, WorkoutDayRow, WorkoutPlanDetails, WorkoutPlanRow } from "../db/types.js";
import type { WorkoutPlanInput } from "../helpers/plan-schemas.js";
import { NotFoundError } from "../helpers/errors.js";
import { upsertExercise } from "./exercise-catalog.js";

/**
 * Stores a plan with its days and exercise links as one transaction.
 * Exercises go through the shared catalog; a name already there is reused.
 */
export async function saveWorkoutPlan(userId: number, plan: WorkoutPlanInput): Promise<number> {
  const planId = await withTransaction(async (client) => {
    const { rows: [created] } = await client.query<{ id: number }>(
      `INSERT INTO workout_plans (user_id, name, description, duration_weeks, ai_generated, generation_prompt)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id`,
      [
        userId,
        plan.name,
        plan.description ?? null,
        plan.duration_weeks ?? null,
        plan.ai_generated,
        plan.generation_prompt ?? null,
      ]
    );

    for (const day of plan.days) {
      const { rows: [dayRow] } = await client.query<{ id: number }>(
        `INSERT INTO workout_days (workout_plan_id, day_number, day_name, focus_area)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [created.id, day.day_number, day.day_name ?? null, day.focus_area ?? null]
      );

      for (const exercise of day.exercises) {
        const exerciseId = await upsertExercise(client, exercise);
        await client.query(
          `INSERT INTO workout_exercises (workout_day_id, exercise_id, sets, reps, weight_kg, rest_seconds, notes)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            dayRow.id,
            exerciseId,
            exercise.sets ?? null,
            exercise.reps ?? null,
            exercise.weight_kg ?? null,
            exercise.rest_seconds ?? null,
            exercise.notes ?? null,
          ]
        );
      }
    }

    return created.id;
  });

  console.log(`[persistence] Workout plan saved: ${plan.name} (ID: ${planId})`);
  return planId;
}

/** All of a user's workout plans, newest first. */
export async function getUserWorkoutPlans(userId: number): Promise<WorkoutPlanRow[]> {
  const { rows } = await pool.query<WorkoutPlanRow>(
    `SELECT * FROM workout_plans
     WHERE user_id = $1
     ORDER BY created_at DESC, id DESC`,
    [userId]
  );
  return rows;
}

export async function getWorkoutPlanDetails(userId: number, planId: number): Promise<WorkoutPlanDetails> {
  const { rows: [plan] } = await pool.query<WorkoutPlanRow>(
    "SELECT * FROM workout_plans WHERE id = $1 AND user_id = $2",
    [planId, userId]
  );
  if (!plan) {
    throw new NotFoundError(`Workout plan ${planId} not found`);
  }

  const { rows: days } = await pool.query<WorkoutDayRow>(
    "SELECT * FROM workout_days WHERE workout_plan_id = $1 ORDER BY day_number",
    [planId]
  );

  const { rows: exercises } = await pool.query<PlannedExercise>(
    `SELECT we.id AS link_id, we.workout_day_id, we.exercise_id, we.sets, we.reps, we.weight_kg,
            we.rest_seconds, we.notes, e.name, e.category, e.muscle_groups, e.equipment,
            e.difficulty_level, e.instructions
     FROM workout_exercises we
     JOIN workout_days wd ON wd.id = we.workout_day_id
     JOIN exercises e ON e.id = we.exercise_id
     WHERE wd.workout_plan_id = $1
     ORDER BY wd.day_number, we.id`,
    [planId]
  );

  const byDay = new Map<number, PlannedExercise[]>();
  for (const ex of exercises) {
    const list = byDay.get(ex.workout_day_id) ?? [];
    list.push(ex);
    byDay.set(ex.workout_day_id, list);
  }

  return {
    ...plan,
    days: days.map((day) => ({ ...day, exercises: byDay.get(day.id) ?? [] })),
  };
}

export interface WorkoutPlanDeletion {
  exercise_logs: number;
  workout_logs: number;
  exercise_links: number;
  days: number;
}

/**
 * Deletes a plan and everything it owns, children first, in one transaction.
 * Catalog exercises stay: other plans and logs may still point at them.
 */
export async function deleteWorkoutPlan(userId: number, planId: number): Promise<WorkoutPlanDeletion> {
  const removed = await withTransaction(async (client) => {
    const { rows } = await client.query(
      "SELECT id FROM workout_plans WHERE id = $1 AND user_id = $2 FOR UPDATE",
      [planId, userId]
    );
    if (rows.length === 0) {
      throw new NotFoundError(`Workout plan ${planId} not found`);
    }

    const exerciseLogs = await client.query(
      `DELETE FROM exercise_logs
       WHERE workout_log_id IN (SELECT id FROM workout_logs WHERE workout_plan_id = $1)`,
      [planId]
    );
    const workoutLogs = await client.query(
      "DELETE FROM workout_logs WHERE workout_plan_id = $1",
      [planId]
    );
    const links = await client.query(
      `DELETE FROM workout_exercises
       WHERE workout_day_id IN (SELECT id FROM workout_days WHERE workout_plan_id = $1)`,
      [planId]
    );
    const days = await client.query("DELETE FROM workout_days WHERE workout_plan_id = $1", [planId]);
    await client.query("DELETE FROM workout_plans WHERE id = $1", [planId]);

    return {
      exercise_logs: exerciseLogs.rowCount ?? 0,
      workout_logs: workoutLogs.rowCount ?? 0,
      exercise_links: links.rowCount ?? 0,
      days: days.rowCount ?? 0,
    };
  });

  console.log(`[persistence] Workout plan ${planId} deleted for user ${userId}`);
  return removed;
}
