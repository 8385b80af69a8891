import pool from "../db/connection.js";
import type {
  DietPlanRow,
  ExerciseLogRow,
  MealLogRow,
  ProgressEntry,
  User,
  WorkoutLogRow,
  WorkoutPlanRow,
} from "../db/types.js";
import { NotFoundError } from "../helpers/errors.js";
import { getUser } from "./users.js";
import { getUserWorkoutPlans } from "./workout-plans.js";
import { getUserDietPlans } from "./diet-plans.js";
import { getUserFoods } from "./food-inventory.js";
import { getBodyMetrics } from "./progress.js";

export const EXPORT_ROW_LIMIT = 10000;

export interface ExportedWorkoutLog extends WorkoutLogRow {
  exercises: Array<ExerciseLogRow & { exercise_name: string }>;
}

export interface UserExport {
  profile: User;
  workout_plans: WorkoutPlanRow[];
  diet_plans: DietPlanRow[];
  food_inventory: string[];
  body_metrics: ProgressEntry[];
  workout_logs: ExportedWorkoutLog[];
  meal_logs: MealLogRow[];
}

export interface AccountSummary {
  user_id: number;
  username: string;
  member_since: Date;
  workout_plans: number;
  diet_plans: number;
  food_items: number;
}

async function requireUser(userId: number): Promise<User> {
  const user = await getUser(userId);
  if (!user) {
    throw new NotFoundError(`User ${userId} not found`);
  }
  return user;
}

/** Everything stored for one user. Log sections are capped at EXPORT_ROW_LIMIT rows each. */
export async function getUserExport(userId: number): Promise<UserExport> {
  const profile = await requireUser(userId);
  const workoutPlans = await getUserWorkoutPlans(userId);
  const dietPlans = await getUserDietPlans(userId);
  const foods = await getUserFoods(userId);
  const bodyMetrics = await getBodyMetrics(userId);

  const { rows: workoutLogs } = await pool.query<WorkoutLogRow>(
    `SELECT * FROM workout_logs
     WHERE user_id = $1
     ORDER BY completed_at DESC, id DESC
     LIMIT ${EXPORT_ROW_LIMIT}`,
    [userId]
  );
  const { rows: exerciseLogs } = await pool.query<ExerciseLogRow & { exercise_name: string }>(
    `SELECT el.*, e.name AS exercise_name
     FROM exercise_logs el
     JOIN workout_logs wl ON wl.id = el.workout_log_id
     JOIN exercises e ON e.id = el.exercise_id
     WHERE wl.user_id = $1
     ORDER BY el.workout_log_id, el.id
     LIMIT ${EXPORT_ROW_LIMIT}`,
    [userId]
  );
  const { rows: mealLogs } = await pool.query<MealLogRow>(
    `SELECT * FROM meal_logs
     WHERE user_id = $1
     ORDER BY logged_at DESC, id DESC
     LIMIT ${EXPORT_ROW_LIMIT}`,
    [userId]
  );

  const byLog = new Map<number, ExportedWorkoutLog["exercises"]>();
  for (const row of exerciseLogs) {
    const list = byLog.get(row.workout_log_id) ?? [];
    list.push(row);
    byLog.set(row.workout_log_id, list);
  }

  console.log(`[persistence] Data export built for user ${userId}`);
  return {
    profile,
    workout_plans: workoutPlans,
    diet_plans: dietPlans,
    food_inventory: foods,
    body_metrics: bodyMetrics,
    workout_logs: workoutLogs.map((log) => ({ ...log, exercises: byLog.get(log.id) ?? [] })),
    meal_logs: mealLogs,
  };
}

export async function getAccountSummary(userId: number): Promise<AccountSummary> {
  const user = await requireUser(userId);
  const { rows: [counts] } = await pool.query<Pick<AccountSummary, "workout_plans" | "diet_plans" | "food_items">>(
    `SELECT
       (SELECT COUNT(*) FROM workout_plans WHERE user_id = $1)::int AS workout_plans,
       (SELECT COUNT(*) FROM diet_plans WHERE user_id = $1)::int AS diet_plans,
       (SELECT COUNT(*) FROM food_inventory WHERE user_id = $1)::int AS food_items`,
    [userId]
  );

  return {
    user_id: user.id,
    username: user.username,
    member_since: user.created_at,
    workout_plans: counts.workout_plans,
    diet_plans: counts.diet_plans,
    food_items: counts.food_items,
  };
}
