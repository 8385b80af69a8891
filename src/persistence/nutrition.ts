import pool from "../db/connection.js";
import type { DailyNutrition } from "../db/types.js";
import { windowStart, type DateRange } from "../helpers/date-range.js";
import { NotFoundError } from "../helpers/errors.js";

export interface MealLogInput {
  meal_type: string;
  description: string;
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
  meal_plan_id?: number | null;
}

/** Append-only: meal logs are never edited in place. */
export async function logMeal(userId: number, meal: MealLogInput): Promise<number> {
  if (meal.meal_plan_id != null) {
    const { rows: owned } = await pool.query(
      `SELECT mp.id FROM meal_plans mp
       JOIN diet_plans dp ON dp.id = mp.diet_plan_id
       WHERE mp.id = $1 AND dp.user_id = $2`,
      [meal.meal_plan_id, userId]
    );
    if (owned.length === 0) {
      throw new NotFoundError(`Planned meal ${meal.meal_plan_id} not found`);
    }
  }

  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO meal_logs (user_id, meal_plan_id, meal_type, food_items, calories_consumed, protein_g, carbs_g, fat_g)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING id`,
    [
      userId,
      meal.meal_plan_id ?? null,
      meal.meal_type,
      meal.description,
      Math.round(meal.calories),
      meal.protein,
      meal.carbs,
      meal.fat,
    ]
  );
  return rows[0].id;
}

export interface MealIntakeRow {
  day: string;
  calories_consumed: number | null;
  protein_g: number | null;
  carbs_g: number | null;
  fat_g: number | null;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Sums intake per calendar day, keeping the order rows arrive in. */
export function aggregateDailyNutrition(
  rows: MealIntakeRow[],
  targetCalories: number | null
): DailyNutrition[] {
  const days = new Map<string, DailyNutrition>();

  for (const row of rows) {
    let day = days.get(row.day);
    if (!day) {
      day = { date: row.day, calories: 0, protein: 0, carbs: 0, fats: 0, target_calories: targetCalories };
      days.set(row.day, day);
    }
    day.calories += row.calories_consumed ?? 0;
    day.protein += row.protein_g ?? 0;
    day.carbs += row.carbs_g ?? 0;
    day.fats += row.fat_g ?? 0;
  }

  return Array.from(days.values()).map((d) => ({
    ...d,
    calories: round2(d.calories),
    protein: round2(d.protein),
    carbs: round2(d.carbs),
    fats: round2(d.fats),
  }));
}

/** Calorie target of the user's most recently created diet plan. */
export async function getCurrentCalorieTarget(userId: number): Promise<number | null> {
  const { rows } = await pool.query<{ calorie_target: number | null }>(
    `SELECT calorie_target FROM diet_plans
     WHERE user_id = $1
     ORDER BY created_at DESC, id DESC
     LIMIT 1`,
    [userId]
  );
  return rows[0]?.calorie_target ?? null;
}

/** Daily intake totals within the trailing window, oldest day first. Days are UTC calendar days. */
export async function getNutritionLogs(
  userId: number,
  range: DateRange,
  now: Date = new Date()
): Promise<DailyNutrition[]> {
  const target = await getCurrentCalorieTarget(userId);

  const { rows } = await pool.query<MealIntakeRow>(
    `SELECT to_char(logged_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day, calories_consumed, protein_g, carbs_g, fat_g
     FROM meal_logs
     WHERE user_id = $1 AND logged_at >= ($2::timestamp AT TIME ZONE 'UTC')
     ORDER BY logged_at ASC, id ASC`,
    [userId, windowStart(range, now)]
  );

  return aggregateDailyNutrition(rows, target);
}
