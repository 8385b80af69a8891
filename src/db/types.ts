/**
 * Database row types for the fitness dashboard.
 * These interfaces match src/db/schema.sql and type the results of pool queries.
 */

// ─── Users & Sessions ──────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  age: number | null;
  gender: string | null;
  height_cm: number | null;
  weight_kg: number | null;
  activity_level: string | null;
  fitness_goals: string | null;
  injuries: string | null;
  experience_level: string | null;
  created_at: Date;
}

/** A user as handed to callers: never carries the password hash. */
export type User = Omit<UserRow, "password_hash">;

export interface SessionGrant {
  token: string;
  expiresAt: Date;
}

// ─── Workout Plans ─────────────────────────────────────────────────────────

export interface WorkoutPlanRow {
  id: number;
  user_id: number;
  name: string;
  description: string | null;
  duration_weeks: number | null;
  ai_generated: boolean;
  generation_prompt: string | null;
  created_at: Date;
}

export interface WorkoutDayRow {
  id: number;
  workout_plan_id: number;
  day_number: number;
  day_name: string | null;
  focus_area: string | null;
}

export interface ExerciseRow {
  id: number;
  name: string;
  category: string | null;
  muscle_groups: string | null;
  equipment: string | null;
  difficulty_level: string | null;
  instructions: string | null;
}

export interface WorkoutExerciseRow {
  id: number;
  workout_day_id: number;
  exercise_id: number;
  sets: number | null;
  reps: string | null;
  weight_kg: number | null;
  rest_seconds: number | null;
  notes: string | null;
}

/** Link row joined with its catalog entry, as returned by plan detail queries. */
export interface PlannedExercise extends Omit<WorkoutExerciseRow, "id">, Omit<ExerciseRow, "id"> {
  link_id: number;
}

export interface WorkoutPlanDetails extends WorkoutPlanRow {
  days: Array<WorkoutDayRow & { exercises: PlannedExercise[] }>;
}

export interface WorkoutLogRow {
  id: number;
  user_id: number;
  workout_plan_id: number;
  workout_day_id: number;
  completed_at: Date;
  duration_minutes: number | null;
  notes: string | null;
}

export interface ExerciseLogRow {
  id: number;
  workout_log_id: number;
  exercise_id: number;
  sets_completed: number | null;
  reps_completed: number | null;
  weight_used_kg: number | null;
  perceived_exertion: number | null;
  notes: string | null;
}

// ─── Diet Plans ────────────────────────────────────────────────────────────

export interface DietPlanRow {
  id: number;
  user_id: number;
  name: string;
  calorie_target: number | null;
  protein_target_g: number | null;
  carb_target_g: number | null;
  fat_target_g: number | null;
  dietary_restrictions: string | null;
  ai_generated: boolean;
  generation_prompt: string | null;
  created_at: Date;
}

export interface MealPlanRow {
  id: number;
  diet_plan_id: number;
  day_number: number;
  meal_type: string;
  recipe_name: string | null;
  ingredients: string | null;
  instructions: string | null;
  calories_per_serving: number | null;
  protein_g: number | null;
  carbs_g: number | null;
  fat_g: number | null;
  servings: number;
}

export interface ShoppingListRow {
  id: number;
  user_id: number;
  diet_plan_id: number | null;
  item_name: string;
  quantity: number | null;
  unit: string | null;
  category: string | null;
  purchased: boolean;
  created_at: Date;
}

export interface DietPlanDetails extends DietPlanRow {
  meals: MealPlanRow[];
  shopping_list: ShoppingListRow[];
}

// ─── Logs & Progress ───────────────────────────────────────────────────────

export interface MealLogRow {
  id: number;
  user_id: number;
  meal_plan_id: number | null;
  meal_type: string;
  food_items: string | null;
  calories_consumed: number | null;
  protein_g: number | null;
  carbs_g: number | null;
  fat_g: number | null;
  logged_at: Date;
}

export interface ProgressEntry {
  id: number;
  height_cm: number;
  weight_kg: number;
  /** YYYY-MM-DD */
  date: string;
}

// ─── Derived analytics ─────────────────────────────────────────────────────

export interface DailyNutrition {
  /** Calendar day, YYYY-MM-DD */
  date: string;
  calories: number;
  protein: number;
  carbs: number;
  fats: number;
  /** Calorie target of the user's newest diet plan, null when there is none */
  target_calories: number | null;
}

export interface WorkoutHistoryEntry {
  date: string;
  plan_name: string;
  day_number: number;
  /** Σ sets × reps × weight over the bucket */
  volume: number;
  sessions: number;
  /** Mean logged duration in minutes; null when no session recorded one */
  duration: number | null;
}
