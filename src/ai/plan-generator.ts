import type { User } from "../db/types.js";
import type { DietPlanInput, WorkoutPlanInput } from "../helpers/plan-schemas.js";

/** The parts of a user profile that generation prompts use. */
export type GenerationProfile = Pick<
  User,
  | "age"
  | "gender"
  | "height_cm"
  | "weight_kg"
  | "activity_level"
  | "experience_level"
  | "fitness_goals"
  | "injuries"
>;

export interface WorkoutPreferences {
  /** Name the saved plan gets, whatever the generated one says */
  name: string;
  days_per_week?: number;
  session_duration?: string;
  equipment?: string;
  workout_type?: string;
}

export interface DietGoals {
  name: string;
  calorie_target?: number;
  protein_target?: number;
  carb_target?: number;
  fat_target?: number;
  restrictions?: string;
  meals_per_day?: number;
  snacks_per_day?: number;
}

/**
 * Generative-text collaborator. Implementations return a plan ready for the
 * persistence layer, fall back to a minimal plan when the response cannot be
 * parsed, and throw ExternalServiceUnavailableError when the service is not
 * configured or the call fails.
 */
export interface PlanGenerator {
  isAvailable(): boolean;
  generateWorkoutPlan(profile: GenerationProfile, preferences: WorkoutPreferences): Promise<WorkoutPlanInput>;
  generateDietPlan(
    profile: GenerationProfile,
    availableFoods: string[],
    goals: DietGoals
  ): Promise<DietPlanInput>;
}
