import { z } from "zod";

/**
 * Zod schemas for the structured plan payloads that the persistence layer
 * stores. The same schemas validate plans sent by clients and plans parsed
 * out of generated text, so they accept a few loose shapes generated output
 * tends to use (number reps, numeric strings, arrays of muscle groups,
 * fractional calories).
 */

/** Free text that may arrive as a list. Lists are joined with ", ". */
const looseText = z
  .union([z.string(), z.array(z.string()).transform((items) => items.join(", "))])
  .nullish();

/** Reads "4" or " 1800 " as a number; anything else is left for the inner schema to judge. */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== "string" || value.trim() === "") return value;
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
  }, schema);
}

/** Whole number that may arrive with a fractional part. */
const wholeNumber = numeric(z.number().min(0).transform(Math.round).nullish());

const amount = numeric(z.number().min(0).nullish());

const plannedExerciseSchema = z.object({
  name: z.string().trim().min(1).max(200),
  category: looseText,
  muscle_groups: looseText,
  equipment: looseText,
  difficulty_level: looseText,
  instructions: looseText,
  sets: wholeNumber,
  reps: z.union([z.string(), z.number().transform(String)]).nullish(),
  weight_kg: amount,
  rest_seconds: wholeNumber,
  notes: looseText,
});

const workoutDaySchema = z.object({
  day_number: numeric(z.number().int().min(1)),
  day_name: z.string().nullish(),
  focus_area: looseText,
  exercises: z.array(plannedExerciseSchema).default([]),
});

const workoutPlanObject = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().nullish(),
  duration_weeks: numeric(z.number().int().min(1).max(104).nullish()),
  ai_generated: z.boolean().default(false),
  generation_prompt: z.string().nullish(),
  days: z.array(workoutDaySchema).default([]),
});

function uniqueDayNumbers(plan: { days: { day_number: number }[] }, ctx: z.RefinementCtx): void {
  const seen = new Set<number>();
  for (const [i, day] of plan.days.entries()) {
    if (seen.has(day.day_number)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["days", i, "day_number"],
        message: `Duplicate day_number ${day.day_number}`,
      });
    }
    seen.add(day.day_number);
  }
}

export const workoutPlanSchema = workoutPlanObject.superRefine(uniqueDayNumbers);

const mealSchema = z.object({
  day_number: numeric(z.number().int().min(1)),
  meal_type: z.string().trim().min(1).max(50),
  recipe_name: z.string().nullish(),
  ingredients: looseText,
  instructions: looseText,
  calories_per_serving: wholeNumber,
  protein_g: amount,
  carbs_g: amount,
  fat_g: amount,
  servings: numeric(z.number().int().min(1).default(1)),
});

const shoppingItemSchema = z.object({
  item_name: z.string().trim().min(1).max(200),
  quantity: amount,
  unit: z.string().nullish(),
  category: z.string().nullish(),
});

export const dietPlanSchema = z.object({
  name: z.string().trim().min(1).max(200),
  calorie_target: wholeNumber,
  protein_target_g: wholeNumber,
  carb_target_g: wholeNumber,
  fat_target_g: wholeNumber,
  dietary_restrictions: looseText,
  ai_generated: z.boolean().default(false),
  generation_prompt: z.string().nullish(),
  meals: z.array(mealSchema).default([]),
  shopping_list: z.array(shoppingItemSchema).default([]),
});

/**
 * Generated responses may leave the name out: the generator names the plan
 * after the user's choice anyway.
 */
export const generatedWorkoutPlanSchema = workoutPlanObject
  .extend({ name: z.string().trim().max(200).nullish() })
  .superRefine(uniqueDayNumbers);

export const generatedDietPlanSchema = dietPlanSchema.extend({
  name: z.string().trim().max(200).nullish(),
});

export type PlannedExerciseInput = z.infer<typeof plannedExerciseSchema>;
export type WorkoutPlanInput = z.infer<typeof workoutPlanSchema>;
export type DietPlanInput = z.infer<typeof dietPlanSchema>;

const performedExerciseSchema = z.object({
  name: z.string().trim().min(1).max(200),
  sets_completed: z.number().int().min(0).nullish(),
  reps_completed: z.number().int().min(0).nullish(),
  weight_used_kg: z.number().min(0).nullish(),
  perceived_exertion: z.number().int().min(1).max(10).nullish(),
  notes: z.string().nullish(),
});

export const workoutLogSchema = z.object({
  workout_day_id: z.number().int().positive(),
  completed_at: z.string().datetime({ offset: true }).nullish(),
  duration_minutes: z.number().int().min(0).max(1440).nullish(),
  notes: z.string().nullish(),
  exercises: z.array(performedExerciseSchema).default([]),
});

export type WorkoutLogInput = z.infer<typeof workoutLogSchema>;
