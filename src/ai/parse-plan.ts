import {
  generatedDietPlanSchema,
  generatedWorkoutPlanSchema,
  type DietPlanInput,
  type WorkoutPlanInput,
} from "../helpers/plan-schemas.js";

/** Characters of an unusable response kept on the fallback plan. */
export const RAW_RESPONSE_LIMIT = 1000;

/** Minimal plan stored when a workout response cannot be used. */
export const FALLBACK_WORKOUT_PLAN: WorkoutPlanInput = {
  name: "AI-Generated Workout Plan",
  description: "Custom workout plan generated by AI",
  duration_weeks: 4,
  ai_generated: true,
  days: [
    {
      day_number: 1,
      day_name: "Full Body Workout",
      focus_area: "General fitness",
      exercises: [
        {
          name: "Push-ups",
          category: "Strength",
          muscle_groups: "Chest, shoulders, triceps",
          equipment: "Bodyweight",
          difficulty_level: "Beginner",
          instructions: "Standard push-up form",
          sets: 3,
          reps: "8-12",
          rest_seconds: 60,
          notes: "Modify as needed",
        },
      ],
    },
  ],
};

/** Minimal plan stored when a diet response cannot be used. */
export const FALLBACK_DIET_PLAN: DietPlanInput = {
  name: "AI-Generated Meal Plan",
  calorie_target: 2000,
  protein_target_g: 120,
  carb_target_g: 250,
  fat_target_g: 67,
  dietary_restrictions: "None specified",
  ai_generated: true,
  meals: [
    {
      day_number: 1,
      meal_type: "Breakfast",
      recipe_name: "Balanced Breakfast",
      ingredients: "Oats, protein powder, banana, berries",
      instructions: "Combine ingredients for a nutritious start",
      calories_per_serving: 400,
      protein_g: 25,
      carbs_g: 45,
      fat_g: 8,
      servings: 1,
    },
  ],
  shopping_list: [],
};

/**
 * Parses the outermost {...} span of a model response.
 * Returns null when there is none or it is not valid JSON.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    console.warn("[plan-generator] Response JSON did not parse:", err instanceof Error ? err.message : err);
    return null;
  }
}

function unusedResponseNote(text: string): string {
  return `Unparsed response: ${text.slice(0, RAW_RESPONSE_LIMIT)}`;
}

/**
 * Generation notes on a parsed plan are always null; on a fallback plan they
 * carry the start of the response that could not be used.
 */
export function parseWorkoutPlanResponse(text: string): WorkoutPlanInput {
  const parsed = generatedWorkoutPlanSchema.safeParse(extractJsonObject(text));
  if (parsed.success && parsed.data.days.length > 0) {
    return {
      ...parsed.data,
      name: parsed.data.name || FALLBACK_WORKOUT_PLAN.name,
      ai_generated: true,
      generation_prompt: null,
    };
  }
  console.warn("[plan-generator] Unusable workout plan response, using fallback plan");
  return { ...structuredClone(FALLBACK_WORKOUT_PLAN), generation_prompt: unusedResponseNote(text) };
}

export function parseDietPlanResponse(text: string): DietPlanInput {
  const parsed = generatedDietPlanSchema.safeParse(extractJsonObject(text));
  if (parsed.success && parsed.data.meals.length > 0) {
    return {
      ...parsed.data,
      name: parsed.data.name || FALLBACK_DIET_PLAN.name,
      ai_generated: true,
      generation_prompt: null,
    };
  }
  console.warn("[plan-generator] Unusable diet plan response, using fallback plan");
  return { ...structuredClone(FALLBACK_DIET_PLAN), generation_prompt: unusedResponseNote(text) };
}
