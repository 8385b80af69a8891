import type { DietGoals, GenerationProfile, WorkoutPreferences } from "./plan-generator.js";

const orUnknown = (value: string | number | null | undefined, fallback = "Unknown") =>
  value == null || value === "" ? fallback : String(value);

export function buildWorkoutPrompt(profile: GenerationProfile, preferences: WorkoutPreferences): string {
  return `You are a certified personal trainer and exercise physiologist.
Create a personalized 4-week workout plan for the following client.

USER PROFILE:
- Age: ${orUnknown(profile.age)}
- Gender: ${orUnknown(profile.gender)}
- Height: ${orUnknown(profile.height_cm)} cm
- Weight: ${orUnknown(profile.weight_kg)} kg
- Activity Level: ${orUnknown(profile.activity_level)}
- Experience Level: ${orUnknown(profile.experience_level, "Beginner")}
- Fitness Goals: ${orUnknown(profile.fitness_goals, "General fitness")}
- Injuries/Limitations: ${orUnknown(profile.injuries, "None specified")}

WORKOUT PREFERENCES:
- Days per week: ${preferences.days_per_week ?? 4}
- Session duration: ${preferences.session_duration ?? "45-60 minutes"}
- Preferred equipment: ${preferences.equipment ?? "Full gym access"}
- Workout type focus: ${preferences.workout_type ?? "Balanced strength and cardio"}

REQUIREMENTS:
1. One entry in "days" per training day, numbered from 1
2. Specific exercises with sets, reps and rest periods
3. Respect the client's limitations and experience level

Respond with JSON only, in exactly this shape:
{
  "name": "Personalized 4-Week Training Plan",
  "description": "Brief description of the plan approach",
  "duration_weeks": 4,
  "days": [
    {
      "day_number": 1,
      "day_name": "Day 1: Upper Body Strength",
      "focus_area": "Upper body strength",
      "exercises": [
        {
          "name": "Push-ups",
          "category": "Strength",
          "muscle_groups": "Chest, shoulders, triceps",
          "equipment": "Bodyweight",
          "difficulty_level": "Beginner",
          "instructions": "Step-by-step instructions",
          "sets": 3,
          "reps": "8-12",
          "rest_seconds": 60,
          "notes": "Modify on knees if needed"
        }
      ]
    }
  ]
}`;
}

export function buildDietPrompt(
  profile: GenerationProfile,
  availableFoods: string[],
  goals: DietGoals
): string {
  return `You are a registered dietitian and sports nutritionist.
Create a 7-day meal plan for the following client.

USER PROFILE:
- Age: ${orUnknown(profile.age)}
- Gender: ${orUnknown(profile.gender)}
- Height: ${orUnknown(profile.height_cm)} cm
- Weight: ${orUnknown(profile.weight_kg)} kg
- Activity Level: ${orUnknown(profile.activity_level)}
- Fitness Goals: ${orUnknown(profile.fitness_goals, "General health")}

AVAILABLE FOODS:
${availableFoods.length > 0 ? availableFoods.join(", ") : "Standard grocery items"}

DIETARY GOALS:
- Calorie Target: ${goals.calorie_target ?? "Calculate based on profile"}
- Protein Goal: ${goals.protein_target ?? "Calculate based on goals"}g
- Carb Goal: ${goals.carb_target ?? "Balanced"}g
- Fat Goal: ${goals.fat_target ?? "Balanced"}g
- Dietary Restrictions: ${goals.restrictions || "None"}
- Meal Frequency: ${goals.meals_per_day ?? 3} meals + ${goals.snacks_per_day ?? 1} snacks

REQUIREMENTS:
1. Seven days of meals, mostly from the available foods
2. Nutrition per serving for every meal
3. A shopping list for ingredients that are not available

Respond with JSON only, in exactly this shape:
{
  "name": "Personalized 7-Day Meal Plan",
  "calorie_target": 2000,
  "protein_target_g": 120,
  "carb_target_g": 250,
  "fat_target_g": 67,
  "dietary_restrictions": "None",
  "meals": [
    {
      "day_number": 1,
      "meal_type": "Breakfast",
      "recipe_name": "Protein Oatmeal Bowl",
      "ingredients": "1 cup oats, 1 scoop protein powder, 1 banana",
      "instructions": "Cook oats, stir in protein powder, top with banana",
      "calories_per_serving": 450,
      "protein_g": 25,
      "carbs_g": 55,
      "fat_g": 12,
      "servings": 1
    }
  ],
  "shopping_list": [
    { "item_name": "Quinoa", "quantity": 2, "unit": "cups", "category": "Grains" }
  ]
}`;
}
