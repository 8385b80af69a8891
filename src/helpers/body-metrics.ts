import type { DailyNutrition, ProgressEntry, User, WorkoutHistoryEntry } from "../db/types.js";
import { DATE_RANGE_DAYS, type DateRange } from "./date-range.js";

/**
 * Body mass index, rounded to one decimal. Null when either measurement is
 * missing or non-positive, so callers can report "insufficient data" instead
 * of a BMI of zero.
 */
export function calculateBmi(
  weightKg: number | null | undefined,
  heightCm: number | null | undefined
): number | null {
  if (!weightKg || !heightCm || weightKg <= 0 || heightCm <= 0) return null;
  const heightM = heightCm / 100;
  return Math.round((weightKg / (heightM * heightM)) * 10) / 10;
}

export type BmiCategory = "underweight" | "normal" | "overweight" | "obese";

export function bmiCategory(bmi: number): BmiCategory {
  if (bmi < 18.5) return "underweight";
  if (bmi < 25) return "normal";
  if (bmi < 30) return "overweight";
  return "obese";
}

export interface InsightInput {
  user: Pick<User, "fitness_goals">;
  bodyMetrics: ProgressEntry[];
  workoutHistory: WorkoutHistoryEntry[];
  workoutRange: DateRange;
  nutrition: DailyNutrition[];
}

/**
 * Adherence of average daily intake to the target, as a percentage.
 * Null without a positive target or without logged days.
 */
export function calorieAdherence(nutrition: DailyNutrition[]): number | null {
  const target = nutrition[0]?.target_calories;
  if (!target || target <= 0 || nutrition.length === 0) return null;
  const avg = nutrition.reduce((sum, d) => sum + d.calories, 0) / nutrition.length;
  return Math.round((avg / target) * 1000) / 10;
}

export function sessionsPerWeek(history: WorkoutHistoryEntry[], range: DateRange): number {
  const total = history.reduce((sum, h) => sum + h.sessions, 0);
  return Math.round((total / (DATE_RANGE_DAYS[range] / 7)) * 10) / 10;
}

export const NO_DATA_INSIGHT = "Keep logging your data to receive personalized insights!";

export function generateInsights(input: InsightInput): string[] {
  const insights: string[] = [];
  const { bodyMetrics, workoutHistory, nutrition, user } = input;

  if (bodyMetrics.length >= 2) {
    const change = bodyMetrics[bodyMetrics.length - 1].weight_kg - bodyMetrics[0].weight_kg;
    const rounded = Math.abs(change).toFixed(1);
    if (change < -1) {
      insights.push(`Great progress! You've lost ${rounded} kg since you started tracking.`);
    } else if (change > 1) {
      insights.push(`You've gained ${rounded} kg. Check if this aligns with your fitness goals.`);
    } else {
      insights.push("Your weight has remained stable, which is great for maintenance goals.");
    }
  }

  if (workoutHistory.length > 0) {
    const perWeek = sessionsPerWeek(workoutHistory, input.workoutRange);
    if (perWeek >= 4) {
      insights.push("Excellent workout consistency! You're averaging 4+ sessions per week.");
    } else if (perWeek >= 2) {
      insights.push("Good workout frequency. Consider adding 1-2 more sessions for faster progress.");
    } else {
      insights.push("Try to increase your workout frequency for better results.");
    }
  }

  const adherence = calorieAdherence(nutrition);
  if (adherence !== null) {
    if (adherence >= 90 && adherence <= 110) {
      insights.push("Excellent nutrition adherence! You're hitting your calorie targets consistently.");
    } else if (adherence < 90) {
      insights.push("You're consistently under your calorie target. Consider increasing intake if needed.");
    } else {
      insights.push("You're exceeding your calorie targets. Review portion sizes if weight loss is your goal.");
    }
  }

  const goals = (user.fitness_goals ?? "").toLowerCase();
  if (goals.includes("weight loss") || goals.includes("lose weight")) {
    insights.push("Focus on maintaining a consistent calorie deficit and regular cardio for weight loss.");
  } else if (goals.includes("muscle") || goals.includes("strength")) {
    insights.push("Prioritize protein intake and progressive overload in your workouts for muscle building.");
  }

  return insights.length > 0 ? insights : [NO_DATA_INSIGHT];
}
