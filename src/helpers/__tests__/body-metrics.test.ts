import { describe, it, expect } from "vitest";
import {
  bmiCategory,
  calculateBmi,
  calorieAdherence,
  generateInsights,
  NO_DATA_INSIGHT,
  sessionsPerWeek,
} from "../body-metrics.js";
import type { DailyNutrition, WorkoutHistoryEntry } from "../../db/types.js";

const day = (date: string, calories: number, target: number | null = 2000): DailyNutrition => ({
  date,
  calories,
  protein: 0,
  carbs: 0,
  fats: 0,
  target_calories: target,
});

const session = (date: string, sessions: number): WorkoutHistoryEntry => ({
  date,
  plan_name: "Strength",
  day_number: 1,
  volume: 1000,
  sessions,
  duration: 45,
});

describe("calculateBmi", () => {
  it("rounds to one decimal", () => {
    expect(calculateBmi(70, 175)).toBe(22.9);
  });

  it.each([
    [null, 175],
    [70, null],
    [70, 0],
    [0, 175],
  ])("is null for weight %j and height %j", (weight, height) => {
    expect(calculateBmi(weight, height)).toBeNull();
  });
});

describe("bmiCategory", () => {
  it.each([
    [18.4, "underweight"],
    [18.5, "normal"],
    [25, "overweight"],
    [30, "obese"],
  ] as const)("%d is %s", (bmi, category) => {
    expect(bmiCategory(bmi)).toBe(category);
  });
});

describe("calorieAdherence", () => {
  it("compares the daily average with the target", () => {
    expect(calorieAdherence([day("2026-03-01", 1800), day("2026-03-02", 2200)])).toBe(100);
  });

  it("is null without a target", () => {
    expect(calorieAdherence([day("2026-03-01", 1800, null)])).toBeNull();
  });

  it("is null without logged days", () => {
    expect(calorieAdherence([])).toBeNull();
  });
});

describe("sessionsPerWeek", () => {
  it("spreads sessions over the window", () => {
    expect(sessionsPerWeek([session("2026-03-01", 4), session("2026-03-05", 2)], "2 Weeks")).toBe(3);
    expect(sessionsPerWeek([session("2026-03-01", 6)], "1 Month")).toBe(1.4);
  });
});

describe("generateInsights", () => {
  it("reports weight, frequency, nutrition and goal insights", () => {
    const insights = generateInsights({
      user: { fitness_goals: "Lose weight before summer" },
      bodyMetrics: [
        { id: 1, height_cm: 170, weight_kg: 82, date: "2026-02-01" },
        { id: 2, height_cm: 170, weight_kg: 80, date: "2026-03-01" },
      ],
      workoutHistory: [session("2026-03-01", 4)],
      workoutRange: "1 Week",
      nutrition: [day("2026-03-01", 1900)],
    });

    expect(insights).toEqual([
      "Great progress! You've lost 2.0 kg since you started tracking.",
      "Excellent workout consistency! You're averaging 4+ sessions per week.",
      "Excellent nutrition adherence! You're hitting your calorie targets consistently.",
      "Focus on maintaining a consistent calorie deficit and regular cardio for weight loss.",
    ]);
  });

  it("flags a gain and low frequency", () => {
    const insights = generateInsights({
      user: { fitness_goals: "Build muscle" },
      bodyMetrics: [
        { id: 1, height_cm: 170, weight_kg: 70, date: "2026-02-01" },
        { id: 2, height_cm: 170, weight_kg: 71.5, date: "2026-03-01" },
      ],
      workoutHistory: [session("2026-03-01", 1)],
      workoutRange: "1 Month",
      nutrition: [day("2026-03-01", 2500)],
    });

    expect(insights).toEqual([
      "You've gained 1.5 kg. Check if this aligns with your fitness goals.",
      "Try to increase your workout frequency for better results.",
      "You're exceeding your calorie targets. Review portion sizes if weight loss is your goal.",
      "Prioritize protein intake and progressive overload in your workouts for muscle building.",
    ]);
  });

  it("asks for more data when there is nothing to say", () => {
    expect(
      generateInsights({
        user: { fitness_goals: null },
        bodyMetrics: [],
        workoutHistory: [],
        workoutRange: "1 Month",
        nutrition: [],
      })
    ).toEqual([NO_DATA_INSIGHT]);
  });
});
