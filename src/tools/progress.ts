import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { getNutritionLogs } from "../persistence/nutrition.js";
import { getWorkoutHistory } from "../persistence/workout-logs.js";
import { getBodyMetrics } from "../persistence/progress.js";
import { DATE_RANGES } from "../helpers/date-range.js";
import {
  bmiCategory,
  calculateBmi,
  calorieAdherence,
  generateInsights,
  sessionsPerWeek,
} from "../helpers/body-metrics.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const ProgressInput = z.object({
  view: z.enum(["nutrition", "workouts", "overview"]),
  range: z.enum(DATE_RANGES).default("1 Month"),
});

export function registerProgressTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "get_progress",
    {
      description: `${APP_CONTEXT}Progress over a trailing window (range: ${DATE_RANGES.map((r) => `"${r}"`).join(", ")}; default "1 Month").
- "nutrition": daily calorie and macro totals with the current calorie target
- "workouts": training volume (sets x reps x weight) per day and plan day, with session count and mean duration
- "overview": latest body metrics, BMI, sessions per week, calorie adherence and insights`,
      inputSchema: ProgressInput.shape,
      annotations: { readOnlyHint: true, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof ProgressInput>>("get_progress", async ({ view, range }) => {
      const userId = ctx.user.id;

      if (view === "nutrition") {
        const days = await getNutritionLogs(userId, range);
        return toolResponse({ range, days });
      }

      if (view === "workouts") {
        const history = await getWorkoutHistory(userId, range);
        return toolResponse({ range, history });
      }

      // overview
      const bodyMetrics = await getBodyMetrics(userId);
      const workoutHistory = await getWorkoutHistory(userId, range);
      const nutrition = await getNutritionLogs(userId, range);

      const latest = bodyMetrics.at(-1);
      const weight = latest?.weight_kg ?? ctx.user.weight_kg;
      const height = latest?.height_cm ?? ctx.user.height_cm;
      const bmi = calculateBmi(weight, height);

      return toolResponse({
        range,
        weight_kg: weight,
        height_cm: height,
        bmi: bmi ?? "insufficient data",
        bmi_category: bmi === null ? null : bmiCategory(bmi),
        sessions_per_week: sessionsPerWeek(workoutHistory, range),
        calorie_adherence_pct: calorieAdherence(nutrition),
        insights: generateInsights({
          user: ctx.user,
          bodyMetrics,
          workoutHistory,
          workoutRange: range,
          nutrition,
        }),
      });
    })
  );
}
