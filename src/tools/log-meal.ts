import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { logMeal } from "../persistence/nutrition.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const LogMealInput = z.object({
  meal_type: z.enum(["Breakfast", "Lunch", "Dinner", "Snack"]),
  description: z.string().trim().min(1).max(1000),
  calories: z.number().min(0),
  protein: z.number().min(0).default(0),
  carbs: z.number().min(0).default(0),
  fat: z.number().min(0).default(0),
  meal_plan_id: z.number().int().positive().optional(),
});

export function registerLogMealTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "log_meal",
    {
      description: `${APP_CONTEXT}Log something the user ate. Macros are grams; calories are rounded to whole kcal.
Pass meal_plan_id when the meal comes from a diet plan (id of the planned meal).

Example: user says "had oatmeal with banana for breakfast, about 450 kcal" → { "meal_type": "Breakfast", "description": "Oatmeal with banana", "calories": 450 }`,
      inputSchema: LogMealInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof LogMealInput>>("log_meal", async (meal) => {
      const id = await logMeal(ctx.user.id, meal);
      return toolResponse({ meal_log_id: id, calories: Math.round(meal.calories) });
    })
  );
}
