import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RequestContext } from "../context/request-context.js";
import type { PlanGenerator } from "../ai/plan-generator.js";
import { registerProfileTool } from "./profile.js";
import { registerWorkoutPlansTool } from "./workout-plans.js";
import { registerLogWorkoutTool } from "./log-workout.js";
import { registerDietPlansTool } from "./diet-plans.js";
import { registerFoodInventoryTool } from "./food-inventory.js";
import { registerLogMealTool } from "./log-meal.js";
import { registerBodyMetricsTool } from "./body-metrics.js";
import { registerProgressTool } from "./progress.js";
import { registerExportTool } from "./export.js";

export function registerTools(server: McpServer, ctx: RequestContext, generator: PlanGenerator) {
  registerProfileTool(server, ctx);
  registerWorkoutPlansTool(server, ctx, generator);
  registerLogWorkoutTool(server, ctx);
  registerDietPlansTool(server, ctx, generator);
  registerFoodInventoryTool(server, ctx);
  registerLogMealTool(server, ctx);
  registerBodyMetricsTool(server, ctx);
  registerProgressTool(server, ctx);
  registerExportTool(server, ctx);
}
