import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { logWorkout } from "../persistence/workout-logs.js";
import { workoutLogSchema } from "../helpers/plan-schemas.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerLogWorkoutTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "log_workout",
    {
      description: `${APP_CONTEXT}Record a completed session for one day of one of the user's plans.
workout_day_id comes from manage_workout_plans "get". Each performed exercise is logged by name; unknown names are added to the exercise catalog.
completed_at is ISO 8601 with offset, defaulting to now.

Example: { "workout_day_id": 12, "duration_minutes": 50, "exercises": [{ "name": "Bench Press", "sets_completed": 3, "reps_completed": 10, "weight_used_kg": 60 }] }`,
      inputSchema: workoutLogSchema.shape,
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof workoutLogSchema>>("log_workout", async (entry) => {
      const logId = await logWorkout(ctx.user.id, entry);
      return toolResponse({ workout_log_id: logId, exercises_logged: entry.exercises.length });
    })
  );
}
