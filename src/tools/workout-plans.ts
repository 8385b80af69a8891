import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import type { PlanGenerator } from "../ai/plan-generator.js";
import {
  deleteWorkoutPlan,
  getUserWorkoutPlans,
  getWorkoutPlanDetails,
  saveWorkoutPlan,
} from "../persistence/workout-plans.js";
import { workoutPlanSchema } from "../helpers/plan-schemas.js";
import { toolResponse, safeHandler, issueList, APP_CONTEXT } from "../helpers/tool-response.js";

const WorkoutPlansInput = z.object({
  action: z.enum(["list", "get", "save", "generate", "delete"]),
  plan_id: z.number().int().positive().optional(),
  plan: z.record(z.unknown()).optional(),
  preferences: z
    .object({
      name: z.string().trim().min(1).max(200),
      days_per_week: z.number().int().min(1).max(7).optional(),
      session_duration: z.string().optional(),
      equipment: z.string().optional(),
      workout_type: z.string().optional(),
    })
    .optional(),
});

export function registerWorkoutPlansTool(server: McpServer, ctx: RequestContext, generator: PlanGenerator) {
  server.registerTool(
    "manage_workout_plans",
    {
      description: `${APP_CONTEXT}Manage the user's workout plans.
Actions:
- "list": all plans, newest first
- "get": one plan with its days and exercises (plan_id)
- "save": store a plan the user described (plan: { name, description?, duration_weeks?, days: [{ day_number, day_name?, focus_area?, exercises: [{ name, sets?, reps?, weight_kg?, rest_seconds?, notes?, category?, muscle_groups?, equipment? }] }] })
- "generate": create a personalized 4-week plan from the profile (preferences: { name, days_per_week?, session_duration?, equipment?, workout_type? })
- "delete": remove a plan with its days, exercise links and workout logs (plan_id)`,
      inputSchema: WorkoutPlansInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: true },
    },
    safeHandler<z.infer<typeof WorkoutPlansInput>>(
      "manage_workout_plans",
      async ({ action, plan_id, plan, preferences }) => {
        const userId = ctx.user.id;

        if (action === "list") {
          const plans = await getUserWorkoutPlans(userId);
          return toolResponse({ plans });
        }

        if (action === "save") {
          if (!plan) return toolResponse({ error: "plan is required for save" }, true);
          const parsed = workoutPlanSchema.safeParse(plan);
          if (!parsed.success) {
            return toolResponse({ error: "Invalid workout plan", details: issueList(parsed.error.issues) }, true);
          }
          const id = await saveWorkoutPlan(userId, parsed.data);
          return toolResponse({ plan_id: id, name: parsed.data.name, days: parsed.data.days.length });
        }

        if (action === "generate") {
          if (!preferences) return toolResponse({ error: "preferences.name is required for generate" }, true);
          const generated = await generator.generateWorkoutPlan(ctx.user, preferences);
          const id = await saveWorkoutPlan(userId, generated);
          return toolResponse({ plan_id: id, plan: generated });
        }

        if (!plan_id) {
          return toolResponse({ error: `plan_id is required for ${action}` }, true);
        }

        if (action === "get") {
          const details = await getWorkoutPlanDetails(userId, plan_id);
          return toolResponse({ plan: details });
        }

        // delete
        const removed = await deleteWorkoutPlan(userId, plan_id);
        return toolResponse({ deleted: plan_id, removed });
      }
    )
  );
}
