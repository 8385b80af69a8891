import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import type { PlanGenerator } from "../ai/plan-generator.js";
import {
  deleteDietPlan,
  getDietPlanDetails,
  getUserDietPlans,
  saveDietPlan,
  setShoppingItemPurchased,
} from "../persistence/diet-plans.js";
import { getUserFoods } from "../persistence/food-inventory.js";
import { dietPlanSchema } from "../helpers/plan-schemas.js";
import { toolResponse, safeHandler, issueList, APP_CONTEXT } from "../helpers/tool-response.js";

const DietPlansInput = z.object({
  action: z.enum(["list", "get", "save", "generate", "delete", "mark_purchased"]),
  plan_id: z.number().int().positive().optional(),
  item_id: z.number().int().positive().optional(),
  purchased: z.boolean().optional(),
  plan: z.record(z.unknown()).optional(),
  goals: z
    .object({
      name: z.string().trim().min(1).max(200),
      calorie_target: z.number().int().positive().optional(),
      protein_target: z.number().int().positive().optional(),
      carb_target: z.number().int().positive().optional(),
      fat_target: z.number().int().positive().optional(),
      restrictions: z.string().optional(),
      meals_per_day: z.number().int().min(1).max(8).optional(),
      snacks_per_day: z.number().int().min(0).max(8).optional(),
    })
    .optional(),
});

export function registerDietPlansTool(server: McpServer, ctx: RequestContext, generator: PlanGenerator) {
  server.registerTool(
    "manage_diet_plans",
    {
      description: `${APP_CONTEXT}Manage the user's diet plans and their shopping lists.
Actions:
- "list": all plans, newest first
- "get": one plan with its meals and shopping list (plan_id)
- "save": store a plan (plan: { name, calorie_target?, protein_target_g?, carb_target_g?, fat_target_g?, dietary_restrictions?, meals: [{ day_number, meal_type, recipe_name?, ingredients?, calories_per_serving?, protein_g?, carbs_g?, fat_g?, servings? }], shopping_list: [{ item_name, quantity?, unit?, category? }] })
- "generate": create a 7-day plan from the profile and the food inventory (goals: { name, calorie_target?, protein_target?, carb_target?, fat_target?, restrictions?, meals_per_day?, snacks_per_day? })
- "delete": remove a plan with its meals and shopping list; meal logs are kept (plan_id)
- "mark_purchased": tick a shopping list item (item_id, purchased defaults to true)`,
      inputSchema: DietPlansInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: true },
    },
    safeHandler<z.infer<typeof DietPlansInput>>(
      "manage_diet_plans",
      async ({ action, plan_id, item_id, purchased, plan, goals }) => {
        const userId = ctx.user.id;

        if (action === "list") {
          const plans = await getUserDietPlans(userId);
          return toolResponse({ plans });
        }

        if (action === "save") {
          if (!plan) return toolResponse({ error: "plan is required for save" }, true);
          const parsed = dietPlanSchema.safeParse(plan);
          if (!parsed.success) {
            return toolResponse({ error: "Invalid diet plan", details: issueList(parsed.error.issues) }, true);
          }
          const id = await saveDietPlan(userId, parsed.data);
          return toolResponse({ plan_id: id, name: parsed.data.name, meals: parsed.data.meals.length });
        }

        if (action === "generate") {
          if (!goals) return toolResponse({ error: "goals.name is required for generate" }, true);
          const foods = await getUserFoods(userId);
          const generated = await generator.generateDietPlan(ctx.user, foods, goals);
          const id = await saveDietPlan(userId, generated);
          return toolResponse({ plan_id: id, plan: generated });
        }

        if (action === "mark_purchased") {
          if (!item_id) return toolResponse({ error: "item_id is required for mark_purchased" }, true);
          const item = await setShoppingItemPurchased(userId, item_id, purchased ?? true);
          return toolResponse({ item });
        }

        if (!plan_id) {
          return toolResponse({ error: `plan_id is required for ${action}` }, true);
        }

        if (action === "get") {
          const details = await getDietPlanDetails(userId, plan_id);
          return toolResponse({ plan: details });
        }

        // delete
        const removed = await deleteDietPlan(userId, plan_id);
        return toolResponse({ deleted: plan_id, removed });
      }
    )
  );
}
