import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { addFoodToInventory, getUserFoods, removeFoodFromInventory } from "../persistence/food-inventory.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const FoodInventoryInput = z.object({
  action: z.enum(["list", "add", "remove"]),
  foods: z.array(z.string().trim().min(1).max(200)).optional(),
});

export function registerFoodInventoryTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "manage_food_inventory",
    {
      description: `${APP_CONTEXT}Foods the user has at home. Diet plan generation prefers these.
Use "list" to read them, "add" / "remove" with foods: ["Chicken breast", "Rice"].`,
      inputSchema: FoodInventoryInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof FoodInventoryInput>>("manage_food_inventory", async ({ action, foods }) => {
      const userId = ctx.user.id;

      if (action === "list") {
        return toolResponse({ foods: await getUserFoods(userId) });
      }

      if (!foods || foods.length === 0) {
        return toolResponse({ error: `foods is required for ${action}` }, true);
      }

      const changed: string[] = [];
      const unchanged: string[] = [];
      for (const food of foods) {
        const ok = action === "add"
          ? await addFoodToInventory(userId, food)
          : await removeFoodFromInventory(userId, food);
        (ok ? changed : unchanged).push(food);
      }

      return action === "add"
        ? toolResponse({ added: changed, already_present: unchanged })
        : toolResponse({ removed: changed, not_found: unchanged });
    })
  );
}
