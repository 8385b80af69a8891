import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { getUser, updateUserProfile } from "../persistence/users.js";
import { toolResponse, safeHandler, issueList, APP_CONTEXT } from "../helpers/tool-response.js";
import { profileSchema, normalizeProfileData } from "../helpers/profile-helpers.js";
import { bmiCategory, calculateBmi } from "../helpers/body-metrics.js";
import { NotFoundError } from "../helpers/errors.js";

const ProfileInput = z.object({
  action: z.enum(["get", "update"]),
  data: z.record(z.unknown()).optional(),
});

export function registerProfileTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "manage_profile",
    {
      description: `${APP_CONTEXT}Read or update the user's profile.
Use action "get" to retrieve the profile (call this at conversation start for context).
Use action "update" with only the fields that change; an explicit null clears a field.

Fields (always use these exact keys):
- first_name, last_name: string
- age: number (13-120)
- gender: string
- height_cm, weight_kg: number
- activity_level: "Sedentary" | "Lightly Active" | "Moderately Active" | "Very Active" | "Extremely Active"
- experience_level: "Beginner" | "Intermediate" | "Advanced"
- fitness_goals: string, e.g. "Lose weight, build muscle"
- injuries: string, e.g. "left shoulder"; "none" clears it

Example: user says "I weigh 82kg now" → update with { "weight_kg": 82 }`,
      inputSchema: ProfileInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof ProfileInput>>("manage_profile", async ({ action, data }) => {
      const userId = ctx.user.id;

      if (action === "get") {
        const user = await getUser(userId);
        if (!user) {
          throw new NotFoundError(`User ${userId} not found`);
        }
        const bmi = calculateBmi(user.weight_kg, user.height_cm);
        return toolResponse({
          profile: user,
          bmi,
          bmi_category: bmi === null ? null : bmiCategory(bmi),
        });
      }

      // update
      if (!data || Object.keys(data).length === 0) {
        return toolResponse({ error: "No data provided" }, true);
      }

      const parsed = profileSchema.safeParse(normalizeProfileData(data));
      if (!parsed.success) {
        return toolResponse({ error: "Invalid profile data", details: issueList(parsed.error.issues) }, true);
      }

      await updateUserProfile(userId, parsed.data);
      const updated = await getUser(userId);
      return toolResponse({ profile: updated });
    })
  );
}
