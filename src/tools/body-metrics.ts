import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { addProgressEntry, getBodyMetrics } from "../persistence/progress.js";
import { calculateBmi } from "../helpers/body-metrics.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const BodyMetricsInput = z.object({
  action: z.enum(["log", "history"]),
  weight_kg: z.number().positive().max(500).optional(),
  height_cm: z.number().positive().max(300).optional(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD").optional(),
});

export function registerBodyMetricsTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "manage_body_metrics",
    {
      description: `${APP_CONTEXT}Weight and height measurements over time.
- "log": record a measurement (weight_kg; height_cm defaults to the profile height; date defaults to today)
- "history": all measurements, oldest first, each with its BMI`,
      inputSchema: BodyMetricsInput.shape,
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler<z.infer<typeof BodyMetricsInput>>(
      "manage_body_metrics",
      async ({ action, weight_kg, height_cm, date }) => {
        const userId = ctx.user.id;

        if (action === "history") {
          const entries = await getBodyMetrics(userId);
          return toolResponse({
            entries: entries.map((e) => ({ ...e, bmi: calculateBmi(e.weight_kg, e.height_cm) })),
          });
        }

        const height = height_cm ?? ctx.user.height_cm;
        if (!weight_kg || !height) {
          return toolResponse({ error: "weight_kg and height_cm are required (no height on profile)" }, true);
        }
        const entry = await addProgressEntry(userId, weight_kg, height, date);
        return toolResponse({ entry: { ...entry, bmi: calculateBmi(entry.weight_kg, entry.height_cm) } });
      }
    )
  );
}
