import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RequestContext } from "../context/request-context.js";
import { getAccountSummary, getUserExport } from "../persistence/export.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const ExportInput = z.object({
  action: z.enum(["json", "summary"]),
});

export function registerExportTool(server: McpServer, ctx: RequestContext) {
  server.registerTool(
    "export_data",
    {
      description: `${APP_CONTEXT}Export the user's data, or count what is stored.

- "json": profile, workout plans, diet plans, food inventory, body metrics, workout and meal logs
- "summary": account creation date and counts of workout plans, diet plans and food items`,
      inputSchema: ExportInput.shape,
      annotations: { readOnlyHint: true },
    },
    safeHandler<z.infer<typeof ExportInput>>("export_data", async ({ action }) => {
      const userId = ctx.user.id;

      if (action === "summary") {
        return toolResponse({ account: await getAccountSummary(userId) });
      }

      return toolResponse({ export: await getUserExport(userId) });
    })
  );
}
