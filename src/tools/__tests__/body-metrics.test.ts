import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockQuery } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
}));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery, connect: vi.fn() },
}));

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerBodyMetricsTool } from "../body-metrics.js";
import type { ToolResult } from "../../helpers/tool-response.js";
import type { RequestContext } from "../../context/request-context.js";

type Handler = (params: Record<string, unknown>) => Promise<ToolResult>;

let toolHandler: Handler;

function register(user: Record<string, unknown>) {
  const server = {
    registerTool: vi.fn((_name: string, _config: unknown, handler: Handler) => {
      toolHandler = handler;
    }),
  } as unknown as McpServer;
  registerBodyMetricsTool(server, { user, token: "tok-1" } as unknown as RequestContext);
}

describe("manage_body_metrics tool", () => {
  beforeEach(() => {
    mockQuery.mockReset();
  });

  it("logs a weight with the profile height", async () => {
    register({ id: 5, height_cm: 175 });
    mockQuery.mockResolvedValueOnce({ rows: [{ id: 1, height_cm: 175, weight_kg: 70, date: "2026-03-10" }] });

    const result = await toolHandler({ action: "log", weight_kg: 70 });

    expect(JSON.parse(result.content[0].text)).toEqual({
      entry: { id: 1, height_cm: 175, weight_kg: 70, date: "2026-03-10", bmi: 22.9 },
    });
    expect(mockQuery.mock.calls[0][1]).toEqual([5, 70, 175, null]);
  });

  it("asks for a height when the profile has none", async () => {
    register({ id: 5, height_cm: null });

    const result = await toolHandler({ action: "log", weight_kg: 70 });

    expect(result.isError).toBe(true);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it("adds BMI to each history entry", async () => {
    register({ id: 5, height_cm: 175 });
    mockQuery.mockResolvedValueOnce({
      rows: [{ id: 1, height_cm: 175, weight_kg: 70, date: "2026-03-01" }],
    });

    const data = JSON.parse((await toolHandler({ action: "history" })).content[0].text);
    expect(data.entries[0].bmi).toBe(22.9);
  });
});
