import express from "express";
import cors from "cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import config from "./src/config.js";
import { runMigrations } from "./src/db/run-migrations.js";
import pool from "./src/db/connection.js";
import { createAuthRouter } from "./src/auth/auth-routes.js";
import { authenticateRequest } from "./src/auth/middleware.js";
import { AuthError } from "./src/helpers/errors.js";
import { GeminiPlanGenerator } from "./src/ai/gemini-generator.js";
import type { PlanGenerator } from "./src/ai/plan-generator.js";
import type { RequestContext } from "./src/context/request-context.js";
import { registerTools } from "./src/tools/register-tools.js";

function getAllowedOrigins(): string[] {
  if (config.allowedOrigins) {
    return config.allowedOrigins;
  }
  if (config.nodeEnv === "development") {
    return ["http://localhost:3000", "http://localhost:3001", "http://localhost:5173", "http://localhost:8080"];
  }
  return [];
}

const generator: PlanGenerator = new GeminiPlanGenerator(config.gemini);

const app = express();
app.set("trust proxy", 1);
app.use(cors({
  origin: getAllowedOrigins(),
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization"],
}));
app.use(express.json({ limit: "1mb" }));

app.get("/health", (_req, res) => {
  res.json({ status: "ok", plan_generation: generator.isAvailable() });
});

app.use(createAuthRouter());

// New McpServer per request, bound to that request's identity.
function createConfiguredServer(ctx: RequestContext): McpServer {
  const server = new McpServer(
    { name: "fittrack", version: "1.0.0" },
    {
      instructions: `You are a fitness coach working from the user's own data.
Call manage_profile (action "get") before answering the first message of a conversation.
Use manage_workout_plans and manage_diet_plans to read, save or generate plans, log_workout and log_meal to record what the user did, manage_body_metrics for weight, and get_progress for summaries.`,
    }
  );

  registerTools(server, ctx, generator);
  return server;
}

app.all("/mcp", async (req, res) => {
  try {
    const ctx = await authenticateRequest(req.headers.authorization);
    const server = createConfiguredServer(ctx);

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      transport.close().catch((err) => console.error("[mcp] Transport close failed:", err));
      server.close().catch((err) => console.error("[mcp] Server close failed:", err));
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  } catch (err) {
    if (err instanceof AuthError) {
      res.setHeader("WWW-Authenticate", 'Bearer realm="fittrack"');
      res.status(401).json({
        error: "unauthorized",
        message: err.message,
      });
      return;
    }
    console.error("[mcp] Endpoint error:", err instanceof Error ? err.stack : err);
    if (!res.headersSent) {
      res.status(500).json({ error: "internal_error", message: "An unexpected error occurred" });
    }
  }
});

async function start() {
  try {
    await runMigrations();
    const server = app.listen(config.port, () => {
      console.log(`FitTrack server running on port ${config.port}`);
    });

    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      server.close(async () => {
        console.log("HTTP server closed.");
        try {
          await pool.end();
          console.log("Database pool closed.");
          process.exit(0);
        } catch (err) {
          console.error("Error closing database pool:", err);
          process.exit(1);
        }
      });

      setTimeout(() => {
        console.error("Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (err) {
    console.error("Failed to start:", err);
    process.exit(1);
  }
}

void start();
