import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
  SCHEMA_PATH: z.string().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
});

export function buildConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${errors.join(", ")}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV || "development",
    databaseUrl: e.DATABASE_URL,
    sessionTtlMs: e.SESSION_TTL_HOURS * 60 * 60 * 1000,
    schemaPath: e.SCHEMA_PATH,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(",").map(s => s.trim()).filter(Boolean)
      : null,
    gemini: {
      apiKey: e.GEMINI_API_KEY || null,
      model: e.GEMINI_MODEL,
    },
  };
}

const config = buildConfig(process.env);

export default config;
