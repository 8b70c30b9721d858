import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// z.coerce.boolean() turns "false" into true, so flags are parsed explicitly.
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3001),
  LOG_LEVEL: z.string().default("info"),
  ADMIN_TOKEN: z.string().min(1).default("change-me"),
  WINDOW_STORE: z.enum(["memory", "redis"]).default("memory"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  ENABLE_PG: booleanFlag,
  DATABASE_URL: z.string().optional(),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(50),
  STORE_FAILURE_POLICY: z.enum(["fail_open", "fail_closed"]).default("fail_open"),
  IP_LIMIT_PER_WINDOW: z.coerce.number().int().positive().default(100),
  RATE_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  WINDOW_GRACE_SECONDS: z.coerce.number().int().nonnegative().default(30),
  COMPACTION_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),
  VIOLATION_RETENTION_DAYS: z.coerce.number().int().nonnegative().default(0),
  PLAN_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(10_000),
  LIMITS_CONFIG_PATH: z.string().optional(),
  UPGRADE_URL: z.string().default("/pricing"),
  OTEL_SERVICE_NAME: z.string().default("tollgate-api"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().optional()
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`);
  }

  if (parsed.data.ENABLE_PG && !parsed.data.DATABASE_URL) {
    throw new ConfigurationError("ENABLE_PG is set but DATABASE_URL is missing");
  }

  return parsed.data;
}
