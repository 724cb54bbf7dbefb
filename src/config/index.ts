import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5050),
  API_PREFIX: z
    .string()
    .default("/api")
    .refine((p) => p === "" || (p.startsWith("/") && !p.endsWith("/")), "API_PREFIX must start with / and not end with /"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  CORS_ENABLED: booleanFlag.default("true"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  // 0 turns the limiter off
  RATE_LIMIT_MAX: z.coerce.number().int().nonnegative().default(200),
  ADMIN_JWT_SECRET: z
    .string()
    .optional()
    .transform((s) => (s ? s : undefined)),
  BANNER_SEED_FILE: z.string().default("data/banners.json"),
  SLOW_REQUEST_MS: z.coerce.number().int().positive().default(5000),
});

export type AppConfig = {
  env: "development" | "production" | "test";
  port: number;
  apiPrefix: string;
  logLevel: string;
  corsEnabled: boolean;
  rateLimit: { windowMs: number; max: number };
  adminJwtSecret?: string;
  // empty string: start with an empty catalog
  bannerSeedFile: string;
  slowRequestMs: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    apiPrefix: e.API_PREFIX,
    logLevel: e.LOG_LEVEL,
    corsEnabled: e.CORS_ENABLED,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    adminJwtSecret: e.ADMIN_JWT_SECRET,
    bannerSeedFile: e.BANNER_SEED_FILE,
    slowRequestMs: e.SLOW_REQUEST_MS,
  };
}
