import { z } from "zod";
import { ConfigError } from "../utils/errors";
import { LOG_LEVELS } from "../utils/logger";

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const parseOrigins = (raw?: string): string[] =>
  (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: intFromEnv(8080, 1),
    PLATFORM: z.string().default(""),
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().url().optional(),
    JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
    POLKA_KEY: z.string().min(1, "POLKA_KEY is required"),
    FRONTEND_URL: z.string().optional(),
    CORS_ORIGINS: z.string().optional(),
    RATE_LIMIT_WINDOW_MS: intFromEnv(WINDOW_MS, 60000),
    RATE_LIMIT_LOGIN_MAX: intFromEnv(100, 1),
    RATE_LIMIT_REFRESH_MAX: intFromEnv(10000, 1),
    // the logger reads this itself at import; only validated here
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORAGE_DRIVER=postgres",
      });
    }
  });

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  isProduction: boolean;
  port: number;
  platform: string;
  storage: { driver: "memory" } | { driver: "postgres"; databaseUrl: string };
  /** Signing secret for access tokens. Never log. */
  jwtSecret: string;
  /** Shared key for the subscription webhook. Never log. */
  polkaKey: string;
  corsOrigins: string[];
  rateLimit: { windowMs: number; loginMax: number; refreshMax: number };
}

/**
 * Validates `env` and builds the application config.
 *
 * Issues name the offending key only; values are never echoed because two of
 * them are secrets.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  const storage: AppConfig["storage"] =
    e.STORAGE_DRIVER === "postgres" && e.DATABASE_URL
      ? { driver: "postgres", databaseUrl: e.DATABASE_URL }
      : { driver: "memory" };

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    isProduction: e.NODE_ENV === "production",
    port: e.PORT,
    platform: e.PLATFORM,
    storage,
    jwtSecret: e.JWT_SECRET,
    polkaKey: e.POLKA_KEY,
    corsOrigins: Array.from(
      new Set([e.FRONTEND_URL, ...parseOrigins(e.CORS_ORIGINS)].filter((o): o is string => !!o))
    ),
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      loginMax: e.RATE_LIMIT_LOGIN_MAX,
      refreshMax: e.RATE_LIMIT_REFRESH_MAX,
    },
  });
};
