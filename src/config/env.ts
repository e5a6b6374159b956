import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { formatZodIssues } from "../utils/validation.ts";

/**
 * Settings read from environment variables
 */
export interface AppConfig {
  backend: "mongodb" | "memory";
  mongo: { uri: string; dbName: string };
  cache: { ttlMs: number; maxSize: number; sweepIntervalMs: number };
  port: number;
}

export type ConfigError = { type: "config"; message: string; issues: string[] };

const envSchema = z
  .object({
    STORE_BACKEND: z.enum(["mongodb", "memory"]).default("mongodb"),
    MONGODB_URI: z.string().default(""),
    MONGODB_DB_NAME: z.string().default(""),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
    CACHE_MAX_SIZE: z.coerce.number().int().positive().default(10000),
    CACHE_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
    PORT: z.coerce.number().int().min(1).max(65535).default(8088),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_BACKEND !== "mongodb") {
      return;
    }
    if (!env.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MONGODB_URI"],
        message: "Required when STORE_BACKEND is mongodb",
      });
    }
    if (!env.MONGODB_DB_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MONGODB_DB_NAME"],
        message: "Required when STORE_BACKEND is mongodb",
      });
    }
  });

/**
 * Load configuration from environment variables
 * Empty variables count as unset
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, ConfigError> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    return err({
      type: "config",
      message: "Invalid environment configuration",
      issues: formatZodIssues(parsed.error),
    });
  }

  const values = parsed.data;
  return ok({
    backend: values.STORE_BACKEND,
    mongo: { uri: values.MONGODB_URI, dbName: values.MONGODB_DB_NAME },
    cache: {
      ttlMs: values.CACHE_TTL_SECONDS * 1000,
      maxSize: values.CACHE_MAX_SIZE,
      sweepIntervalMs: values.CACHE_SWEEP_INTERVAL_SECONDS * 1000,
    },
    port: values.PORT,
  });
}
