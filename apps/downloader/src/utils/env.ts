import { z } from "zod";
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BACKOFF_MS,
} from "@tsgrab/streaming";

const envSchema = z.object({
  // Download pipeline
  TSGRAB_WORKERS: z.coerce.number().int().min(1).default(4),
  TSGRAB_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_RETRY_ATTEMPTS),
  TSGRAB_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_BACKOFF_MS),
  TSGRAB_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;
