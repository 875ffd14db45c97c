import { z } from "zod";
import { createLogger } from "../logger";

const log = createLogger("config");

const positiveInt = (fallback: string) => z.string().default(fallback).pipe(z.coerce.number().int().positive());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().default("5000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  EXTRACTION_CACHE_TTL_MINUTES: positiveInt("30"),
  EXTRACTION_CACHE_MAX_ENTRIES: positiveInt("100"),
  MAX_UPLOAD_MB: positiveInt("50"),
  ISOLATION_TMP_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (result.success) {
    log.info("Environment variables validated successfully");
    return result.data;
  }

  log.error("Environment validation failed", { issues: result.error.issues });
  console.error("\nEnvironment Variable Validation Failed:\n");
  result.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
  });
  console.error("\nSee .env.example for reference.\n");
  process.exit(1);
}
