/**
 * Environment configuration, validated with zod on first read and cached.
 * The CLI loads `.env` through dotenv before anything reads it.
 */
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  PROJECTIONS_DATA_DIR: z.string().min(1).default("data"),
  PROJECTIONS_CACHE_DIR: z.string().min(1).default("data/raw"),
  PROJECTIONS_OUTPUT_DIR: z.string().min(1).default("data/outputs"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (_env) return _env;
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join(".")}: ${err.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  _env = result.data;
  return _env;
}

// Tests change process.env between cases
export function resetEnv(): void {
  _env = null;
}
