import "dotenv/config";
import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const EnvSchema = z.object({
  EDGES_PARQUET_URL: z.string().trim().min(1, "must be a path or URL"),
  IDMAP_PARQUET_URL: z.string().trim().min(1, "must be a path or URL"),
  EDGES_REMOTE_SCAN: flag,
  IDMAP_REMOTE_SCAN: flag,

  PPI_CACHE_DIR: z.string().trim().min(1).optional(),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),

  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export class EnvValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvValidationError";
    Object.setPrototypeOf(this, EnvValidationError.prototype);
  }
}

/** Validate an environment map; throws EnvValidationError listing every bad variable. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((e) => `${e.path.length ? e.path.join(".") : "value"}: ${e.message}`)
      .join("; ");
    throw new EnvValidationError(`Invalid environment: ${errorMessages}`);
  }
  return parsed.data;
}

export function loadEnv(): Env {
  return parseEnv(process.env);
}
