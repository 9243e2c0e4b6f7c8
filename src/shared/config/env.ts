import dotenv from "dotenv";
import dotenvSafe from "dotenv-safe";
import { z } from "zod";

// Load environment variables (fallback to plain dotenv if example file missing)
try {
  dotenvSafe.config({ example: ".env.example", allowEmptyValues: true });
} catch (error) {
  // eslint-disable-next-line no-console
  console.warn("dotenv-safe fallback:", (error as Error).message);
  dotenv.config();
}

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),

  // Canonical field; resolved from MONGODB_URI or legacy MONGO_URI
  MONGODB_URI: z.string().min(1, "MONGODB_URI is required"),

  SENTRY_DSN: z.string().optional().or(z.literal("")),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  APP_NAME: z.string().default("SchoolAnnouncements"),

  // CORS -- comma-separated origins
  CORS_ORIGIN: z.string().optional(),
});

export type AppEnv = z.infer<typeof EnvSchema>;

function resolveMongoUri(): string {
  return process.env.MONGODB_URI || process.env.MONGO_URI || "";
}

export const env: AppEnv = EnvSchema.parse({
  NODE_ENV: process.env.NODE_ENV,
  PORT: process.env.PORT,
  MONGODB_URI: resolveMongoUri(),
  SENTRY_DSN: process.env.SENTRY_DSN,
  LOG_LEVEL: process.env.LOG_LEVEL,
  APP_NAME: process.env.APP_NAME,
  CORS_ORIGIN: process.env.CORS_ORIGIN,
});

/** Splits CORS_ORIGIN into a list; `true` reflects the request origin. */
export function corsOrigins(): string[] | true {
  const origins = (env.CORS_ORIGIN ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : true;
}
