import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

const ConfigSchema = z.object({
  DATABASE_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  CAPTURE_TIMEOUT_MS: positiveInt("CAPTURE_TIMEOUT_MS").optional(),
  CAPTURE_RETRIES: z.coerce
    .number()
    .int("CAPTURE_RETRIES must be an integer")
    .min(0, "CAPTURE_RETRIES cannot be negative")
    .max(5, "CAPTURE_RETRIES cannot exceed 5")
    .optional(),
  CAPTURE_BACKOFF_MS: positiveInt("CAPTURE_BACKOFF_MS").optional(),
  OPERATION_TIMEOUT_MS: positiveInt("OPERATION_TIMEOUT_MS").optional(),
  LINK_LIMIT: positiveInt("LINK_LIMIT").optional(),
  MAX_RESPONSE_CHARS: positiveInt("MAX_RESPONSE_CHARS").optional(),
});

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export type AppConfig = {
  databasePath: string;
  logLevel: LogLevel;
  captureTimeoutMs: number;
  captureRetries: number;
  captureBackoffMs: number;
  operationTimeoutMs: number;
  linkLimit: number;
  maxResponseChars: number;
};

export const DEFAULT_DATABASE_PATH = path.join("memory-bank", "context.db");

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((err: z.ZodIssue) => `${err.path.join(".")}: ${err.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${formatted}`);
  }

  const values = parsed.data;
  return {
    databasePath: path.resolve(values.DATABASE_PATH ?? DEFAULT_DATABASE_PATH),
    logLevel: values.LOG_LEVEL ?? "info",
    captureTimeoutMs: values.CAPTURE_TIMEOUT_MS ?? 5000,
    captureRetries: values.CAPTURE_RETRIES ?? 2,
    captureBackoffMs: values.CAPTURE_BACKOFF_MS ?? 250,
    operationTimeoutMs: values.OPERATION_TIMEOUT_MS ?? 30000,
    linkLimit: values.LINK_LIMIT ?? 5,
    maxResponseChars: values.MAX_RESPONSE_CHARS ?? 10000,
  };
}
