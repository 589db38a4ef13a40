import path from "path";
import { z } from "zod";
import type { CollaboratorOperation } from "../domain/types";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const optionalCommand = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const envSchema = z
  .object({
    CLIPFORGE_DB_PATH: z.string().min(1).optional(),
    STORAGE_PATH: z.string().min(1).optional(),
    LOGS_PATH: z.string().min(1).optional(),
    LOG_TO_CONSOLE: z
      .enum(["true", "false"])
      .default("true")
      .transform((value) => value === "true"),
    WORKER_CONCURRENCY: positiveInt(2),
    PIPELINE_BATCH_SIZE: positiveInt(25),
    PIPELINE_POLL_INTERVAL_MS: positiveInt(2000),
    PIPELINE_LEASE_TTL_MS: positiveInt(15 * 60_000),
    PIPELINE_MAX_ATTEMPTS: positiveInt(3),
    PIPELINE_BACKOFF_BASE_MS: positiveInt(2000),
    PIPELINE_BACKOFF_MAX_MS: positiveInt(5 * 60_000),
    PIPELINE_BACKOFF_JITTER_MS: nonNegativeInt(1000),
    COLLABORATOR_TIMEOUT_MS: positiveInt(10 * 60_000),
    CLIPFORGE_DOWNLOAD_CMD: optionalCommand,
    CLIPFORGE_TRANSCRIBE_CMD: optionalCommand,
    CLIPFORGE_DECIDE_CMD: optionalCommand,
    CLIPFORGE_RENDER_CMD: optionalCommand,
    CLIPFORGE_PACKAGE_CMD: optionalCommand
  })
  .refine((env) => env.PIPELINE_LEASE_TTL_MS > env.COLLABORATOR_TIMEOUT_MS, {
    message: "PIPELINE_LEASE_TTL_MS must be longer than COLLABORATOR_TIMEOUT_MS",
    path: ["PIPELINE_LEASE_TTL_MS"]
  })
  .refine((env) => env.PIPELINE_BACKOFF_MAX_MS >= env.PIPELINE_BACKOFF_BASE_MS, {
    message: "PIPELINE_BACKOFF_MAX_MS must be at least PIPELINE_BACKOFF_BASE_MS",
    path: ["PIPELINE_BACKOFF_MAX_MS"]
  });

export interface AppConfig {
  dbPath: string;
  storagePath: string;
  logsPath: string;
  logToConsole: boolean;
  driver: {
    concurrency: number;
    batchSize: number;
    pollIntervalMs: number;
    leaseTtlMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
  };
  collaboratorTimeoutMs: number;
  commands: Record<CollaboratorOperation, string | null>;
}

export class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const values = parsed.data;
  const storagePath = values.STORAGE_PATH ?? path.join(cwd, "storage");

  return {
    dbPath: values.CLIPFORGE_DB_PATH ?? path.join(storagePath, "clipforge.db"),
    storagePath,
    logsPath: values.LOGS_PATH ?? path.join(cwd, "logs"),
    logToConsole: values.LOG_TO_CONSOLE,
    driver: {
      concurrency: values.WORKER_CONCURRENCY,
      batchSize: values.PIPELINE_BATCH_SIZE,
      pollIntervalMs: values.PIPELINE_POLL_INTERVAL_MS,
      leaseTtlMs: values.PIPELINE_LEASE_TTL_MS
    },
    retry: {
      maxAttempts: values.PIPELINE_MAX_ATTEMPTS,
      baseDelayMs: values.PIPELINE_BACKOFF_BASE_MS,
      maxDelayMs: values.PIPELINE_BACKOFF_MAX_MS,
      jitterMs: values.PIPELINE_BACKOFF_JITTER_MS
    },
    collaboratorTimeoutMs: values.COLLABORATOR_TIMEOUT_MS,
    commands: {
      download: values.CLIPFORGE_DOWNLOAD_CMD,
      transcribe: values.CLIPFORGE_TRANSCRIBE_CMD,
      decide: values.CLIPFORGE_DECIDE_CMD,
      render: values.CLIPFORGE_RENDER_CMD,
      package: values.CLIPFORGE_PACKAGE_CMD
    }
  };
}
