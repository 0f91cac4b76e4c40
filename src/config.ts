import path from "node:path";
import { z } from "zod";
import type { RetryPolicy } from "./domain/sync/coordinatorMachine";
import {
  DB_FILE_NAME,
  DEFAULT_AUTO_LOCK_MS,
  DEFAULT_KDF_ITERATIONS,
  DEFAULT_RETRY_BASE_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_MAX_MS,
  MIN_KDF_ITERATIONS,
  PARAMS_DIR_NAME,
} from "./utils/constants";

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return fallback;
      const value = Number(raw);
      if (!Number.isInteger(value) || value < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be an integer >= ${min}, got "${raw}"`,
        });
        return z.NEVER;
      }
      return value;
    });

const envSchema = z.object({
  VAULTSYNC_DATA_DIR: z.string().optional(),
  VAULTSYNC_KDF_ITERATIONS: intFromEnv(DEFAULT_KDF_ITERATIONS, MIN_KDF_ITERATIONS),
  VAULTSYNC_AUTO_LOCK_MS: intFromEnv(DEFAULT_AUTO_LOCK_MS, 0),
  VAULTSYNC_RETRY_BASE_MS: intFromEnv(DEFAULT_RETRY_BASE_MS, 1),
  VAULTSYNC_RETRY_MAX_MS: intFromEnv(DEFAULT_RETRY_MAX_MS, 1),
  VAULTSYNC_RETRY_MAX_ATTEMPTS: intFromEnv(DEFAULT_RETRY_MAX_ATTEMPTS, 1),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
});

export interface RemoteConfig {
  url: string;
  anonKey: string;
}

export interface AppConfig {
  dataDir: string;
  dbPath: string;
  paramsDir: string;
  kdfIterations: number;
  /** 0 disables auto-lock. */
  autoLockMs: number;
  retry: RetryPolicy;
  /** null when remote sync is not configured. */
  remote: RemoteConfig | null;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const data = parsed.data;

  if (Boolean(data.SUPABASE_URL) !== Boolean(data.SUPABASE_ANON_KEY)) {
    throw new Error(
      "Invalid configuration: SUPABASE_URL and SUPABASE_ANON_KEY must be set together",
    );
  }
  if (data.VAULTSYNC_RETRY_MAX_MS < data.VAULTSYNC_RETRY_BASE_MS) {
    throw new Error(
      "Invalid configuration: VAULTSYNC_RETRY_MAX_MS is below VAULTSYNC_RETRY_BASE_MS",
    );
  }

  const dataDir = path.resolve(data.VAULTSYNC_DATA_DIR ?? "data");
  return {
    dataDir,
    dbPath: path.join(dataDir, DB_FILE_NAME),
    paramsDir: path.join(dataDir, PARAMS_DIR_NAME),
    kdfIterations: data.VAULTSYNC_KDF_ITERATIONS,
    autoLockMs: data.VAULTSYNC_AUTO_LOCK_MS,
    retry: {
      baseMs: data.VAULTSYNC_RETRY_BASE_MS,
      maxMs: data.VAULTSYNC_RETRY_MAX_MS,
      maxAttempts: data.VAULTSYNC_RETRY_MAX_ATTEMPTS,
    },
    remote:
      data.SUPABASE_URL && data.SUPABASE_ANON_KEY
        ? { url: data.SUPABASE_URL, anonKey: data.SUPABASE_ANON_KEY }
        : null,
  };
}
