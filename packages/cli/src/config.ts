/**
 * @ledgerbook/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Relative journal and backup paths resolve against the data directory.
 */

import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LEDGERBOOK_DATA_DIR: z.string().min(1).default("./data"),
  LEDGERBOOK_JOURNAL_FILE: z.string().min(1).default("journal.jsonl"),
  LEDGERBOOK_BACKUP_DIR: z.string().min(1).default("backups"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  /** Recorded as the actor of every journaled event */
  LEDGERBOOK_ACTOR: z.string().min(1).default("ledgerbook-cli"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Paths
// =============================================================================

export interface StoragePaths {
  readonly dataDir: string;
  readonly journalFile: string;
  readonly backupDir: string;
}

function within(dataDir: string, path: string): string {
  return isAbsolute(path) ? path : join(dataDir, path);
}

export function storagePaths(config: AppConfig, cwd: string = process.cwd()): StoragePaths {
  const dataDir = resolve(cwd, config.LEDGERBOOK_DATA_DIR);
  return {
    dataDir,
    journalFile: within(dataDir, config.LEDGERBOOK_JOURNAL_FILE),
    backupDir: within(dataDir, config.LEDGERBOOK_BACKUP_DIR),
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
