/**
 * Module `src/config.ts`: defaults and validation for a probing run.
 */

import path from "node:path";
import { InvalidRunConfigError } from "./errors.js";
import type { RunConfiguration } from "./types.js";

export const DEFAULT_TIMEOUT_SECONDS = 15;
export const DEFAULT_WORKERS = 100;
export const DEFAULT_DATABASE = path.join(__dirname, "..", "data", "sites.json");
export const DEFAULT_HISTORY_DB = "data/history.db";
// Largest delay a Node timer accepts.
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const MAX_WORKERS = 1000;

export interface SearchCliOptions {
  sites?: string[];
  categories?: string[];
  timeout: string;
  workers: string;
  quiet?: boolean;
  notFound?: boolean;
  failed?: boolean;
}

/**
 * Turn parsed search flags into a frozen run configuration.
 */
export function parseRunConfig(username: string | undefined, options: SearchCliOptions): RunConfiguration {
  const config: RunConfiguration = {
    username: (username ?? "").trim(),
    workerLimit: Number(options.workers),
    timeoutMs: Number(options.timeout) * 1000,
    siteFilter: splitList(options.sites),
    categoryFilter: splitList(options.categories),
    quiet: Boolean(options.quiet),
    showNotFound: Boolean(options.notFound),
    showFailed: Boolean(options.failed)
  };
  validateRunConfig(config);
  return Object.freeze(config);
}

export function validateRunConfig(config: RunConfiguration) {
  if (config.username.trim().length === 0) {
    throw new InvalidRunConfigError("Username required for search");
  }
  if (!Number.isInteger(config.workerLimit) || config.workerLimit < 1) {
    throw new InvalidRunConfigError(`workers must be a positive integer (got ${config.workerLimit})`);
  }
  if (config.workerLimit > MAX_WORKERS) {
    throw new InvalidRunConfigError(`workers must be at most ${MAX_WORKERS} (got ${config.workerLimit})`);
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new InvalidRunConfigError(`timeout must be a positive number (got ${config.timeoutMs} ms)`);
  }
  if (config.timeoutMs > MAX_TIMEOUT_MS) {
    throw new InvalidRunConfigError(`timeout must be at most ${MAX_TIMEOUT_MS} ms (got ${config.timeoutMs} ms)`);
  }
}

/**
 * Accept both `-s a b` and `-s a,b`.
 */
function splitList(values: string[] | undefined): string[] {
  if (!values) return [];
  return values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}
