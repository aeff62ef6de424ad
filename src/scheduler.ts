/**
 * Module `src/scheduler.ts`: fan probes out over a bounded worker pool.
 */

import { ResultAggregator } from "./aggregator.js";
import { validateRunConfig } from "./config.js";
import { isInternalFault, NoSitesSelectedError } from "./errors.js";
import type { FetchLike } from "./http.js";
import { probeSite } from "./probe-worker.js";
import { buildProbeTask, selectSites } from "./sites.js";
import type { Report, RunConfiguration, RunProgress, SiteDefinition, Verdict } from "./types.js";

export interface RunStart {
  total: number;
  workerCount: number;
  warnings: string[];
}

export interface RunHooks {
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  onStart?: (start: RunStart) => void;
  onVerdict?: (verdict: Verdict, progress: RunProgress) => void;
}

export type RunSettings = Omit<RunConfiguration, "username">;

/**
 * Probe `username` on every selected site and return the finished report.
 * Throws only when the run cannot begin; probe failures become verdicts.
 */
export async function runProbing(
  username: string,
  sites: readonly SiteDefinition[],
  config: RunSettings,
  hooks: RunHooks = {}
): Promise<Report> {
  validateRunConfig({ ...config, username });
  const selection = selectSites(sites, config.siteFilter, config.categoryFilter);
  if (selection.sites.length === 0) {
    const filters = [...config.siteFilter, ...config.categoryFilter];
    throw new NoSitesSelectedError(
      filters.length > 0
        ? `No matching sites found for: ${filters.join(", ")}`
        : "Site database is empty"
    );
  }

  const startedAt = Date.now();
  const aggregator = new ResultAggregator(selection.sites);
  const total = selection.sites.length;
  const workerCount = Math.min(config.workerLimit, total);
  hooks.onStart?.({ total, workerCount, warnings: selection.warnings });

  const record = (verdict: Verdict) => {
    try {
      aggregator.accept(verdict);
    } catch (error) {
      if (isInternalFault(error)) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[scheduler] internal fault: ${message}`);
      }
      throw error;
    }
    hooks.onVerdict?.(verdict, {
      checked: aggregator.size,
      total,
      counts: aggregator.snapshotCounts()
    });
  };

  await mapWithConcurrency(selection.sites, workerCount, hooks.signal, async (site) => {
    const task = buildProbeTask(site, username);
    const verdict = await probeSite(task, {
      timeoutMs: config.timeoutMs,
      signal: hooks.signal,
      fetchImpl: hooks.fetchImpl
    });
    record(verdict);
  });

  for (const site of aggregator.pendingSites()) {
    record(cancelledVerdict(site, username));
  }

  return aggregator.finalize({
    username,
    cancelled: hooks.signal?.aborted ?? false,
    warnings: selection.warnings,
    startedAt,
    finishedAt: Date.now()
  });
}

/**
 * Run `mapper` over `items` with at most `concurrency` calls pending. Items
 * start in order; a cancelled signal stops further admissions.
 */
export async function mapWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  signal: AbortSignal | undefined,
  mapper: (item: T) => Promise<void>
) {
  if (items.length === 0) return;
  const limit = Math.max(1, concurrency);
  let index = 0;

  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (true) {
      if (signal?.aborted) return;
      const current = index;
      index += 1;
      if (current >= items.length) return;
      await mapper(items[current]);
    }
  });

  await Promise.all(workers);
}

function cancelledVerdict(site: SiteDefinition, username: string): Verdict {
  const task = buildProbeTask(site, username);
  return Object.freeze({
    site,
    outcome: "failed",
    detail: "cancelled",
    status: 0,
    confidence: 0,
    url: task.profileUrl,
    elapsedMs: 0
  });
}
