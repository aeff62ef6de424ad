/**
 * Module `src/aggregator.ts`: owns the report while a run is in progress.
 */

import { DuplicateVerdictError, UnselectedSiteError } from "./errors.js";
import type { OutcomeCounts, Report, SiteDefinition, Verdict } from "./types.js";

export function emptyCounts(): OutcomeCounts {
  return { "found": 0, "not-found": 0, "failed": 0 };
}

export class ResultAggregator {
  private readonly order: Map<string, number>;
  private readonly verdicts = new Map<string, Verdict>();
  private readonly counts = emptyCounts();

  constructor(private readonly sites: readonly SiteDefinition[]) {
    this.order = new Map(sites.map((site, index) => [site.name, index]));
  }

  get size() {
    return this.verdicts.size;
  }

  snapshotCounts(): OutcomeCounts {
    return { ...this.counts };
  }

  /**
   * Record a verdict. Each selected site takes exactly one.
   */
  accept(verdict: Verdict) {
    const name = verdict.site.name;
    if (!this.order.has(name)) {
      throw new UnselectedSiteError(name);
    }
    if (this.verdicts.has(name)) {
      throw new DuplicateVerdictError(name);
    }
    this.verdicts.set(name, verdict);
    this.counts[verdict.outcome] += 1;
  }

  pendingSites(): SiteDefinition[] {
    return this.sites.filter((site) => !this.verdicts.has(site.name));
  }

  /**
   * Build the report in site-definition order. Every selected site must have
   * a verdict by now.
   */
  finalize(meta: {
    username: string;
    cancelled: boolean;
    warnings: string[];
    startedAt: number;
    finishedAt: number;
  }): Report {
    const missing = this.pendingSites();
    if (missing.length > 0) {
      throw new Error(`report incomplete: ${missing.length} sites without a verdict`);
    }

    const verdicts = this.sites.map((site) => this.verdicts.get(site.name)).filter(isVerdict);
    const foundByCategory: Record<string, number> = {};
    for (const verdict of verdicts) {
      if (verdict.outcome !== "found") continue;
      for (const category of verdict.site.categories) {
        foundByCategory[category] = (foundByCategory[category] ?? 0) + 1;
      }
    }

    return {
      username: meta.username,
      verdicts,
      counts: this.snapshotCounts(),
      foundByCategory,
      cancelled: meta.cancelled,
      warnings: meta.warnings.slice(),
      startedAt: meta.startedAt,
      finishedAt: meta.finishedAt,
      elapsedMs: meta.finishedAt - meta.startedAt
    };
  }
}

function isVerdict(value: Verdict | undefined): value is Verdict {
  return value !== undefined;
}
