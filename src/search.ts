/**
 * Module `src/search.ts`: one full search, from loaded sites to printed report.
 */

import { RunStore } from "./db.js";
import type { FetchLike } from "./http.js";
import { exportCsv, renderSummary, renderTables } from "./output.js";
import { ProgressReporter, type OutputStream } from "./progress.js";
import { runProbing } from "./scheduler.js";
import type { Report, RunConfiguration, SiteDefinition } from "./types.js";

export interface SearchOutputs {
  out: OutputStream;
  csvPath?: string | null;
  csvIncludeAll?: boolean;
  historyDbPath?: string | null;
}

export interface SearchDeps {
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export async function executeSearch(
  config: RunConfiguration,
  sites: readonly SiteDefinition[],
  outputs: SearchOutputs,
  deps: SearchDeps = {}
): Promise<Report> {
  const reporter = new ProgressReporter(outputs.out, {
    username: config.username,
    quiet: config.quiet,
    showNotFound: config.showNotFound,
    showFailed: config.showFailed
  });

  let report: Report;
  try {
    report = await runProbing(config.username, sites, config, {
      signal: deps.signal,
      fetchImpl: deps.fetchImpl,
      onStart: reporter.handleStart,
      onVerdict: reporter.handleVerdict
    });
  } finally {
    reporter.finish();
  }

  if (!config.quiet) {
    outputs.out.write(
      `\n${renderTables(report, { showNotFound: config.showNotFound, showFailed: config.showFailed })}\n\n`
    );
  }
  outputs.out.write(`${renderSummary(report)}\n`);

  if (outputs.csvPath) {
    exportCsv(outputs.csvPath, report, Boolean(outputs.csvIncludeAll));
    console.log(`[search] exported csv=${outputs.csvPath} all=${Boolean(outputs.csvIncludeAll)}`);
  }

  if (outputs.historyDbPath) {
    const store = new RunStore({ dbPath: outputs.historyDbPath });
    try {
      const runId = store.saveReport(report);
      console.log(`[search] saved run=${runId} db=${outputs.historyDbPath}`);
    } finally {
      store.close();
    }
  }

  return report;
}
