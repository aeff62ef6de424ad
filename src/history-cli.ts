#!/usr/bin/env node
/**
 * Module `src/history-cli.ts`: show runs recorded by `namescout --db`.
 */

import { Command } from "commander";
import { DEFAULT_HISTORY_DB } from "./config.js";
import { RunStore } from "./db.js";
import { formatTable } from "./output.js";

interface HistoryOptions {
  db: string;
  limit: string;
  run?: string;
  username?: string;
  all: boolean;
}

const program = new Command();

program
  .name("namescout-history")
  .description("Show recorded search runs")
  .option("--db <path>", "SQLite history database", DEFAULT_HISTORY_DB)
  .option("--limit <number>", "Number of runs to list", "20")
  .option("--username <name>", "Only runs for this username")
  .option("--run <id>", "Show the verdicts of one run")
  .option("--all", "With --run, include not found and failed verdicts", false);

program.parse(process.argv);

const options = program.opts<HistoryOptions>();
const store = new RunStore({ dbPath: options.db });

try {
  if (options.run !== undefined) {
    const runId = Number(options.run);
    const verdicts = store.getRunVerdicts(runId, options.all ? undefined : "found");
    const rows = verdicts.map((row) => [
      row.siteName,
      row.outcome,
      row.outcome === "failed" ? (row.detail ?? "") : row.url,
      ...(row.outcome === "found" ? [`${row.confidence}%`] : [])
    ]);
    console.log(formatTable(`Run ${runId}: ${verdicts.length} verdicts`, rows));
  } else {
    const runs = store.listRuns(Number(options.limit), options.username);
    const rows = runs.map((run) => [
      String(run.id),
      run.username,
      new Date(run.startedAt).toISOString(),
      `found=${run.foundCount}`,
      `not_found=${run.notFoundCount}`,
      `failed=${run.failedCount}${run.cancelled ? " cancelled" : ""}`
    ]);
    console.log(formatTable(`Runs (${runs.length})`, rows));
  }
} finally {
  store.close();
}
