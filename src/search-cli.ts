#!/usr/bin/env node
/**
 * Module `src/search-cli.ts`: search one username across the site database.
 */

import { Command } from "commander";
import { DEFAULT_DATABASE, DEFAULT_TIMEOUT_SECONDS, DEFAULT_WORKERS, parseRunConfig } from "./config.js";
import { InvalidRunConfigError, NoSitesSelectedError, SiteDatabaseError } from "./errors.js";
import { executeSearch } from "./search.js";
import { loadSiteDatabase } from "./site-database.js";

interface SearchOptions {
  sites?: string[];
  categories?: string[];
  timeout: string;
  workers: string;
  database: string;
  output?: string;
  outputAll: boolean;
  notFound: boolean;
  failed: boolean;
  quiet: boolean;
  db?: string;
}

const program = new Command();

program
  .name("namescout")
  .description("Fast, concurrent username enumeration")
  .argument("<username>", "Username to search for")
  .option("-s, --sites <names...>", "Specific sites to check (space or comma separated)")
  .option("-c, --categories <names...>", "Categories to search (space or comma separated)")
  .option("-t, --timeout <seconds>", "Request timeout in seconds", String(DEFAULT_TIMEOUT_SECONDS))
  .option("-w, --workers <number>", "Max concurrent requests", String(DEFAULT_WORKERS))
  .option("-d, --database <path>", "Site database file or http(s) URL", DEFAULT_DATABASE)
  .option("-o, --output <path>", "Export results to CSV file")
  .option("-O, --output-all", "Include not found and failed in CSV export", false)
  .option("-N, --not-found", "Show sites where the username wasn't found", false)
  .option("-f, --failed", "Show sites that errored (timeout, connection error, etc.)", false)
  .option("-q, --quiet", "Only show the summary (no live output)", false)
  .option("--db <path>", "Record the run in this SQLite history database");

program.parse(process.argv);

const options = program.opts<SearchOptions>();

main(program.args[0], options).catch((error: unknown) => {
  if (
    error instanceof InvalidRunConfigError ||
    error instanceof NoSitesSelectedError ||
    error instanceof SiteDatabaseError
  ) {
    console.error(`[search] ${error.message}`);
    process.exitCode = 1;
    return;
  }
  throw error;
});

/**
 * Load the site database and run one search; SIGINT cancels it.
 */
async function main(username: string | undefined, options: SearchOptions) {
  const config = parseRunConfig(username, options);
  const sites = await loadSiteDatabase(options.database, {
    timeoutMs: config.timeoutMs,
    maxRetries: 2
  });
  if (!config.quiet) {
    console.log(`[search] loaded=${sites.length} source=${options.database} workers=${config.workerLimit} timeout_ms=${config.timeoutMs}`);
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn("[search] interrupt received; cancelling in-flight probes");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    await executeSearch(
      config,
      sites,
      {
        out: process.stdout,
        csvPath: options.output ?? null,
        csvIncludeAll: options.outputAll,
        historyDbPath: options.db ?? null
      },
      { signal: controller.signal }
    );
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
