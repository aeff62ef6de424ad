#!/usr/bin/env node
/**
 * Module `src/sites-cli.ts`: list the sites or categories in a site database.
 */

import { Command } from "commander";
import { DEFAULT_DATABASE } from "./config.js";
import { SiteDatabaseError } from "./errors.js";
import { formatTable } from "./output.js";
import { loadSiteDatabase } from "./site-database.js";
import { countCategories, listSitesByName, selectSites } from "./sites.js";

interface SitesOptions {
  database: string;
  categories: boolean;
  category?: string[];
  timeout: string;
}

const program = new Command();

program
  .name("namescout-sites")
  .description("List available sites and categories")
  .option("-d, --database <path>", "Site database file or http(s) URL", DEFAULT_DATABASE)
  .option("-C, --categories", "List categories with their site counts", false)
  .option("-c, --category <names...>", "Only list sites in these categories")
  .option("-t, --timeout <seconds>", "Timeout for a remote database in seconds", "15");

program.parse(process.argv);

const options = program.opts<SitesOptions>();

main(options).catch((error: unknown) => {
  if (error instanceof SiteDatabaseError) {
    console.error(`[sites] ${error.message}`);
    process.exitCode = 1;
    return;
  }
  throw error;
});

async function main(options: SitesOptions) {
  const sites = await loadSiteDatabase(options.database, {
    timeoutMs: Number(options.timeout) * 1000,
    maxRetries: 2
  });

  if (options.categories) {
    const rows = [...countCategories(sites).entries()].map(([name, count]) => [name, String(count)]);
    console.log(formatTable("Available Categories", rows));
    return;
  }

  const filtered = options.category ? selectSites(sites, [], options.category).sites : sites;
  const rows = listSitesByName(filtered).map((site) => [site.name, site.categories.join("/")]);
  console.log(formatTable("Available Sites", rows));
  console.log(`\nTotal: ${filtered.length} sites`);
}
