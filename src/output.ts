/**
 * Module `src/output.ts`: result tables, summary and CSV export for a report.
 */

import fs from "node:fs";
import path from "node:path";
import type { Report, Verdict } from "./types.js";

export interface TableOptions {
  showNotFound: boolean;
  showFailed: boolean;
}

const CSV_HEADER = ["site_name", "category", "url", "status", "status_code", "confidence", "error"];

export function formatTable(title: string, rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  const lines = rows.map((row) =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index])))
      .join("  ")
  );
  return [title, ...lines.map((line) => `  ${line}`)].join("\n");
}

export function renderTables(report: Report, options: TableOptions): string {
  const found = foundByConfidence(report);
  const sections: string[] = [];

  if (found.length === 0) {
    sections.push("[-] No accounts found.");
  } else {
    sections.push(
      formatTable(
        `Found ${found.length} accounts`,
        found.map((verdict) => [verdict.site.name, categoryLabel(verdict), verdict.url, `${verdict.confidence}%`])
      )
    );
  }

  const notFound = byOutcome(report, "not-found");
  if (options.showNotFound && notFound.length > 0) {
    sections.push(
      formatTable(
        `Not found on ${notFound.length} sites`,
        notFound.map((verdict) => [verdict.site.name, categoryLabel(verdict), String(verdict.status)])
      )
    );
  }

  const failed = byOutcome(report, "failed");
  if (options.showFailed && failed.length > 0) {
    sections.push(
      formatTable(
        `Failed ${failed.length} sites`,
        failed.map((verdict) => [verdict.site.name, categoryLabel(verdict), verdict.detail ?? "unknown"])
      )
    );
  }

  return sections.join("\n\n");
}

export function renderSummary(report: Report): string {
  const { counts } = report;
  const total = report.verdicts.length;
  const answered = total - counts["failed"];
  const successRate = Math.floor((100 * counts["found"]) / Math.max(1, answered));

  const lines = [
    "━━━━━━━━━━━━━ Summary ━━━━━━━━━━━━━",
    `Username: '${report.username}'${report.cancelled ? " (cancelled)" : ""}`,
    `Total sites checked: ${total}`,
    "",
    `[+] Found: ${counts["found"]}`,
    `[-] Not found: ${counts["not-found"]}`,
    `[x] Failed: ${counts["failed"]}`,
    "",
    `Success rate: ${successRate}% (${counts["found"]}/${answered})`,
    `Elapsed: ${(report.elapsedMs / 1000).toFixed(1)}s`
  ];

  const categories = Object.entries(report.foundByCategory).sort(
    ([nameA, countA], [nameB, countB]) => countB - countA || nameA.localeCompare(nameB)
  );
  if (categories.length > 0) {
    lines.push("", formatTable("Found by category:", categories.map(([name, count]) => [name, String(count)])));
  }

  return lines.join("\n");
}

/**
 * CSV rows for the report: found verdicts, plus the others with `includeAll`.
 */
export function formatCsv(report: Report, includeAll: boolean): string {
  const rows = [CSV_HEADER];
  const outcomes = includeAll ? (["found", "not-found", "failed"] as const) : (["found"] as const);
  for (const outcome of outcomes) {
    const verdicts = outcome === "found" ? foundByConfidence(report) : byOutcome(report, outcome);
    for (const verdict of verdicts) {
      rows.push([
        verdict.site.name,
        categoryLabel(verdict),
        verdict.url,
        outcome.replace("-", "_"),
        String(verdict.status),
        String(verdict.confidence),
        outcome === "failed" ? (verdict.detail ?? "") : ""
      ]);
    }
  }
  return `${rows.map((row) => row.map(escapeCsvField).join(",")).join("\r\n")}\r\n`;
}

export function exportCsv(filepath: string, report: Report, includeAll: boolean) {
  fs.mkdirSync(path.dirname(path.resolve(filepath)), { recursive: true });
  fs.writeFileSync(filepath, formatCsv(report, includeAll), "utf8");
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function byOutcome(report: Report, outcome: Verdict["outcome"]): Verdict[] {
  return report.verdicts.filter((verdict) => verdict.outcome === outcome);
}

/**
 * Found verdicts, most confident first; ties keep site-definition order.
 */
function foundByConfidence(report: Report): Verdict[] {
  return byOutcome(report, "found").sort((a, b) => b.confidence - a.confidence);
}

function categoryLabel(verdict: Verdict): string {
  return verdict.site.categories.join("/");
}
