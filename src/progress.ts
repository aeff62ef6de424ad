/**
 * Module `src/progress.ts`: live verdict lines while a run is in flight.
 */

import type { RunStart } from "./scheduler.js";
import type { RunProgress, Verdict } from "./types.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ProgressOptions {
  username: string;
  quiet: boolean;
  showNotFound: boolean;
  showFailed: boolean;
}

export function formatVerdictLine(verdict: Verdict): string {
  switch (verdict.outcome) {
    case "found":
      return `[+] ${verdict.site.name}: ${verdict.url}`;
    case "not-found":
      return `[-] ${verdict.site.name}: ${verdict.detail ?? `HTTP ${verdict.status}`}`;
    case "failed":
      return `[x] ${verdict.site.name}: ${verdict.detail ?? "unknown error"}`;
  }
}

export function formatProgressLine(progress: RunProgress): string {
  const { counts } = progress;
  return `[=] checked ${progress.checked}/${progress.total} found=${counts["found"]} not_found=${counts["not-found"]} failed=${counts["failed"]}`;
}

/**
 * Read-only consumer of the verdict stream. Lines are buffered and written on
 * a later tick, so the scheduler never waits on the terminal. Outside quiet
 * mode every write ends with the current counter line.
 */
export class ProgressReporter {
  private pending: string[] = [];
  private scheduled: NodeJS.Immediate | null = null;
  private lastProgress: RunProgress | null = null;
  private writtenProgress: RunProgress | null = null;

  constructor(
    private readonly out: OutputStream,
    private readonly options: ProgressOptions
  ) {}

  handleStart = (start: RunStart) => {
    for (const warning of start.warnings) {
      this.pending.push(`[!] ${warning}`);
    }
    if (!this.options.quiet) {
      this.pending.push(`[~] Searching for '${this.options.username}' across ${start.total} sites...`);
    }
    this.schedule();
  };

  handleVerdict = (verdict: Verdict, progress: RunProgress) => {
    this.lastProgress = progress;
    if (this.options.quiet) return;
    const hidden =
      (verdict.outcome === "not-found" && !this.options.showNotFound) ||
      (verdict.outcome === "failed" && !this.options.showFailed);
    if (!hidden) {
      this.pending.push(formatVerdictLine(verdict));
    }
    this.schedule();
  };

  /**
   * Write whatever is still buffered, with the final counter line.
   */
  finish() {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = null;
    }
    this.flush();
  }

  private schedule() {
    if (this.scheduled) return;
    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.flush();
    });
  }

  private flush() {
    const progress = this.lastProgress;
    if (!this.options.quiet && progress && progress !== this.writtenProgress) {
      this.pending.push(formatProgressLine(progress));
      this.writtenProgress = progress;
    }
    if (this.pending.length === 0) return;
    const chunk = `${this.pending.join("\n")}\n`;
    this.pending = [];
    this.out.write(chunk);
  }
}
