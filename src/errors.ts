/**
 * Module `src/errors.ts`: error types raised before or around a probing run.
 */

/**
 * Run configuration rejected before any probe was scheduled.
 */
export class InvalidRunConfigError extends Error {
  code = "INVALID_RUN_CONFIG";
  constructor(message: string) {
    super(message);
    this.name = "InvalidRunConfigError";
  }
}

/**
 * Filters matched nothing in the loaded site database.
 */
export class NoSitesSelectedError extends Error {
  code = "NO_SITES_SELECTED";
  constructor(message: string) {
    super(message);
    this.name = "NoSitesSelectedError";
  }
}

/**
 * Site database could not be read, fetched or validated.
 */
export class SiteDatabaseError extends Error {
  code = "SITE_DATABASE";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SiteDatabaseError";
  }
}

/**
 * Internal fault: a second verdict arrived for a site that already has one.
 */
export class DuplicateVerdictError extends Error {
  code = "DUPLICATE_VERDICT";
  constructor(readonly siteName: string) {
    super(`duplicate verdict for site ${siteName}`);
    this.name = "DuplicateVerdictError";
  }
}

/**
 * Internal fault: a verdict arrived for a site that was never selected.
 */
export class UnselectedSiteError extends Error {
  code = "UNSELECTED_SITE";
  constructor(readonly siteName: string) {
    super(`verdict for unselected site ${siteName}`);
    this.name = "UnselectedSiteError";
  }
}

export function isInternalFault(error: unknown): boolean {
  return error instanceof DuplicateVerdictError || error instanceof UnselectedSiteError;
}
