export { ResultAggregator } from "./aggregator.js";
export { parseRunConfig, validateRunConfig } from "./config.js";
export { RunStore } from "./db.js";
export { classifyResponse, evaluateRule } from "./detection.js";
export * from "./errors.js";
export { classifyTransportError, type FetchLike } from "./http.js";
export { exportCsv, formatCsv, renderSummary, renderTables } from "./output.js";
export { probeSite } from "./probe-worker.js";
export { ProgressReporter } from "./progress.js";
export { runProbing, type RunHooks } from "./scheduler.js";
export { executeSearch } from "./search.js";
export { loadSiteDatabase, parseSiteDatabase } from "./site-database.js";
export { buildProbeTask, resolveProbeUrl, selectSites } from "./sites.js";
export type * from "./types.js";
