/**
 * Module `src/types.ts`: shared data model for sites, probes, verdicts and reports.
 */

export type VerdictOutcome = "found" | "not-found" | "failed";

export type RulePolarity = "found-on-match" | "not-found-on-match";

export type HttpMethod = "GET" | "POST";

export interface StatusMatchRule {
  kind: "status-match";
  status: number;
  polarity: RulePolarity;
}

export interface BodyContainsRule {
  kind: "body-contains";
  text: string;
  polarity: RulePolarity;
}

export interface BodyPatternRule {
  kind: "body-pattern";
  pattern: string;
  flags?: string;
  polarity: RulePolarity;
}

/**
 * Found when the marker is missing from the body. Covers sites that answer 200
 * for every profile URL and only print a "not found" notice.
 */
export interface AbsenceOfMarkerRule {
  kind: "absence-of-marker";
  marker: string;
}

export interface AllOfRule {
  kind: "all-of";
  rules: DetectionRule[];
}

/**
 * Community hit/miss conditions, checked in a fixed order: miss string, miss
 * code (only without a hit string), hit code, then hit string as a fallback.
 */
export interface HitMissRule {
  kind: "hit-miss";
  hitCode: number | null;
  hitString: string | null;
  missString: string | null;
  missCode: number | null;
}

export type DetectionRule =
  | StatusMatchRule
  | BodyContainsRule
  | BodyPatternRule
  | AbsenceOfMarkerRule
  | AllOfRule
  | HitMissRule;

export type DetectionRuleKind = DetectionRule["kind"];

export interface SiteDefinition {
  readonly name: string;
  readonly categories: readonly string[];
  readonly urlTemplate: string;
  readonly prettyUrlTemplate: string | null;
  readonly method: HttpMethod;
  readonly postBody: string | null;
  readonly headers: Readonly<Record<string, string>>;
  readonly stripChars: string;
  readonly detectionRule: DetectionRule;
}

export type ResolvedUrl =
  | { ok: true; url: string }
  | { ok: false; reason: string };

export interface ProbeTask {
  site: SiteDefinition;
  username: string;
  resolvedUrl: ResolvedUrl;
  profileUrl: string;
  body: string | null;
}

export type TransportErrorCategory =
  | "timeout"
  | "cancelled"
  | "dns"
  | "connection-refused"
  | "connection-reset"
  | "tls"
  | "too-many-redirects"
  | "bad-url"
  | "network-error";

export interface ProbeResponse {
  status: number;
  body: string;
  error: TransportErrorCategory | null;
}

export interface Verdict {
  readonly site: SiteDefinition;
  readonly outcome: VerdictOutcome;
  readonly detail: string | null;
  readonly status: number;
  /** 0 to 100; how strongly the deciding condition supports the outcome. 0 for failures. */
  readonly confidence: number;
  readonly url: string;
  readonly elapsedMs: number;
}

export interface RunConfiguration {
  readonly username: string;
  readonly workerLimit: number;
  readonly timeoutMs: number;
  readonly siteFilter: readonly string[];
  readonly categoryFilter: readonly string[];
  readonly quiet: boolean;
  readonly showNotFound: boolean;
  readonly showFailed: boolean;
}

export type OutcomeCounts = Record<VerdictOutcome, number>;

export interface Report {
  username: string;
  verdicts: Verdict[];
  counts: OutcomeCounts;
  foundByCategory: Record<string, number>;
  cancelled: boolean;
  warnings: string[];
  startedAt: number;
  finishedAt: number;
  elapsedMs: number;
}

export interface RunProgress {
  checked: number;
  total: number;
  counts: OutcomeCounts;
}
