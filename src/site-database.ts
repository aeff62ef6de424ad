/**
 * Module `src/site-database.ts`: load and validate the site database.
 *
 * Two entry shapes are accepted. The native one carries a `rule` object
 * directly. The community "hit/miss" shape (`uri_check`, `e_code`,
 * `e_string`, `m_string`, `m_code`, ...) is translated into a detection rule.
 */

import fs from "node:fs";
import { SiteDatabaseError } from "./errors.js";
import { fetchJsonWithRetry, type FetchLike } from "./http.js";
import { countPlaceholders } from "./sites.js";
import type { DetectionRule, HitMissRule, HttpMethod, RulePolarity, SiteDefinition } from "./types.js";

export interface LoadOptions {
  timeoutMs: number;
  maxRetries: number;
  fetchImpl?: FetchLike;
}

type RawEntry = Record<string, unknown>;

export async function loadSiteDatabase(source: string, options: LoadOptions): Promise<SiteDefinition[]> {
  const payload = isRemoteSource(source)
    ? await fetchRemoteDatabase(source, options)
    : readLocalDatabase(source);
  return parseSiteDatabase(payload, source);
}

export function isRemoteSource(source: string) {
  return source.startsWith("http://") || source.startsWith("https://");
}

async function fetchRemoteDatabase(url: string, options: LoadOptions): Promise<unknown> {
  try {
    return await fetchJsonWithRetry<unknown>(url, {
      timeoutMs: options.timeoutMs,
      maxRetries: options.maxRetries,
      fetchImpl: options.fetchImpl
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SiteDatabaseError(`Failed to fetch database from ${url}: ${message}`, { cause: error });
  }
}

function readLocalDatabase(filepath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filepath, "utf8");
  } catch (error) {
    throw new SiteDatabaseError(`Database file not found: ${filepath}`, { cause: error });
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SiteDatabaseError(`Invalid JSON in database file ${filepath}: ${message}`, { cause: error });
  }
}

/**
 * Validate a parsed database payload into frozen site definitions, in file order.
 */
export function parseSiteDatabase(payload: unknown, source: string): SiteDefinition[] {
  const entries = extractEntries(payload, source);
  const seen = new Set<string>();
  const sites: SiteDefinition[] = [];

  entries.forEach((entry, index) => {
    const site = parseEntry(entry, `${source}#${index}`);
    const key = site.name.toLowerCase();
    if (seen.has(key)) {
      throw new SiteDatabaseError(`${source}#${index}: duplicate site name ${site.name}`);
    }
    seen.add(key);
    sites.push(site);
  });

  return sites;
}

function extractEntries(payload: unknown, source: string): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (payload && typeof payload === "object") {
    const data = (payload as { sites?: unknown }).sites;
    if (Array.isArray(data)) {
      return data;
    }
  }
  throw new SiteDatabaseError(`${source}: unexpected database JSON shape`);
}

function parseEntry(entry: unknown, where: string): SiteDefinition {
  if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
    throw new SiteDatabaseError(`${where}: entry is not an object`);
  }
  const raw = entry as RawEntry;

  const name = readString(raw.name);
  if (!name) throw new SiteDatabaseError(`${where}: missing name`);
  const label = `${where} (${name})`;

  const urlTemplate = readString(raw.url) ?? readString(raw.uri_check);
  if (!urlTemplate) throw new SiteDatabaseError(`${label}: missing url`);
  if (countPlaceholders(urlTemplate) !== 1) {
    throw new SiteDatabaseError(`${label}: url must contain {account} exactly once`);
  }
  if (!/^https?:\/\//i.test(urlTemplate)) {
    throw new SiteDatabaseError(`${label}: url must use http or https`);
  }

  const postBody = readString(raw.postBody) ?? readString(raw.post_body);
  const method: HttpMethod = postBody ? "POST" : "GET";
  const detectionRule =
    raw.rule !== undefined ? parseRule(raw.rule, label) : translateHitMissRule(raw, label);

  return Object.freeze({
    name,
    categories: Object.freeze(readCategories(raw)),
    urlTemplate,
    prettyUrlTemplate: readString(raw.prettyUrl) ?? readString(raw.uri_pretty),
    method,
    postBody,
    headers: Object.freeze(readHeaders(raw.headers ?? raw.header, label)),
    stripChars: readString(raw.stripChars) ?? readString(raw.strip_bad_char) ?? "",
    detectionRule: deepFreeze(detectionRule)
  });
}

/**
 * Parse a native rule object into the closed rule union.
 */
export function parseRule(value: unknown, label: string): DetectionRule {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new SiteDatabaseError(`${label}: rule is not an object`);
  }
  const raw = value as RawEntry;
  const polarity = readPolarity(raw.polarity, label);

  switch (raw.kind) {
    case "status-match": {
      const status = readInteger(raw.status);
      if (status === null) throw new SiteDatabaseError(`${label}: status-match needs an integer status`);
      return { kind: "status-match", status, polarity };
    }
    case "body-contains": {
      const text = readString(raw.text);
      if (!text) throw new SiteDatabaseError(`${label}: body-contains needs text`);
      return { kind: "body-contains", text, polarity };
    }
    case "body-pattern": {
      const pattern = readString(raw.pattern);
      if (!pattern) throw new SiteDatabaseError(`${label}: body-pattern needs a pattern`);
      const flags = readString(raw.flags) ?? undefined;
      try {
        new RegExp(pattern, flags);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SiteDatabaseError(`${label}: invalid pattern: ${message}`);
      }
      return flags === undefined
        ? { kind: "body-pattern", pattern, polarity }
        : { kind: "body-pattern", pattern, flags, polarity };
    }
    case "absence-of-marker": {
      const marker = readString(raw.marker);
      if (!marker) throw new SiteDatabaseError(`${label}: absence-of-marker needs a marker`);
      return { kind: "absence-of-marker", marker };
    }
    case "all-of": {
      if (!Array.isArray(raw.rules) || raw.rules.length === 0) {
        throw new SiteDatabaseError(`${label}: all-of needs a non-empty rules list`);
      }
      return { kind: "all-of", rules: raw.rules.map((inner: unknown) => parseRule(inner, label)) };
    }
    case "hit-miss": {
      const rule: HitMissRule = {
        kind: "hit-miss",
        hitCode: readInteger(raw.hitCode),
        hitString: readString(raw.hitString),
        missString: readString(raw.missString),
        missCode: readInteger(raw.missCode)
      };
      if (rule.hitCode === null && rule.hitString === null && rule.missString === null && rule.missCode === null) {
        throw new SiteDatabaseError(`${label}: hit-miss needs at least one condition`);
      }
      return rule;
    }
    default:
      throw new SiteDatabaseError(`${label}: unrecognized rule kind ${String(raw.kind)}`);
  }
}

/**
 * Translate hit/miss fields into a rule. A lone condition maps onto the
 * matching single rule; several keep their checking order in a `hit-miss` rule.
 */
export function translateHitMissRule(raw: RawEntry, label: string): DetectionRule {
  return hitMissConditions(
    {
      kind: "hit-miss",
      hitCode: readInteger(raw.e_code ?? raw.hit_code),
      hitString: readString(raw.e_string ?? raw.hit_string),
      missString: readString(raw.m_string ?? raw.miss_string),
      missCode: readInteger(raw.m_code ?? raw.miss_code)
    },
    label
  );
}

function hitMissConditions(rule: HitMissRule, label: string): DetectionRule {
  const { hitCode, hitString, missString, missCode } = rule;
  const given = [hitCode !== null, hitString !== null, missString !== null, missCode !== null].filter(Boolean).length;
  if (given > 1) return rule;

  if (missString !== null) return { kind: "absence-of-marker", marker: missString };
  if (hitCode !== null) return { kind: "status-match", status: hitCode, polarity: "found-on-match" };
  if (hitString !== null) return { kind: "body-contains", text: hitString, polarity: "found-on-match" };
  if (missCode !== null) return { kind: "status-match", status: missCode, polarity: "not-found-on-match" };
  throw new SiteDatabaseError(`${label}: no detection condition`);
}

function readCategories(raw: RawEntry): string[] {
  const value = raw.categories ?? raw.category ?? raw.cat;
  const list = Array.isArray(value) ? value : [value];
  const categories = list
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return categories.length > 0 ? categories : ["unknown"];
}

function readHeaders(value: unknown, label: string): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new SiteDatabaseError(`${label}: headers must be an object`);
  }
  const headers: Record<string, string> = {};
  for (const [key, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") {
      throw new SiteDatabaseError(`${label}: header ${key} must be a string`);
    }
    headers[key.toLowerCase()] = headerValue;
  }
  return headers;
}

function readPolarity(value: unknown, label: string): RulePolarity {
  if (value === undefined) return "found-on-match";
  if (value === "found-on-match" || value === "not-found-on-match") return value;
  throw new SiteDatabaseError(`${label}: unknown polarity ${String(value)}`);
}

function readString(value: unknown): string | null {
  if (typeof value !== "string") return null;
  return value.length > 0 ? value : null;
}

function readInteger(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

function deepFreeze(rule: DetectionRule): DetectionRule {
  if (rule.kind === "all-of") {
    rule.rules.forEach(deepFreeze);
  }
  return Object.freeze(rule);
}
