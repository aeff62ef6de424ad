/**
 * Module `src/sites.ts`: site selection and per-site request preparation.
 */

import type { ProbeTask, ResolvedUrl, SiteDefinition } from "./types.js";

export const USERNAME_PLACEHOLDER = "{account}";

// Characters that would change the meaning of the URL around the placeholder.
const UNSAFE_USERNAME = /[\s/?#\\\u0000-\u001f\u007f]/;

export interface SiteSelection {
  sites: SiteDefinition[];
  warnings: string[];
}

/**
 * Pick the sites to probe. Name and category filters widen the selection
 * together: a site is kept when either filter matches it.
 */
export function selectSites(
  sites: readonly SiteDefinition[],
  siteFilter: readonly string[],
  categoryFilter: readonly string[]
): SiteSelection {
  const names = new Set(siteFilter.map(normalizeToken).filter(Boolean));
  const categories = new Set(categoryFilter.map(normalizeToken).filter(Boolean));

  if (names.size === 0 && categories.size === 0) {
    return { sites: sites.slice(), warnings: [] };
  }

  const matchedNames = new Set<string>();
  const selected = sites.filter((site) => {
    const name = normalizeToken(site.name);
    const byName = names.has(name);
    if (byName) matchedNames.add(name);
    const byCategory = site.categories.some((category) => categories.has(normalizeToken(category)));
    return byName || byCategory;
  });

  const warnings = siteFilter
    .filter((entry) => {
      const token = normalizeToken(entry);
      return token.length > 0 && !matchedNames.has(token);
    })
    .map((entry) => `site ${entry} not found`);

  return { sites: selected, warnings };
}

export function countPlaceholders(template: string): number {
  return template.split(USERNAME_PLACEHOLDER).length - 1;
}

export function cleanUsername(username: string, stripChars: string): string {
  let clean = username;
  for (const char of stripChars) {
    clean = clean.split(char).join("");
  }
  return clean;
}

export function substituteUsername(template: string, username: string): string {
  return template.split(USERNAME_PLACEHOLDER).join(username);
}

/**
 * Build the probe URL. Anything that cannot form an http(s) URL with the
 * username in exactly one place resolves to a `bad-url` failure.
 */
export function resolveProbeUrl(site: SiteDefinition, username: string): ResolvedUrl {
  if (countPlaceholders(site.urlTemplate) !== 1) {
    return { ok: false, reason: "bad-url" };
  }
  const clean = cleanUsername(username, site.stripChars);
  if (clean.length === 0 || UNSAFE_USERNAME.test(clean)) {
    return { ok: false, reason: "bad-url" };
  }

  const url = substituteUsername(site.urlTemplate, clean);
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { ok: false, reason: "bad-url" };
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, reason: "bad-url" };
  }
  return { ok: true, url };
}

export function buildProbeTask(site: SiteDefinition, username: string): ProbeTask {
  const clean = cleanUsername(username, site.stripChars);
  return {
    site,
    username,
    resolvedUrl: resolveProbeUrl(site, username),
    profileUrl: substituteUsername(site.prettyUrlTemplate ?? site.urlTemplate, clean),
    body: site.postBody === null ? null : substituteUsername(site.postBody, clean)
  };
}

export function listSitesByName(sites: readonly SiteDefinition[]): SiteDefinition[] {
  return sites
    .slice()
    .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
}

export function countCategories(sites: readonly SiteDefinition[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const site of sites) {
    for (const category of site.categories) {
      counts.set(category, (counts.get(category) ?? 0) + 1);
    }
  }
  return new Map([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

function normalizeToken(value: string): string {
  return value.trim().toLowerCase();
}
