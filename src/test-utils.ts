import type { FetchLike } from "./http.js";
import type { DetectionRule, SiteDefinition } from "./types.js";

export type FakeRoute = (init: RequestInit | undefined) => Promise<Response>;

export function makeSite(name: string, overrides: Partial<SiteDefinition> = {}): SiteDefinition {
  const rule: DetectionRule = { kind: "status-match", status: 200, polarity: "found-on-match" };
  return Object.freeze({
    name,
    categories: ["social"],
    urlTemplate: `https://${name.toLowerCase()}.test/{account}`,
    prettyUrlTemplate: null,
    method: "GET",
    postBody: null,
    headers: {},
    stripChars: "",
    detectionRule: rule,
    ...overrides
  });
}

export function respond(status: number, body = "", headers: Record<string, string> = {}): FakeRoute {
  return async () => new Response(body, { status, headers });
}

export function redirectTo(location: string, status = 302): FakeRoute {
  return async () => new Response(null, { status, headers: { location } });
}

/**
 * Resolves after `ms`, or rejects like a real fetch when the request is aborted.
 */
export function delayed(ms: number, route: FakeRoute): FakeRoute {
  return (init) =>
    new Promise<Response>((resolve, reject) => {
      const timer = setTimeout(() => {
        resolve(route(init));
      }, ms);
      init?.signal?.addEventListener(
        "abort",
        () => {
          clearTimeout(timer);
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        },
        { once: true }
      );
    });
}

/**
 * Never settles on its own; only an abort ends it.
 */
export function hanging(): FakeRoute {
  return (init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener(
        "abort",
        () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        },
        { once: true }
      );
    });
}

export function failing(code: string): FakeRoute {
  return async () => {
    const cause = Object.assign(new Error(`getaddrinfo ${code}`), { code });
    throw new TypeError("fetch failed", { cause });
  };
}

export interface FakeFetch {
  fetch: FetchLike;
  calls: Array<{ url: string; init: RequestInit | undefined }>;
  inFlight(): number;
  maxInFlight(): number;
}

export function fakeFetch(routes: Record<string, FakeRoute>): FakeFetch {
  const calls: Array<{ url: string; init: RequestInit | undefined }> = [];
  let active = 0;
  let peak = 0;

  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const route = routes[url];
    if (!route) {
      return new Response("no route", { status: 404 });
    }
    active += 1;
    peak = Math.max(peak, active);
    try {
      return await route(init);
    } finally {
      active -= 1;
    }
  };

  return {
    fetch,
    calls,
    inFlight: () => active,
    maxInFlight: () => peak
  };
}

export function collectOutput() {
  const chunks: string[] = [];
  return {
    stream: {
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      }
    },
    text: () => chunks.join(""),
    chunks
  };
}
