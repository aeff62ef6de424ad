/**
 * Module `src/http.ts`: outbound HTTP helpers and transport error classification.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { setDefaultResultOrder } from "node:dns";
import type { HttpMethod, TransportErrorCategory } from "./types.js";

// Prefer IPv4 first to avoid IPv6 timeouts on some hosts.
setDefaultResultOrder("ipv4first");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  timeoutMs: number;
  maxRetries: number;
  fetchImpl?: FetchLike;
  log?: (message: string) => void;
}

export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const TLS_CODE_PREFIXES = ["CERT_", "ERR_TLS_", "ERR_SSL_"];
const TLS_CODES = new Set([
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN"
]);

/**
 * Redirect chain longer than the probe allows.
 */
export class TooManyRedirectsError extends Error {
  code = "TOO_MANY_REDIRECTS";
  constructor(readonly url: string, readonly hops: number) {
    super(`more than ${hops} redirects starting at ${url}`);
    this.name = "TooManyRedirectsError";
  }
}

/**
 * Map a thrown fetch error onto a transport failure category.
 */
export function classifyTransportError(error: unknown): TransportErrorCategory {
  if (error instanceof TooManyRedirectsError) return "too-many-redirects";
  const codes = causeChain(error)
    .map((link) => link.code)
    .filter((code): code is string => typeof code === "string" && code.length > 0);
  for (const code of codes) {
    const upper = code.toUpperCase();
    if (upper === "ENOTFOUND" || upper === "EAI_AGAIN") return "dns";
    if (upper === "ECONNREFUSED") return "connection-refused";
    if (upper === "ECONNRESET" || upper === "EPIPE" || upper === "UND_ERR_SOCKET") {
      return "connection-reset";
    }
    if (
      upper === "ETIMEDOUT" ||
      upper === "ETIMEOUT" ||
      upper === "UND_ERR_CONNECT_TIMEOUT" ||
      upper === "UND_ERR_HEADERS_TIMEOUT" ||
      upper === "UND_ERR_BODY_TIMEOUT"
    ) {
      return "timeout";
    }
    if (TLS_CODES.has(upper) || TLS_CODE_PREFIXES.some((prefix) => upper.startsWith(prefix))) {
      return "tls";
    }
  }
  return "network-error";
}

export interface RedirectRequest {
  method: HttpMethod;
  headers: Record<string, string>;
  body: string | null;
  signal: AbortSignal;
}

export interface RedirectResult {
  response: Response;
  url: string;
  redirects: number;
}

/**
 * Issue a request and follow up to `maxRedirects` hops by hand so the chain
 * length stays bounded.
 */
export async function fetchFollowingRedirects(
  url: string,
  request: RedirectRequest,
  fetchImpl: FetchLike,
  maxRedirects = MAX_REDIRECTS
): Promise<RedirectResult> {
  let currentUrl = url;
  let method = request.method;
  let body = request.body;

  for (let hop = 0; ; hop += 1) {
    const response = await fetchImpl(currentUrl, {
      method,
      headers: request.headers,
      body: body ?? undefined,
      signal: request.signal,
      redirect: "manual"
    });

    const location = response.headers.get("location");
    if (!REDIRECT_STATUSES.has(response.status) || !location) {
      return { response, url: currentUrl, redirects: hop };
    }
    await response.body?.cancel();
    if (hop >= maxRedirects) {
      throw new TooManyRedirectsError(url, maxRedirects);
    }

    currentUrl = new URL(location, currentUrl).toString();
    if (response.status === 303 || (method === "POST" && response.status !== 307 && response.status !== 308)) {
      method = "GET";
      body = null;
    }
  }
}

/**
 * GET a JSON document, retrying 429, 5xx and transport failures with
 * exponential backoff (honouring `Retry-After` on 429). Other statuses and
 * unparseable bodies fail at once.
 */
export async function fetchJsonWithRetry<T>(url: string, options: HttpOptions): Promise<T> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let attempt = 0;
  let backoff = 1000;

  while (true) {
    attempt += 1;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    let delay = backoff;
    let reason: string;

    try {
      const response = await fetchImpl(url, {
        signal: controller.signal,
        headers: {
          "accept": "application/json"
        }
      });

      const retryable = response.status === 429 || response.status >= 500;
      if (!response.ok && (!retryable || attempt > options.maxRetries)) {
        throw new HttpStatusError(url, response.status);
      }
      if (response.ok) {
        return (await response.json()) as T;
      }
      if (response.status === 429) {
        delay = parseRetryAfter(response.headers.get("retry-after")) ?? backoff;
      }
      reason = `status=${response.status}`;
    } catch (error) {
      if (error instanceof HttpStatusError || error instanceof SyntaxError) {
        throw error;
      }
      if (attempt > options.maxRetries) {
        throw error;
      }
      reason = `category=${classifyTransportError(error)} reason=${describeError(error)}`;
    } finally {
      clearTimeout(timeout);
    }

    emit(options, `[http] retry attempt=${attempt}/${options.maxRetries} ${reason} retry_in_ms=${delay} url=${url}`);
    await sleep(delay);
    backoff = Math.min(backoff * 2, 30000);
  }
}

/**
 * Non-retryable HTTP status from a JSON endpoint.
 */
export class HttpStatusError extends Error {
  code = "HTTP_STATUS";
  constructor(readonly url: string, readonly status: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

function emit(options: HttpOptions, message: string) {
  if (options.log) {
    options.log(message);
  } else {
    console.warn(message);
  }
}

/**
 * Codes and first message lines along the cause chain, joined on one line.
 * undici's generic "fetch failed" is left out.
 */
export function describeError(error: unknown): string {
  const parts = new Set<string>();
  for (const link of causeChain(error)) {
    if (typeof link.code === "string" && link.code.length > 0) parts.add(link.code);
    const message = typeof link.message === "string" ? firstLine(link.message) : "";
    if (message && message !== "fetch failed") parts.add(message);
  }
  if (parts.size > 0) return [...parts].join(" ");
  return firstLine(String(error));
}

function causeChain(error: unknown): Array<{ code?: unknown; message?: unknown }> {
  const chain: Array<{ code?: unknown; message?: unknown }> = [];
  let current: unknown = error;
  while (current && typeof current === "object" && chain.length < 4) {
    const link = current as { code?: unknown; message?: unknown; cause?: unknown };
    chain.push(link);
    current = link.cause;
  }
  return chain;
}

function firstLine(message: string): string {
  return message.trim().split("\n", 1)[0].trim();
}

// Retry-After is either delta-seconds or an HTTP date.
function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : undefined;
  }
  return undefined;
}
