/**
 * Module `src/probe-worker.ts`: run one probe task and produce its verdict.
 */

import { classifyResponse } from "./detection.js";
import {
  classifyTransportError,
  fetchFollowingRedirects,
  MAX_REDIRECTS,
  type FetchLike
} from "./http.js";
import type { ProbeResponse, ProbeTask, TransportErrorCategory, Verdict } from "./types.js";

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "user-agent": "Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0",
  "accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "en-US,en;q=0.5"
};

export interface ProbeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  maxRedirects?: number;
}

/**
 * Rejection used when a probe is abandoned by its timeout or the run's
 * cancellation signal.
 */
class ProbeAbortedError extends Error {
  constructor() {
    super("probe aborted");
    this.name = "AbortError";
  }
}

/**
 * Probe one site. Never throws: every failure mode ends up as a `failed`
 * verdict carrying its category.
 */
export async function probeSite(task: ProbeTask, options: ProbeOptions): Promise<Verdict> {
  const startedAt = Date.now();
  const finish = (response: ProbeResponse): Verdict => {
    const { outcome, detail, confidence } = classifyResponse(response, task.site.detectionRule);
    return Object.freeze({
      site: task.site,
      outcome,
      detail,
      status: response.status,
      confidence,
      url: task.profileUrl,
      elapsedMs: Date.now() - startedAt
    });
  };
  const fail = (error: TransportErrorCategory) => finish({ status: 0, body: "", error });

  if (!task.resolvedUrl.ok) return fail("bad-url");
  if (options.signal?.aborted) return fail("cancelled");

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onCancel = () => controller.abort();
  options.signal?.addEventListener("abort", onCancel, { once: true });

  try {
    const headers = { ...DEFAULT_HEADERS, ...task.site.headers };
    const { response } = await untilAborted(
      fetchFollowingRedirects(
        task.resolvedUrl.url,
        {
          method: task.site.method,
          headers,
          body: task.body,
          signal: controller.signal
        },
        options.fetchImpl ?? fetch,
        options.maxRedirects ?? MAX_REDIRECTS
      ),
      controller.signal
    );
    const body = await untilAborted(response.text(), controller.signal);
    return finish({ status: response.status, body, error: null });
  } catch (error) {
    if (timedOut) return fail("timeout");
    if (options.signal?.aborted) return fail("cancelled");
    return fail(classifyTransportError(error));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCancel);
  }
}

/**
 * Settle with the work's result, or reject as soon as the signal aborts even
 * when the underlying call ignores it.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ProbeAbortedError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
