// packages/core/src/utils/http.ts
import { errorMessage } from "../errors.js";
import { sleep } from "./timeout.js";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export type FetchJsonOptions = {
  label: string; // log tag, e.g. "brave"
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  signal?: AbortSignal;
  debug?: boolean;
};

export function isRetryableStatus(status: number) {
  return status === 408 || status === 429 || status === 502 || status === 503 || status === 504;
}

function isRetryableError(e: unknown) {
  if (e instanceof HttpError) return isRetryableStatus(e.status);
  if (e instanceof Error && e.name === "AbortError") return true;
  return /ECONNRESET|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|fetch failed/i.test(errorMessage(e));
}

function redactHeaders(headers: Record<string, string>) {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = /authorization|token|key/i.test(k) ? "***" : v;
  }
  return out;
}

/**
 * JSON over HTTP with a per-attempt timeout and bounded retries
 * (408/429/502/503/504 and network errors, exponential backoff from 250ms).
 * An abort from the caller's signal is never retried.
 */
export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<unknown> {
  const headers: Record<string, string> = {
    accept: "application/json",
    ...(opts.body !== undefined ? { "content-type": "application/json" } : {}),
    ...(opts.headers ?? {}),
  };

  for (let attempt = 0; ; attempt++) {
    if (opts.signal?.aborted) throw new Error(`[${opts.label}] request aborted`);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

    try {
      if (opts.debug) {
        console.log(`[${opts.label}->] ${opts.method ?? "GET"} ${url}`);
        console.log(`[${opts.label}->] headers:`, redactHeaders(headers));
      }

      const res = await fetch(url, {
        method: opts.method ?? "GET",
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal: controller.signal,
      });

      const text = await res.text();
      if (opts.debug) console.log(`[${opts.label}<-] ${res.status} ${text.slice(0, 500)}`);

      if (!res.ok) {
        throw new HttpError(res.status, `${opts.label} HTTP ${res.status}: ${text.slice(0, 300)}`);
      }

      try {
        return JSON.parse(text);
      } catch {
        throw new Error(`${opts.label} returned non-JSON response: ${text.slice(0, 300)}`);
      }
    } catch (e) {
      const callerAborted = opts.signal?.aborted ?? false;
      if (!callerAborted && attempt < opts.retries && isRetryableError(e)) {
        if (opts.debug) console.log(`[${opts.label}] retrying (attempt ${attempt + 1}/${opts.retries}):`, errorMessage(e));
        await sleep(250 * Math.pow(2, attempt));
        continue;
      }
      throw e;
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }
}
