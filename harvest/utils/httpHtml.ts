import fetch, { AbortError } from "node-fetch";
import { mkdirSync, readFileSync, writeFileSync, statSync } from "fs";
import { join } from "path";
import crypto from "crypto";
import { sleep, type Politeness } from "./politeness.js";

export type FetchFailure = {
  ok: false;
  url: string;
  reason: string;
  status?: number;
  retryable: boolean;
  retryAfterMs?: number;
};

export type FetchResult = { ok: true; url: string; html: string } | FetchFailure;

export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export type PageFetcherOptions = {
  politeness: Politeness;
  timeoutMs?: number;
  cacheDir?: string | null;   // null disables the on-disk cache
  cacheTtlHours?: number;
};

function cachePath(dir: string, url: string) {
  const hash = crypto.createHash("sha1").update(url).digest("hex");
  return join(dir, `${hash}.html`);
}

function fresh(p: string, ttlHours: number): boolean {
  try {
    const st = statSync(p);
    const ageH = (Date.now() - st.mtimeMs) / 3.6e6;
    return ageH < ttlHours && st.size > 0;
  } catch { return false; }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRetryableStatus(status: number) {
  return status === 429 || status === 403 || status >= 500;
}

function parseRetryAfter(value: string | null): number | undefined {
  const secs = Number(value);
  return secs > 0 ? secs * 1000 : undefined;
}

export function createPageFetcher(opts: PageFetcherOptions): PageFetcher {
  const timeoutMs = opts.timeoutMs ?? 15000;
  const cacheDir = opts.cacheDir ?? null;
  const ttl = opts.cacheTtlHours ?? 24;

  async function fromNetwork(url: string): Promise<FetchResult> {
    await opts.politeness.delay();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, { headers: opts.politeness.nextHeaderSet(), signal: controller.signal });
      if (!res.ok) {
        // Unread bodies keep the socket busy.
        res.body?.resume();
        return {
          ok: false,
          url,
          reason: `HTTP ${res.status}`,
          status: res.status,
          retryable: isRetryableStatus(res.status),
          retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
        };
      }
      // Body is read under the same timeout so a stalled stream never yields partial HTML.
      const html = await res.text();
      if (!html.trim()) return { ok: false, url, reason: "empty body", status: res.status, retryable: true };
      return { ok: true, url, html };
    } catch (err) {
      if (err instanceof AbortError) {
        return { ok: false, url, reason: `timeout after ${timeoutMs}ms`, retryable: true };
      }
      return { ok: false, url, reason: errorMessage(err), retryable: true };
    } finally {
      clearTimeout(timer);
    }
  }

  function readCache(cp: string, url: string): string | null {
    if (!fresh(cp, ttl)) return null;
    try {
      return readFileSync(cp, "utf8");
    } catch (err) {
      console.warn(`  Cache read failed for ${url}: ${errorMessage(err)}`);
      return null;
    }
  }

  function writeCache(dir: string, cp: string, html: string, url: string) {
    try {
      mkdirSync(dir, { recursive: true });
      writeFileSync(cp, html);
    } catch (err) {
      console.warn(`  Cache write failed for ${url}: ${errorMessage(err)}`);
    }
  }

  return {
    async fetch(url) {
      if (!cacheDir) return fromNetwork(url);

      const cp = cachePath(cacheDir, url);
      const cached = readCache(cp, url);
      if (cached !== null) return { ok: true, url, html: cached };

      const result = await fromNetwork(url);
      if (result.ok) writeCache(cacheDir, cp, result.html, url);
      return result;
    },
  };
}

export type RetryOptions = {
  attempts: number;
  backoffMs?: number;
  wait?: (ms: number) => Promise<void>;
};

/** Caller-side retry for failures the fetcher marks retryable (429/403/5xx, timeouts, network). */
export async function fetchWithRetry(fetcher: PageFetcher, url: string, opts: RetryOptions): Promise<FetchResult> {
  const wait = opts.wait ?? sleep;
  const backoffMs = opts.backoffMs ?? 2000;

  let result = await fetcher.fetch(url);
  for (let i = 1; i < opts.attempts && !result.ok && result.retryable; i++) {
    console.warn(`  GET ${url} -> ${result.reason} [attempt ${i}/${opts.attempts}]`);
    await wait(result.retryAfterMs ?? Math.min(backoffMs * i, 10000));
    result = await fetcher.fetch(url);
  }
  return result;
}
