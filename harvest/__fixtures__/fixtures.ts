import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { FetchResult, PageFetcher } from "../utils/httpHtml.js";

export function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(name, import.meta.url)), "utf8");
}

// HTML body, or an HTTP status to fail with. An array is served in order, the last entry repeating.
export type FakePage = string | { status: number };

export type FakeFetcher = PageFetcher & { calls: string[] };

/** In-process stand-in for the network: unknown URLs answer 404. */
export function fakeFetcher(pages: Record<string, FakePage | FakePage[]>): FakeFetcher {
  const calls: string[] = [];
  return {
    calls,
    async fetch(url): Promise<FetchResult> {
      const seenBefore = calls.filter(c => c === url).length;
      calls.push(url);
      const entry = pages[url] ?? { status: 404 };
      const page = Array.isArray(entry) ? entry[Math.min(seenBefore, entry.length - 1)] : entry;
      if (typeof page === "string") return { ok: true, url, html: page };
      return {
        ok: false,
        url,
        reason: `HTTP ${page.status}`,
        status: page.status,
        retryable: page.status === 429 || page.status >= 500,
      };
    },
  };
}
