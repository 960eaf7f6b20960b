import { createHash } from "crypto";
import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

import fetch, { AbortError, FetchError, Response } from "node-fetch";
import { fakeFetcher } from "../__fixtures__/fixtures.js";
import { createPageFetcher, fetchWithRetry } from "./httpHtml.js";
import { fixedPoliteness } from "./politeness.js";

const fetchMock = vi.mocked(fetch);
const URL_A = "https://www.topuniversities.com/universities/example-university";

beforeEach(() => {
  fetchMock.mockReset();
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createPageFetcher", () => {
  it("returns the body of a 2xx response", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<h1>ok</h1>", { status: 200 }));
    const fetcher = createPageFetcher({ politeness: fixedPoliteness("test-agent") });

    await expect(fetcher.fetch(URL_A)).resolves.toEqual({ ok: true, url: URL_A, html: "<h1>ok</h1>" });
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      headers: {
        "Accept": "text/html,application/xhtml+xml",
        "Accept-Language": "en-US,en;q=0.9",
        "User-Agent": "test-agent",
      },
    });
  });

  it("waits on the politeness delay before every request", async () => {
    const order: string[] = [];
    const politeness = {
      delay: vi.fn(async () => { order.push("delay"); }),
      nextHeaderSet: () => ({ "User-Agent": "test-agent" }),
    };
    fetchMock.mockImplementation(async () => {
      order.push("fetch");
      return new Response("<p>x</p>", { status: 200 });
    });
    const fetcher = createPageFetcher({ politeness });

    await fetcher.fetch(URL_A);
    await fetcher.fetch(URL_A);

    expect(order).toEqual(["delay", "fetch", "delay", "fetch"]);
  });

  it("reports non-2xx statuses as failures and flags the retryable ones", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("gone", { status: 404 }))
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "7" } }));
    const fetcher = createPageFetcher({ politeness: fixedPoliteness() });

    expect(await fetcher.fetch(URL_A)).toEqual({
      ok: false, url: URL_A, reason: "HTTP 503", status: 503, retryable: true, retryAfterMs: undefined,
    });
    expect(await fetcher.fetch(URL_A)).toMatchObject({ ok: false, status: 404, retryable: false });
    expect(await fetcher.fetch(URL_A)).toMatchObject({ ok: false, status: 429, retryable: true, retryAfterMs: 7000 });
  });

  it("releases the body of a failed response", async () => {
    const res = new Response("busy", { status: 503 });
    const resume = res.body ? vi.spyOn(res.body, "resume") : undefined;
    fetchMock.mockResolvedValueOnce(res);
    const fetcher = createPageFetcher({ politeness: fixedPoliteness() });

    await fetcher.fetch(URL_A);

    expect(resume).toHaveBeenCalledTimes(1);
  });

  it("turns transport errors into failures instead of throwing", async () => {
    fetchMock
      .mockRejectedValueOnce(new FetchError("request failed, reason: connect ECONNREFUSED", "system"))
      .mockRejectedValueOnce(new AbortError("The operation was aborted."));
    const fetcher = createPageFetcher({ politeness: fixedPoliteness(), timeoutMs: 10000 });

    expect(await fetcher.fetch(URL_A)).toEqual({
      ok: false, url: URL_A, reason: "request failed, reason: connect ECONNREFUSED", retryable: true,
    });
    expect(await fetcher.fetch(URL_A)).toEqual({
      ok: false, url: URL_A, reason: "timeout after 10000ms", retryable: true,
    });
  });

  it("never reports an empty body as success", async () => {
    fetchMock.mockResolvedValueOnce(new Response("  \n", { status: 200 }));
    const fetcher = createPageFetcher({ politeness: fixedPoliteness() });

    expect(await fetcher.fetch(URL_A)).toEqual({ ok: false, url: URL_A, reason: "empty body", status: 200, retryable: true });
  });

  describe("with a cache directory", () => {
    let dir: string;
    beforeEach(() => { dir = mkdtempSync(join(tmpdir(), "harvest-cache-")); });
    afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

    it("serves a fresh copy from disk without touching the network", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<h1>cached</h1>", { status: 200 }));
      const delay = vi.fn(async () => {});
      const fetcher = createPageFetcher({
        politeness: { delay, nextHeaderSet: () => ({}) },
        cacheDir: dir,
        cacheTtlHours: 1,
      });

      await fetcher.fetch(URL_A);
      const second = await fetcher.fetch(URL_A);

      expect(second).toEqual({ ok: true, url: URL_A, html: "<h1>cached</h1>" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(delay).toHaveBeenCalledTimes(1);
      expect(readdirSync(dir)).toHaveLength(1);
    });

    it("does not cache failures", async () => {
      fetchMock.mockResolvedValueOnce(new Response("busy", { status: 503 }));
      const fetcher = createPageFetcher({ politeness: fixedPoliteness(), cacheDir: dir });

      await fetcher.fetch(URL_A);

      expect(readdirSync(dir)).toEqual([]);
    });

    it("still returns the page when the cache directory cannot be created", async () => {
      writeFileSync(join(dir, "afile"), "x");
      fetchMock.mockResolvedValueOnce(new Response("<h1>ok</h1>", { status: 200 }));
      const fetcher = createPageFetcher({ politeness: fixedPoliteness(), cacheDir: join(dir, "afile", "sub") });

      await expect(fetcher.fetch(URL_A)).resolves.toEqual({ ok: true, url: URL_A, html: "<h1>ok</h1>" });
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`  Cache write failed for ${URL_A}: ENOTDIR`));
    });

    it("falls back to the network when the cached copy cannot be read", async () => {
      const hash = createHash("sha1").update(URL_A).digest("hex");
      mkdirSync(join(dir, `${hash}.html`));
      fetchMock.mockResolvedValueOnce(new Response("<h1>fresh</h1>", { status: 200 }));
      const fetcher = createPageFetcher({ politeness: fixedPoliteness(), cacheDir: dir });

      await expect(fetcher.fetch(URL_A)).resolves.toEqual({ ok: true, url: URL_A, html: "<h1>fresh</h1>" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`  Cache read failed for ${URL_A}: EISDIR`));
    });
  });
});

describe("fetchWithRetry", () => {
  it("retries retryable failures with a growing backoff", async () => {
    const fetcher = fakeFetcher({ [URL_A]: [{ status: 503 }, { status: 502 }, "<h1>third time</h1>"] });
    const wait = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(fetcher, URL_A, { attempts: 3, backoffMs: 2000, wait });

    expect(res).toEqual({ ok: true, url: URL_A, html: "<h1>third time</h1>" });
    expect(wait.mock.calls.map(c => c[0])).toEqual([2000, 4000]);
    expect(fetcher.calls).toHaveLength(3);
  });

  it("returns the last failure once attempts run out", async () => {
    const fetcher = fakeFetcher({ [URL_A]: { status: 500 } });
    const wait = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(fetcher, URL_A, { attempts: 2, wait });

    expect(res).toMatchObject({ ok: false, status: 500 });
    expect(fetcher.calls).toHaveLength(2);
  });

  it("gives up immediately on a non-retryable failure", async () => {
    const fetcher = fakeFetcher({});
    const wait = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(fetcher, URL_A, { attempts: 3, wait });

    expect(res).toMatchObject({ ok: false, status: 404 });
    expect(wait).not.toHaveBeenCalled();
  });

  it("honours Retry-After and caps the backoff at ten seconds", async () => {
    const results = [
      { ok: false as const, url: URL_A, reason: "HTTP 429", status: 429, retryable: true, retryAfterMs: 7000 },
      { ok: false as const, url: URL_A, reason: "HTTP 503", status: 503, retryable: true },
      { ok: true as const, url: URL_A, html: "<p>done</p>" },
    ];
    const fetcher = { fetch: vi.fn(async () => results.shift() ?? results[0]) };
    const wait = vi.fn(async (_ms: number) => {});

    await fetchWithRetry(fetcher, URL_A, { attempts: 3, backoffMs: 6000, wait });

    expect(wait.mock.calls.map(c => c[0])).toEqual([7000, 10000]);
  });
});
