import { SENTINEL, TARGET_COUNTRY, type RawUniversity, type ResolveResult, type UniversityTarget } from "../adapter.types.js";
import { fetchWithRetry, type PageFetcher } from "../utils/httpHtml.js";
import { cleanText, isSentinel, smartTitleCase } from "../utils/text.js";
import { parseProfileMeta, profileUrl } from "./topuniversities.parse.js";
import { parseWikipediaPage, wikiUrl, type WikiFields } from "./wikipedia.parse.js";

const SLUG_STOP_WORDS = new Set(["of", "the", "and"]);

// "National Institute of Technology, Warangal" -> "national-institute-technology-warangal"
export function slugFor(target: UniversityTarget): string {
  if (target.slug) return target.slug;
  return target.name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(w => w && !SLUG_STOP_WORDS.has(w))
    .join("-");
}

export function wikiTitleFor(target: UniversityTarget): string {
  return target.wikiTitle ?? cleanText(target.name).replace(/ /g, "_");
}

const pick = (primary: string, fallback: string) => (isSentinel(primary) ? fallback : primary);

export type ResolverOptions = {
  fetcher: PageFetcher;
  fetchAttempts?: number;
  wait?: (ms: number) => Promise<void>;
};

export interface UniversityResolver {
  resolve(target: UniversityTarget): Promise<ResolveResult>;
}

export function createUniversityResolver(opts: ResolverOptions): UniversityResolver {
  const retry = { attempts: opts.fetchAttempts ?? 3, wait: opts.wait };

  async function secondary(target: UniversityTarget): Promise<WikiFields> {
    const url = wikiUrl(wikiTitleFor(target));
    const res = await fetchWithRetry(opts.fetcher, url, retry);
    if (!res.ok) {
      console.warn(`  Encyclopedia page unavailable (${res.reason}): ${url}`);
      return { name: SENTINEL, city: SENTINEL, country: SENTINEL, website: SENTINEL };
    }
    return parseWikipediaPage(res.html, url);
  }

  return {
    async resolve(target) {
      const slug = slugFor(target);
      const url = profileUrl(slug);
      const primary = await fetchWithRetry(opts.fetcher, url, retry);
      if (!primary.ok) {
        return { ok: false, reason: "fetch-failed", detail: `${url} -> ${primary.reason}` };
      }

      const meta = parseProfileMeta(primary.html);
      const wiki = await secondary(target);

      // primary source wins; the encyclopedia only fills gaps
      const country = smartTitleCase(pick(meta.country, wiki.country));
      if (country.toLowerCase() !== TARGET_COUNTRY.toLowerCase()) {
        return { ok: false, reason: "not-india", detail: `country resolved as ${country}` };
      }

      const university: RawUniversity = {
        university_name: pick(pick(meta.name, wiki.name), cleanText(target.name)),
        country,
        city: smartTitleCase(pick(meta.city, wiki.city)),
        website: wiki.website.startsWith("http") ? wiki.website : SENTINEL,
      };
      return { ok: true, university, slug, profileHtml: primary.html };
    },
  };
}
