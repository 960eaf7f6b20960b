import { load, type CheerioAPI } from "cheerio";
import { SENTINEL } from "../adapter.types.js";
import { isJsonObject, jsonLdObjects, textOf, type JsonObject } from "../utils/dom.js";
import { cleanText, isSentinel, smartTitleCase } from "../utils/text.js";

export const TOPUNI_BASE = "https://www.topuniversities.com";

const LEVEL_BY_SEGMENT = new Map<string, string>([
  ["undergrad", "Bachelor"],
  ["bachelors", "Bachelor"],
  ["masters", "Master"],
  ["postgrad", "Master"],
  ["phd", "PhD"],
  ["mba", "MBA"],
  ["diploma", "Diploma"],
  ["cert", "Certificate"],
  ["foundation", "Foundation"],
]);

export type ProfileMeta = {
  name: string;
  city: string;
  country: string;
};

export type CourseFields = {
  course_name: string;
  level: string;
  discipline: string;
  duration: string;
  fees: string;
  eligibility: string;
};

export function profileUrl(slug: string) {
  return `${TOPUNI_BASE}/universities/${slug}`;
}

function firstAddress(obj: JsonObject): { city: string; country: string } | null {
  const departments = Array.isArray(obj.department) ? obj.department : [];
  const addresses = [obj.address, ...departments.map(d => (isJsonObject(d) ? d.address : undefined))];
  for (const address of addresses) {
    if (!isJsonObject(address)) continue;
    const city = smartTitleCase(address.addressLocality);
    const country = smartTitleCase(address.addressCountry);
    if (!isSentinel(city) || !isSentinel(country)) return { city, country };
  }
  return null;
}

/** Name, city and country from the profile page's JSON-LD, with the <h1> as name fallback. */
export function parseProfileMeta(html: string): ProfileMeta {
  const $ = load(html);
  const meta: ProfileMeta = { name: SENTINEL, city: SENTINEL, country: SENTINEL };

  for (const obj of jsonLdObjects($)) {
    const type = obj["@type"];
    const mainEntity = obj.mainEntity;
    if (type === "ProfilePage" && isJsonObject(mainEntity)) {
      const name = cleanText(mainEntity.name ?? obj.name);
      if (!isSentinel(name)) meta.name = name;
    }
    if (type === "CollegeOrUniversity") {
      const name = cleanText(obj.name);
      if (!isSentinel(name)) meta.name = name;
      const address = firstAddress(obj);
      if (address) {
        meta.city = address.city;
        meta.country = address.country;
      }
    }
  }

  if (isSentinel(meta.name)) meta.name = textOf($("h1").get(0));
  return meta;
}

/**
 * Programme pages look like /universities/<slug>/<level>/<programme>. Query and
 * fragment are dropped; result is absolute, unique and in page order.
 */
export function parseProgramLinks(html: string, slug: string, base = TOPUNI_BASE): string[] {
  const $ = load(html);
  const host = new URL(base).host;
  const prefix = `/universities/${slug}/`;
  const seen = new Set<string>();
  const out: string[] = [];

  $("a[href]").each((_i, a) => {
    const href = cleanText($(a).attr("href"));
    if (isSentinel(href)) return;

    let url: URL;
    try {
      url = new URL(href, base);
    } catch {
      return;
    }
    if (url.host !== host || !url.pathname.startsWith(prefix)) return;

    const parts = url.pathname.replace(/^\/+|\/+$/g, "").split("/");
    if (parts.length < 4 || !LEVEL_BY_SEGMENT.has(parts[2].toLowerCase())) return;

    const normalized = `${url.origin}${url.pathname}`;
    if (seen.has(normalized)) return;
    seen.add(normalized);
    out.push(normalized);
  });

  return out;
}

function badges($: CheerioAPI): Map<string, string> {
  const out = new Map<string, string>();
  $("div.single-badge").each((_i, el) => {
    const title = textOf($(el).find("span.single-badge-title").get(0));
    let value = textOf($(el).find("div.badge-description h3").get(0));
    if (isSentinel(title) || isSentinel(value)) return;
    // the badge heading repeats its caption: "4 years Programme duration"
    if (value.toLowerCase().endsWith(title.toLowerCase())) value = cleanText(value.slice(0, -title.length));
    out.set(title.toLowerCase(), value);
  });
  return out;
}

function highlights($: CheerioAPI): Map<string, string> {
  const out = new Map<string, string>();
  $("div.prog-view-highli").each((_i, el) => {
    const key = textOf($(el).find("h3").get(0)).toLowerCase();
    const value = textOf($(el).find("p").get(0));
    if (isSentinel(value) || key === SENTINEL.toLowerCase() || out.has(key)) return;
    out.set(key, value);
  });
  return out;
}

const ELIGIBILITY_HEADING = /admission|eligibility|entry requirement/;
const HEADING_TAG = /^h[234]$/;

function eligibility($: CheerioAPI): string {
  const pairs: string[] = [];
  $("div.univ-entry").each((_i, el) => {
    const label = textOf($(el).find(".univ-entry-label").get(0));
    const value = textOf($(el).find(".univ-entry-value").get(0));
    if (!isSentinel(label) && !isSentinel(value)) pairs.push(`${label}: ${value}`);
    return pairs.length < 5;
  });
  if (pairs.length) return pairs.join("; ");

  // Document order, so a heading wrapped in its own container still finds the block after it.
  const nodes = $("h2, h3, h4, p, li, div").toArray();
  for (const [i, h] of nodes.entries()) {
    if (!HEADING_TAG.test(h.name) || !ELIGIBILITY_HEADING.test(textOf(h).toLowerCase())) continue;
    for (const block of nodes.slice(i + 1)) {
      if (HEADING_TAG.test(block.name)) continue;
      const text = textOf(block);
      if (!isSentinel(text)) return cleanText(text.slice(0, 220));
    }
  }
  return SENTINEL;
}

function urlLevelSegment(courseUrl: string): string {
  try {
    return new URL(courseUrl).pathname.replace(/^\/+/, "").split("/")[2]?.toLowerCase() ?? "";
  } catch {
    return "";
  }
}

export function normalizeLevel(raw: string, courseUrl: string): string {
  const value = cleanText(raw).toLowerCase();
  if (value.includes("undergraduate") || value.includes("bachelor")) return "Bachelor";
  if (value.includes("postgraduate") || value.includes("master")) return "Master";
  if (value.includes("phd") || value.includes("doctoral")) return "PhD";
  if (value.includes("diploma")) return "Diploma";
  if (value.includes("certificate")) return "Certificate";
  if (value.includes("mba")) return "MBA";
  return LEVEL_BY_SEGMENT.get(urlLevelSegment(courseUrl)) ?? SENTINEL;
}

const DEGREE_PREFIX = /^(Bachelor|Master|BA|BSc|MSc|MA|PhD|Doctor of|Diploma in)\b\s*(of|in)?\s*/i;

export function guessDiscipline(courseName: string, courseUrl: string): string {
  const name = cleanText(courseName);
  if (!isSentinel(name)) {
    const subject = name.replace(DEGREE_PREFIX, "").trim();
    if (subject && subject.split(/\s+/).length <= 6) return smartTitleCase(subject);
  }
  const slug = courseUrl.replace(/\/+$/, "").split("/").pop() ?? "";
  return smartTitleCase(slug.replace(/-/g, " "));
}

function firstKnown(...values: (string | undefined)[]): string {
  for (const v of values) {
    const text = cleanText(v);
    if (!isSentinel(text)) return text;
  }
  return SENTINEL;
}

export function parseCoursePage(html: string, courseUrl: string): CourseFields {
  const $ = load(html);
  const course_name = textOf($("h1").get(0));
  const badge = badges($);
  const highlight = highlights($);

  return {
    course_name,
    level: normalizeLevel(highlight.get("study level") ?? SENTINEL, courseUrl),
    discipline: smartTitleCase(
      firstKnown(highlight.get("main subject"), badge.get("main subject area"), guessDiscipline(course_name, courseUrl)),
    ),
    duration: firstKnown(badge.get("programme duration"), badge.get("duration")),
    fees: firstKnown(badge.get("tuition fee/year"), badge.get("tuition fee")),
    eligibility: eligibility($),
  };
}
