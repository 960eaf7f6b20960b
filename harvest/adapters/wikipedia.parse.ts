import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { SENTINEL } from "../adapter.types.js";
import { textOf } from "../utils/dom.js";
import { cleanText, isSentinel, smartTitleCase } from "../utils/text.js";

export const WIKI_BASE = "https://en.wikipedia.org";

export type WikiFields = {
  name: string;
  city: string;
  country: string;
  website: string;
};

export function wikiUrl(title: string) {
  return `${WIKI_BASE}/wiki/${encodeURIComponent(title.replace(/ /g, "_")).replace(/%2C/g, ",")}`;
}

type InfoboxRow = { label: string; cell: Cheerio<Element> };

function infoboxRows($: CheerioAPI): InfoboxRow[] {
  const rows: InfoboxRow[] = [];
  $("table.infobox").first().find("tr").each((_i, tr) => {
    const th = $(tr).find("th").first();
    const td = $(tr).find("td").first();
    if (!th.length || !td.length) return;
    rows.push({ label: textOf(th.get(0)).toLowerCase(), cell: td });
  });
  return rows;
}

/**
 * "Gachibowli, Hyderabad, Telangana, 500046, India" -> city "Gachibowli", country "India".
 * Parts carrying digits (pin codes, coordinates) or bare compass letters are dropped.
 */
export function splitLocation(raw: string): { city: string; country: string } {
  if (isSentinel(raw)) return { city: SENTINEL, country: SENTINEL };

  const parts = raw
    .replace(/\[[^\]]*\]/g, "")
    .split(",")
    .map(p => cleanText(p))
    .filter(p => !isSentinel(p) && !/\d/.test(p) && !/\b[NSWE]\b/.test(p));

  if (!parts.length) return { city: SENTINEL, country: SENTINEL };
  if (parts.length === 1) return { city: smartTitleCase(parts[0]), country: SENTINEL };
  return { city: smartTitleCase(parts[0]), country: smartTitleCase(parts[parts.length - 1]) };
}

function absoluteHref(href: string, pageUrl: string): string {
  if (/^https?:\/\//i.test(href)) return href;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return href;
  }
}

export function parseWikipediaPage(html: string, pageUrl = WIKI_BASE): WikiFields {
  const $ = load(html);
  const name = textOf($("#firstHeading").get(0));
  const rows = infoboxRows($);

  const locationRow = rows.find(r => r.label === "location" || r.label === "address");
  const { city, country } = splitLocation(locationRow ? textOf(locationRow.cell.get(0)) : SENTINEL);

  let website = SENTINEL;
  const websiteRow = rows.find(r => r.label === "website");
  if (websiteRow) {
    const href = cleanText(websiteRow.cell.find("a[href]").first().attr("href"));
    website = isSentinel(href) ? textOf(websiteRow.cell.get(0)) : absoluteHref(href, pageUrl);
  }

  return { name, city, country, website };
}
