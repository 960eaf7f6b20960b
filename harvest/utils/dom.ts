import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";
import { SENTINEL } from "../adapter.types.js";
import { cleanText } from "./text.js";

function collectText(node: AnyNode, out: string[]) {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (isTag(node) && (node.name === "script" || node.name === "style")) return;
  if (hasChildren(node)) node.children.forEach(c => collectText(c, out));
}

/**
 * Text content with a space between every text node, so adjacent inline
 * elements ("<b>4</b><span>years</span>") don't run together.
 */
export function textOf(node: AnyNode | undefined): string {
  if (!node) return SENTINEL;
  const out: string[] = [];
  collectText(node, out);
  return cleanText(out.join(" "));
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tryParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Every object from the page's JSON-LD blocks; arrays and @graph containers are flattened. */
export function jsonLdObjects($: CheerioAPI): JsonObject[] {
  const out: JsonObject[] = [];
  const push = (v: unknown) => {
    if (Array.isArray(v)) v.forEach(push);
    else if (isJsonObject(v)) {
      out.push(v);
      const graph = v["@graph"];
      if (Array.isArray(graph)) graph.forEach(push);
    }
  };
  $('script[type="application/ld+json"]').each((_i, el) => {
    const raw = $(el).text().trim();
    if (raw) push(tryParseJson(raw));
  });
  return out;
}
