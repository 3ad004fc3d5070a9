// packages/core/src/utils/sitemap.ts
import * as cheerio from "cheerio";
import { isTag, type Element } from "domhandler";
import { XMLValidator } from "fast-xml-parser";
import type { ParsedSitemap } from "../types/contracts.js";

const decoder = new TextDecoder("utf-8");

/** Nombre local de un tag: "sm:url" → "url" (XML distingue mayúsculas) */
function localName(el: Element): string {
  const name = el.name;
  const colon = name.lastIndexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

function validate(text: string): string | null {
  const res = XMLValidator.validate(text);
  if (res === true) return null;
  return `${res.err.msg} (line ${res.err.line})`;
}

/**
 * Clasifica cada <loc> según su padre inmediato: <url> → URL final,
 * <sitemap> → sitemap hijo; cualquier otro padre se ignora.
 * Nunca lanza: con markup roto devuelve lo que se pudo recuperar.
 */
export function parseSitemap(content: Uint8Array | string): ParsedSitemap {
  const text = typeof content === "string" ? content : decoder.decode(content);
  const leafUrls: string[] = [];
  const childSitemaps: string[] = [];
  if (!text.trim()) return { leafUrls, childSitemaps, parseError: null };

  const $ = cheerio.load(text, { xml: true });
  $<Element, "*">("*").each((_i: number, el: Element) => {
    if (localName(el) !== "loc") return;
    const parent = el.parent;
    if (!parent || !isTag(parent)) return;

    const loc = $(el).text().trim();
    if (!loc) return;

    const kind = localName(parent);
    if (kind === "url") leafUrls.push(loc);
    else if (kind === "sitemap") childSitemaps.push(loc);
  });

  return { leafUrls, childSitemaps, parseError: validate(text) };
}
