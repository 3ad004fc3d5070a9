import robotsParserLib from "robots-parser";
import { FetchError } from "../errors.js";
import { logger } from "../logger.js";
import type { FetchOptions } from "../types/contracts.js";
import { fetchSitemapContent } from "./fetch.js";

type ParserWithSitemaps = {
  getSitemaps?: () => string[] | null;
};

/** Cast robusto para evitar "no call signatures" */
type RobotsParserFactory = (robotsUrl: string, body: string) => ParserWithSitemaps;
const robotsParser = robotsParserLib as unknown as RobotsParserFactory;

const log = logger.child({ module: "robots" });
const decoder = new TextDecoder("utf-8");

/**
 * Combina los sitemaps declarados en robots.txt con la conjetura estándar
 * /sitemap.xml. Devuelve endpoints de sitemap (no las URLs que contienen).
 * Si robots.txt es inaccesible, solo se devuelve la conjetura.
 */
export async function discoverSitemaps(
  siteUrl: string,
  options: FetchOptions = {}
): Promise<string[]> {
  const origin = new URL(siteUrl).origin;
  const robotsUrl = new URL("/robots.txt", origin).toString();
  const found: string[] = [];

  try {
    const body = decoder.decode(await fetchSitemapContent(robotsUrl, options));
    for (const sm of robotsParser(robotsUrl, body).getSitemaps?.() ?? []) {
      if (!found.includes(sm)) found.push(sm);
    }
  } catch (err) {
    if (!(err instanceof FetchError)) throw err;
    log.warn({ robotsUrl, err: err.message }, "robots.txt unavailable");
  }

  const guess = new URL("/sitemap.xml", origin).toString();
  if (!found.includes(guess)) found.push(guess);
  log.debug({ siteUrl, sitemaps: found }, "sitemaps discovered");
  return found;
}
