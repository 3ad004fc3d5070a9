// packages/core/src/crawler/crawl.ts
import { DEFAULTS } from "../config.js";
import { FetchError } from "../errors.js";
import { logger } from "../logger.js";
import {
  type CrawlOptions,
  type CrawlResult,
  type LeafUrlRecord,
  type UploadCrawlOptions,
  type UploadedSitemap,
} from "../types/contracts.js";
import { fetchSitemapContent, maybeGunzip } from "../utils/fetch.js";
import { parseSitemap } from "../utils/sitemap.js";

const log = logger.child({ module: "crawl" });

/** Obtiene los bytes de un sitemap de la cola; lanza FetchError si no se puede */
type DocumentLoader = (ref: string) => Promise<Uint8Array>;

/** Entrada de la cola; `content` presente = documento subido, no se descarga */
interface QueueEntry {
  ref: string;
  content?: Uint8Array;
}

function resolveMaxUrls(maxUrls: number | undefined): number {
  const n = maxUrls ?? DEFAULTS.maxUrls;
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`maxUrls must be a positive integer, got ${n}`);
  }
  return n;
}

/**
 * BFS sobre documentos sitemap. Cola FIFO + set de visitados: cada sitemap
 * se procesa una sola vez aunque haya ciclos. Se detiene al llegar a maxUrls,
 * al vaciar la cola o cuando se pide cancelación (chequeado al inicio del loop).
 */
async function traverse(
  seeds: QueueEntry[],
  load: DocumentLoader,
  options: CrawlOptions,
  followChildren = true
): Promise<CrawlResult> {
  const maxUrls = resolveMaxUrls(options.maxUrls);
  const stopRequested = () => Boolean(options.signal?.aborted || options.shouldStop?.());

  const queue = [...seeds];
  const visited = new Set<string>();
  const seenUrls = new Set<string>();
  const leafUrls: LeafUrlRecord[] = [];
  const processedSitemaps: string[] = [];
  const errors: string[] = [];
  const parseErrors: string[] = [];
  let stoppedEarly = false;

  while (queue.length && leafUrls.length < maxUrls) {
    if (stopRequested()) {
      stoppedEarly = true;
      break;
    }

    const entry = queue.shift();
    if (entry === undefined) continue;
    const current = entry.ref;
    // los subidos se procesan todos aunque repitan label
    if (!entry.content && visited.has(current)) continue;
    visited.add(current);
    processedSitemaps.push(current);
    log.debug({ sitemap: current }, "processing sitemap");

    let content: Uint8Array;
    try {
      content = entry.content ?? (await load(current));
    } catch (err) {
      // abortado a mitad de descarga: no es un error del crawl
      if (options.signal?.aborted) {
        stoppedEarly = true;
        break;
      }
      // un sitemap inaccesible no aborta el crawl
      if (!(err instanceof FetchError)) throw err;
      log.warn({ sitemap: current, err: err.message }, "sitemap fetch failed");
      errors.push(err.message);
      continue;
    }

    const parsed = parseSitemap(content);
    if (parsed.parseError) {
      parseErrors.push(`Error parsing ${current}: ${parsed.parseError}`);
    }

    for (const url of parsed.leafUrls) {
      if (seenUrls.has(url)) continue;
      seenUrls.add(url);
      leafUrls.push({ url, sourceSitemap: current });
      if (leafUrls.length >= maxUrls) break;
    }

    if (!followChildren) continue;
    for (const child of parsed.childSitemaps) {
      if (!visited.has(child)) queue.push({ ref: child });
    }
  }
  if (options.signal?.aborted) stoppedEarly = true;

  log.info(
    {
      leafUrls: leafUrls.length,
      sitemaps: processedSitemaps.length,
      errors: errors.length,
      stoppedEarly,
    },
    "sitemap traversal finished"
  );

  return { leafUrls, processedSitemaps, errors, parseErrors, stoppedEarly };
}

function networkLoader(options: CrawlOptions): DocumentLoader {
  return (ref) =>
    fetchSitemapContent(ref, {
      timeoutMs: options.timeoutMs,
      identity: options.identity,
      userAgent: options.userAgent,
      signal: options.signal,
    });
}

/** Recorre un sitemap (o índice) a partir de una URL semilla */
export function crawlSitemap(seed: string, options: CrawlOptions = {}): Promise<CrawlResult> {
  return crawlSitemaps([seed], options);
}

/** Igual que crawlSitemap pero con varias semillas en orden (p. ej. las de robots.txt) */
export function crawlSitemaps(seeds: string[], options: CrawlOptions = {}): Promise<CrawlResult> {
  return traverse(
    seeds.map((ref) => ({ ref })),
    networkLoader(options),
    options
  );
}

/**
 * Recorre documentos ya descargados; cada `label` queda como sourceSitemap.
 * Los sitemaps hijos solo se descargan con `followChildSitemaps`.
 */
export function crawlUploadedSitemaps(
  documents: UploadedSitemap[],
  options: UploadCrawlOptions = {}
): Promise<CrawlResult> {
  const entries = documents.map((doc) => ({
    ref: doc.label,
    content: maybeGunzip(doc.content, doc.label),
  }));
  return traverse(entries, networkLoader(options), options, Boolean(options.followChildSitemaps));
}
