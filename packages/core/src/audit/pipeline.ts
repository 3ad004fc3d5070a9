// packages/core/src/audit/pipeline.ts
import { crawlSitemap, crawlUploadedSitemaps } from "../crawler/crawl.js";
import { logger } from "../logger.js";
import type {
  AuditOptions,
  AuditOutput,
  CrawlResult,
  SeoProbeResult,
  UploadCrawlOptions,
  UploadedSitemap,
} from "../types/contracts.js";
import { summarizeProbes } from "./report.js";
import { runProbes } from "./scheduler.js";

const log = logger.child({ module: "pipeline" });

async function probeCrawl(crawl: CrawlResult, options: AuditOptions): Promise<AuditOutput> {
  const urls = crawl.leafUrls.map((l) => l.url);

  let probes: SeoProbeResult[] = [];
  let probeStopped = false;
  if (options.probe !== false && !crawl.stoppedEarly && urls.length) {
    probes = await runProbes(urls, {
      concurrency: options.concurrency,
      onProgress: options.onProgress,
      shouldStop: options.shouldStop,
      signal: options.signal,
      probeOptions: options.probeOptions,
    });
    probeStopped = probes.length < urls.length;
  }

  const stoppedEarly = crawl.stoppedEarly || probeStopped;
  return { crawl, probes, summary: summarizeProbes(probes), stoppedEarly };
}

/**
 * Sitemap → URLs finales → probes SEO.
 * La misma cancelación (`shouldStop`/`signal`) gobierna ambas etapas.
 */
export async function auditSitemap(seed: string, options: AuditOptions = {}): Promise<AuditOutput> {
  const out = await probeCrawl(await crawlSitemap(seed, options), options);
  log.info(
    { seed, urls: out.crawl.leafUrls.length, probed: out.probes.length, stoppedEarly: out.stoppedEarly },
    "audit finished"
  );
  return out;
}

/** Igual que auditSitemap sobre documentos subidos */
export async function auditUploadedSitemaps(
  documents: UploadedSitemap[],
  options: AuditOptions & UploadCrawlOptions = {}
): Promise<AuditOutput> {
  const out = await probeCrawl(await crawlUploadedSitemaps(documents, options), options);
  log.info(
    {
      documents: documents.length,
      urls: out.crawl.leafUrls.length,
      probed: out.probes.length,
      stoppedEarly: out.stoppedEarly,
    },
    "upload audit finished"
  );
  return out;
}
