export { auditSitemap, auditUploadedSitemaps } from "./audit/pipeline.js";
export { probeUrl, parseRobotsDirectives, isBinaryContentType } from "./audit/indexability.js";
export { runProbes } from "./audit/scheduler.js";
export { summarizeProbes } from "./audit/report.js";
export { crawlSitemap, crawlSitemaps, crawlUploadedSitemaps } from "./crawler/crawl.js";
export { fetchSitemapContent, maybeGunzip, identityHeaders } from "./utils/fetch.js";
export { parseSitemap } from "./utils/sitemap.js";
export { discoverSitemaps } from "./utils/robots.js";
export { DEFAULTS, loadConfig, type CrawlerConfig } from "./config.js";
export { CrawlerError, FetchError, ConfigError, describeProbeError } from "./errors.js";
export { logger, type Logger } from "./logger.js";
export type * from "./types/contracts.js";
