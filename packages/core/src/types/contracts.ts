// ---------------------------
// FETCH TYPES
// ---------------------------
export type Identity = "chrome" | "googlebot";

export interface FetchOptions {
  timeoutMs?: number;
  identity?: Identity;
  userAgent?: string;        // reemplaza el User-Agent de la identidad
  signal?: AbortSignal;
}

// ---------------------------
// CRAWL TYPES
// ---------------------------
export interface ParsedSitemap {
  leafUrls: string[];
  childSitemaps: string[];
  /** Mensaje del validador si el documento no es XML bien formado */
  parseError: string | null;
}

export interface LeafUrlRecord {
  url: string;
  sourceSitemap: string;
}

export interface CrawlOptions extends FetchOptions {
  maxUrls?: number;          // default: env CRAWLER_MAX_URLS
  shouldStop?: () => boolean;
}

export interface UploadedSitemap {
  label: string;             // procedencia registrada como sourceSitemap
  content: Uint8Array;
}

export interface UploadCrawlOptions extends CrawlOptions {
  /** Descargar sitemaps hijos referenciados por índices subidos */
  followChildSitemaps?: boolean;
}

export interface CrawlResult {
  leafUrls: LeafUrlRecord[];
  /** Sitemaps en el orden en que salieron de la cola */
  processedSitemaps: string[];
  errors: string[];
  parseErrors: string[];
  stoppedEarly: boolean;
}

// ---------------------------
// PROBE TYPES
// ---------------------------
export type NoindexSource = "Header" | "Meta" | "Both";

export interface RobotsDirectives {
  noindex?: boolean;
  nofollow?: boolean;
  noarchive?: boolean;
  nosnippet?: boolean;
  noimageindex?: boolean;
}

export interface SeoProbeResult {
  url: string;
  finalStatus: number | null;
  redirectLocation: string | null;
  canonical: string | null;
  canonicalMatch: boolean;
  noindex: boolean;
  noindexSource: NoindexSource | null;
  fetchError: string | null;
}

export interface ProbeOptions extends FetchOptions {
  maxBodyBytes?: number;
}

export type ProbeFn = (url: string, signal: AbortSignal) => Promise<SeoProbeResult>;

export interface ProbeRunOptions {
  concurrency?: number;
  /** Se invoca tras cada probe completado con completados / total */
  onProgress?: (fraction: number) => void;
  shouldStop?: () => boolean;
  signal?: AbortSignal;
  retryDelayMs?: number;
  probeOptions?: Omit<ProbeOptions, "signal">;
  /** Reemplaza probeUrl (p. ej. otro cliente HTTP) */
  probe?: ProbeFn;
}

export interface StatusBuckets {
  "0xx": number;
  "2xx": number;
  "3xx": number;
  "4xx": number;
  "5xx": number;
}

export interface ProbeSummary {
  total: number;
  ok: number;
  redirects: number;
  errors: number;
  noindex: number;
  nonCanonical: number;
  statusBuckets: StatusBuckets;
}

// ---------------------------
// PIPELINE TYPES
// ---------------------------
export interface AuditOptions extends CrawlOptions {
  probe?: boolean;           // default: true
  concurrency?: number;
  onProgress?: (fraction: number) => void;
  probeOptions?: Omit<ProbeOptions, "signal">;
}

export interface AuditOutput {
  crawl: CrawlResult;
  probes: SeoProbeResult[];
  summary: ProbeSummary;
  stoppedEarly: boolean;
}
