// packages/core/src/audit/indexability.ts
import type { ReadableStream } from "node:stream/web";
import * as cheerio from "cheerio";
import { DEFAULTS } from "../config.js";
import { describeProbeError } from "../errors.js";
import { logger } from "../logger.js";
import {
  type NoindexSource,
  type ProbeOptions,
  type RobotsDirectives,
  type SeoProbeResult,
} from "../types/contracts.js";
import { identityHeaders, timeoutSignal } from "../utils/fetch.js";

const log = logger.child({ module: "probe" });

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

const BINARY_TYPES = new Set([
  "application/pdf",
  "application/octet-stream",
  "application/zip",
  "application/gzip",
  "application/x-gzip",
  "application/x-tar",
  "application/x-7z-compressed",
  "application/x-rar-compressed",
  "application/vnd.rar",
  "application/x-bzip2",
]);

/** true para imagen/pdf/video/audio/archivos comprimidos/octet-stream */
export function isBinaryContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return (
    mime.startsWith("image/") ||
    mime.startsWith("video/") ||
    mime.startsWith("audio/") ||
    BINARY_TYPES.has(mime)
  );
}

/**
 * Parse de directivas robots (meta o header) en forma booleana.
 * noindex: el valor contiene "noindex" o "none", sin distinguir mayúsculas.
 */
export function parseRobotsDirectives(raw: string | null | undefined): RobotsDirectives {
  const out: RobotsDirectives = {};
  if (!raw) return out;
  const lower = raw.toLowerCase();
  if (lower.includes("noindex") || lower.includes("none")) out.noindex = true;

  // tokens separados por coma, punto y coma o espacios; "googlebot: noindex" pierde el prefijo
  const tokens = lower
    .split(/[\s,;]+/g)
    .map((t) => (t.includes(":") ? t.slice(t.lastIndexOf(":") + 1) : t))
    .filter(Boolean);

  for (const t of tokens) {
    if (t === "nofollow" || t === "none") out.nofollow = true;
    else if (t === "noarchive") out.noarchive = true;
    else if (t === "nosnippet") out.nosnippet = true;
    else if (t === "noimageindex") out.noimageindex = true;
    // max-snippet, max-image-preview, unavailable_after, etc. no afectan la indexación
  }
  return out;
}

/** Lee como mucho `cap` bytes del body y cancela el resto del stream */
export async function readBodyPrefix(
  body: ReadableStream<Uint8Array> | null,
  cap: number
): Promise<Uint8Array> {
  if (!body) return new Uint8Array(0);
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  try {
    while (size < cap) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      size += value.byteLength;
    }
    if (size >= cap) await reader.cancel();
  } finally {
    reader.releaseLock();
  }
  return Buffer.concat(chunks).subarray(0, cap);
}

/** Extrae meta robots y canonical del HTML (posiblemente truncado) */
function extractHtmlSignals(html: string): {
  metaNoindex: boolean;
  canonical: string | null;
} {
  const $ = cheerio.load(html);
  const meta = $('meta[name="robots" i]').first();
  const metaNoindex = meta.length > 0 && Boolean(parseRobotsDirectives(meta.attr("content")).noindex);
  const canonical = $('link[rel~="canonical" i]').first().attr("href") ?? null;
  return { metaNoindex, canonical };
}

function emptyResult(url: string): SeoProbeResult {
  return {
    url,
    finalStatus: null,
    redirectLocation: null,
    canonical: null,
    canonicalMatch: false,
    noindex: false,
    noindexSource: null,
    fetchError: null,
  };
}

/**
 * Un GET sin seguir redirects y extracción de señales SEO:
 * status, Location, X-Robots-Tag, meta robots y canonical (comparado 1:1 con la URL).
 * Nunca lanza: los fallos quedan en `fetchError`.
 */
export async function probeUrl(url: string, options: ProbeOptions = {}): Promise<SeoProbeResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULTS.probeTimeoutMs;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULTS.maxBodyBytes;
  const identity = options.identity ?? DEFAULTS.probeIdentity;
  const timed = timeoutSignal(timeoutMs, options.signal);
  const result = emptyResult(url);

  try {
    const res = await fetch(url, {
      headers: identityHeaders(identity, options.userAgent ?? DEFAULTS.userAgent),
      redirect: "manual",
      signal: timed.signal,
    });
    result.finalStatus = res.status;

    // Redirect: no se lee el body, canonical/noindex quedan por defecto
    if (REDIRECT_STATUSES.has(res.status)) {
      result.redirectLocation = res.headers.get("location");
      await res.body?.cancel();
      return result;
    }

    // headers.get une múltiples X-Robots-Tag con ", "
    const headerNoindex = Boolean(parseRobotsDirectives(res.headers.get("x-robots-tag")).noindex);
    if (headerNoindex) {
      result.noindex = true;
      result.noindexSource = "Header";
    }

    if (isBinaryContentType(res.headers.get("content-type"))) {
      await res.body?.cancel();
      return result;
    }

    const prefix = await readBodyPrefix(res.body, maxBodyBytes);
    const html = new TextDecoder("utf-8").decode(prefix);
    const { metaNoindex, canonical } = extractHtmlSignals(html);

    if (metaNoindex) {
      const source: NoindexSource = result.noindexSource ? "Both" : "Meta";
      result.noindex = true;
      result.noindexSource = source;
    }

    if (canonical !== null) {
      result.canonical = canonical;
      // comparación estricta: sin normalizar slash, esquema ni query
      result.canonicalMatch = canonical === url;
    }
    return result;
  } catch (err) {
    const fetchError = describeProbeError(err, timed.timedOut());
    log.debug({ url, fetchError }, "probe failed");
    return { ...emptyResult(url), finalStatus: result.finalStatus, fetchError };
  } finally {
    timed.clear();
  }
}
