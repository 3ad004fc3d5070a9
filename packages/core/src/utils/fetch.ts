// packages/core/src/utils/fetch.ts
import { gunzipSync } from "node:zlib";
import { DEFAULTS } from "../config.js";
import { FetchError, transportCause } from "../errors.js";
import type { FetchOptions, Identity } from "../types/contracts.js";

/** UA de navegador por defecto para evitar bloqueos por WAF/anti-bot */
export const BROWSER_UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export const GOOGLEBOT_UA =
  "Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)";

/** Headers por identidad; `userAgent` reemplaza el UA del perfil */
export function identityHeaders(identity: Identity, userAgent?: string): Record<string, string> {
  if (identity === "googlebot") {
    return { "User-Agent": userAgent ?? GOOGLEBOT_UA };
  }
  return {
    "User-Agent": userAgent ?? BROWSER_UA,
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "accept-language": "en-US,en;q=0.9",
  };
}

export interface TimedSignal {
  signal: AbortSignal;
  timedOut: () => boolean;
  clear: () => void;
}

/** AbortSignal que se dispara tras `ms` o cuando aborta `parent`, lo que ocurra primero */
export function timeoutSignal(ms: number, parent?: AbortSignal): TimedSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timeout after ${ms}ms`));
  }, ms);
  timer.unref();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    clear: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/** Descomprime si parece gzip (magic bytes o sufijo .gz); si falla devuelve los bytes tal cual */
export function maybeGunzip(bytes: Uint8Array, name = ""): Uint8Array {
  if (!isGzip(bytes) && !name.toLowerCase().endsWith(".gz")) return bytes;
  try {
    return gunzipSync(bytes);
  } catch {
    return bytes;
  }
}

/**
 * Descarga un documento sitemap y lo devuelve descomprimido.
 * Sigue redirects; una respuesta final no-2xx se reporta como FetchError.
 */
export async function fetchSitemapContent(
  url: string,
  options: FetchOptions = {}
): Promise<Uint8Array> {
  const timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  const identity = options.identity ?? DEFAULTS.identity;
  const timed = timeoutSignal(timeoutMs, options.signal);

  try {
    const res = await fetch(url, {
      headers: identityHeaders(identity, options.userAgent ?? DEFAULTS.userAgent),
      redirect: "follow",
      signal: timed.signal,
    });
    if (!res.ok) {
      await res.body?.cancel();
      throw new FetchError(url, `HTTP ${res.status}`, { status: res.status });
    }
    const body = new Uint8Array(await res.arrayBuffer());
    return maybeGunzip(body, url);
  } catch (err) {
    if (err instanceof FetchError) throw err;
    if (timed.timedOut()) {
      throw new FetchError(url, `Timeout after ${timeoutMs}ms`, { cause: err });
    }
    const detail = transportCause(err) ?? (err instanceof Error ? err.message : String(err));
    throw new FetchError(url, detail, { cause: err });
  } finally {
    timed.clear();
  }
}
