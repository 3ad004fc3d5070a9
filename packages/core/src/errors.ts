/** Clase base de los errores del crawler */
export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No se pudo obtener un sitemap (red, timeout o status no-2xx) */
export class FetchError extends CrawlerError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, detail: string, options?: { status?: number; cause?: unknown }) {
    super(`Error fetching ${url}: ${detail}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status ?? null;
  }
}

export class ConfigError extends CrawlerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** undici reporta fallos de red como TypeError("fetch failed") con el error del socket en `cause` */
export function transportCause(err: unknown): string | null {
  if (!(err instanceof TypeError)) return null;
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? ` (${cause.code})` : "";
    return `${cause.message}${code}`;
  }
  return err.message;
}

/** Traduce un fallo del probe al valor de `fetchError` */
export function describeProbeError(err: unknown, timedOut: boolean): string {
  if (timedOut) return "Timeout";
  const transport = transportCause(err);
  if (transport !== null) return `ClientError: ${transport}`;
  if (err instanceof Error) return `Error: ${err.message}`;
  return `Error: ${String(err)}`;
}
