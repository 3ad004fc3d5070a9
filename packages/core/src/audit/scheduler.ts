// packages/core/src/audit/scheduler.ts
import pLimit from "p-limit";
import { setTimeout as wait } from "node:timers/promises";
import { DEFAULTS } from "../config.js";
import { logger } from "../logger.js";
import { type ProbeFn, type ProbeRunOptions, type SeoProbeResult } from "../types/contracts.js";
import { probeUrl } from "./indexability.js";

const log = logger.child({ module: "scheduler" });

/** Primer intento y, si trae fetchError, un único reintento tras `delayMs` */
async function probeWithRetry(
  probe: ProbeFn,
  url: string,
  delayMs: number,
  signal: AbortSignal
): Promise<SeoProbeResult> {
  const first = await probe(url, signal);
  if (!first.fetchError) return first;
  await wait(delayMs, undefined, { signal });
  return probe(url, signal);
}

/**
 * Ejecuta el probe sobre cada URL con como mucho `concurrency` en vuelo.
 * El slot de p-limit se retiene durante ambos intentos de una URL.
 * Los resultados se devuelven en orden de finalización. Si se pide cancelación
 * (chequeada en cada finalización, o vía `signal`), se vacía la cola, se abortan
 * los requests en vuelo y se devuelve lo aceptado hasta ese momento.
 */
export async function runProbes(
  urls: string[],
  options: ProbeRunOptions = {}
): Promise<SeoProbeResult[]> {
  const concurrency = options.concurrency ?? DEFAULTS.maxConcurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const retryDelayMs = options.retryDelayMs ?? DEFAULTS.retryDelayMs;
  const probe: ProbeFn =
    options.probe ?? ((url, signal) => probeUrl(url, { ...options.probeOptions, signal }));

  const results: SeoProbeResult[] = [];
  const total = urls.length;
  if (total === 0 || options.signal?.aborted || options.shouldStop?.()) return results;

  const limit = pLimit(concurrency);
  const controller = new AbortController();
  const halted = new Promise<void>((resolve) => {
    controller.signal.addEventListener("abort", () => resolve(), { once: true });
  });

  const stop = () => {
    if (controller.signal.aborted) return;
    limit.clearQueue();
    controller.abort(new Error("Probe run cancelled"));
  };
  options.signal?.addEventListener("abort", stop, { once: true });

  log.info({ total, concurrency }, "probing started");

  const accept = (res: SeoProbeResult) => {
    if (controller.signal.aborted) return;
    if (options.shouldStop?.()) {
      stop();
      return;
    }
    results.push(res);
    options.onProgress?.(results.length / total);
  };
  // tras cancelar, los rechazos de requests abortados ya no importan
  const reject = (err: unknown) => {
    if (controller.signal.aborted) return;
    throw err;
  };

  const tasks = urls.map((url) =>
    limit(() => probeWithRetry(probe, url, retryDelayMs, controller.signal)).then(accept, reject)
  );

  try {
    await Promise.race([Promise.all(tasks), halted]);
  } catch (err) {
    stop();
    throw err;
  } finally {
    options.signal?.removeEventListener("abort", stop);
  }

  log.info(
    { completed: results.length, total, cancelled: controller.signal.aborted },
    "probing finished"
  );
  return results;
}
