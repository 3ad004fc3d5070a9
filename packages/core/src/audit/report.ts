// packages/core/src/audit/report.ts
import type { ProbeSummary, SeoProbeResult, StatusBuckets } from "../types/contracts.js";
import { REDIRECT_STATUSES } from "./indexability.js";

/** Conteos derivados para el tablero: status, redirects, errores, noindex y canonical */
export function summarizeProbes(results: SeoProbeResult[]): ProbeSummary {
  const statusBuckets: StatusBuckets = { "0xx": 0, "2xx": 0, "3xx": 0, "4xx": 0, "5xx": 0 };
  let ok = 0;
  let redirects = 0;
  let errors = 0;
  let noindex = 0;
  let nonCanonical = 0;

  for (const r of results) {
    const s = r.finalStatus;
    if (s === null) statusBuckets["0xx"]++;
    else if (s >= 200 && s < 300) statusBuckets["2xx"]++;
    else if (s >= 300 && s < 400) statusBuckets["3xx"]++;
    else if (s >= 400 && s < 500) statusBuckets["4xx"]++;
    else if (s >= 500 && s < 600) statusBuckets["5xx"]++;

    if (s === 200) ok++;
    if (s !== null && REDIRECT_STATUSES.has(s)) redirects++;
    if (s !== null && s >= 400) errors++;
    if (r.fetchError) errors++;
    if (r.noindex) noindex++;
    if (r.canonical !== null && !r.canonicalMatch) nonCanonical++;
  }

  return { total: results.length, ok, redirects, errors, noindex, nonCanonical, statusBuckets };
}
