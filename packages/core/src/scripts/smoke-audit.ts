// packages/core/src/scripts/smoke-audit.ts
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { auditSitemap } from "../audit/pipeline.js";
import { logger } from "../logger.js";

// Uso: tsx smoke-audit.ts https://dominio/sitemap.xml [maxUrls]
const seed = process.argv[2];
const maxUrls = Number(process.argv[3] ?? 100);

async function main() {
  if (!seed) {
    console.error("usage: smoke-audit <sitemap-url> [maxUrls]");
    process.exit(2);
  }

  let lastReported = 0;
  const out = await auditSitemap(seed, {
    maxUrls,
    onProgress: (p) => {
      // un log cada 10%
      if (p - lastReported >= 0.1 || p === 1) {
        lastReported = p;
        logger.info({ progress: Math.round(p * 100) }, "probing");
      }
    },
  });

  console.log("=== SUMMARY ===");
  console.log(out.summary);
  console.log("sitemaps:", out.crawl.processedSitemaps.length, "errors:", out.crawl.errors);

  const outFile = path.resolve(
    process.cwd(),
    "tmp",
    `audit-${new Date().toISOString().replace(/[:.]/g, "-")}.json`
  );
  await mkdir(path.dirname(outFile), { recursive: true });
  await writeFile(outFile, JSON.stringify(out, null, 2), "utf8");
  console.log("Snapshot guardado en:", outFile);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
