import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import {
  auditUploadedSitemaps,
  crawlSitemap,
  crawlUploadedSitemaps,
  discoverSitemaps,
} from "@sitemap-audit/core";

const CrawlSchema = z.object({
  url: z.string().url(),
  maxUrls: z.number().int().min(1).max(1_000_000).optional(),
});

const UploadSchema = z.object({
  documents: z
    .array(
      z.object({
        label: z.string().min(1),
        content: z.string().base64(),
      })
    )
    .min(1)
    .max(50),
  maxUrls: z.number().int().min(1).max(1_000_000).optional(),
  followChildSitemaps: z.boolean().optional(),
  // probe: true → además corre el análisis SEO sobre todas las URLs
  probe: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(100).optional(),
});

const DiscoverSchema = z.object({
  siteUrl: z.string().url(),
});

const routes: FastifyPluginAsync = async (f) => {
  f.post("/sitemaps/crawl", async (req) => {
    const data = CrawlSchema.parse(req.body);
    const out = await crawlSitemap(data.url, { maxUrls: data.maxUrls });
    return { ok: true, ...out };
  });

  f.post("/sitemaps/upload", async (req) => {
    const data = UploadSchema.parse(req.body);
    const documents = data.documents.map((d) => ({
      label: d.label,
      content: new Uint8Array(Buffer.from(d.content, "base64")),
    }));
    const options = { maxUrls: data.maxUrls, followChildSitemaps: data.followChildSitemaps };
    if (data.probe) {
      const audit = await auditUploadedSitemaps(documents, { ...options, concurrency: data.concurrency });
      return { ok: true, ...audit };
    }
    const out = await crawlUploadedSitemaps(documents, options);
    return { ok: true, ...out };
  });

  f.post("/sitemaps/discover", async (req) => {
    const data = DiscoverSchema.parse(req.body);
    const sitemaps = await discoverSitemaps(data.siteUrl);
    return { ok: true, sitemaps };
  });
};

export default routes;
