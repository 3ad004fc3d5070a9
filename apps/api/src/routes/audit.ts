import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { auditSitemap } from "@sitemap-audit/core";

const InputSchema = z.object({
  url: z.string().url(),
  maxUrls: z.number().int().min(1).max(1_000_000).optional(),
  concurrency: z.number().int().min(1).max(100).optional(),
  probe: z.boolean().optional(),
});

const routes: FastifyPluginAsync = async (f) => {
  f.post("/audit", async (req) => {
    const data = InputSchema.parse(req.body);
    const out = await auditSitemap(data.url, {
      maxUrls: data.maxUrls,
      concurrency: data.concurrency,
      probe: data.probe,
    });
    return { ok: true, ...out };
  });
};

export default routes;
