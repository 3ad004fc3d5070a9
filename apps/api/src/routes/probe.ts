import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { runProbes, summarizeProbes } from "@sitemap-audit/core";

const InputSchema = z.object({
  urls: z.array(z.string().url()).min(1).max(5000),
  concurrency: z.number().int().min(1).max(100).optional(),
});

const routes: FastifyPluginAsync = async (f) => {
  f.post("/probe", async (req) => {
    const data = InputSchema.parse(req.body);
    const results = await runProbes(data.urls, { concurrency: data.concurrency });
    return { ok: true, results, summary: summarizeProbes(results) };
  });
};

export default routes;
