import Fastify from "fastify";
import { ZodError } from "zod";
import { DEFAULTS } from "@sitemap-audit/core";
import auditRoutes from "./routes/audit.js";
import probeRoutes from "./routes/probe.js";
import sitemapRoutes from "./routes/sitemaps.js";

export function buildApp(opts: { logLevel?: string } = {}) {
  const fastify = Fastify({
    logger: { name: "sitemap-audit-api", level: opts.logLevel ?? DEFAULTS.logLevel },
    bodyLimit: 50 * 1024 * 1024, // sitemaps subidos en base64
  });

  // 400 para input inválido; el resto son fallos internos
  fastify.setErrorHandler((error, req, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        ok: false,
        error: "invalid input",
        issues: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    const status = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (status === 500) req.log.error({ err: error }, "request failed");
    return reply.code(status).send({ ok: false, error: error.message });
  });

  fastify.get("/healthz", async () => ({ ok: true }));

  fastify.register(sitemapRoutes, { prefix: "/api" });
  fastify.register(probeRoutes, { prefix: "/api" });
  fastify.register(auditRoutes, { prefix: "/api" });

  return fastify;
}
