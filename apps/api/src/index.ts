import { DEFAULTS } from "@sitemap-audit/core";
import { buildApp } from "./app.js";

const fastify = buildApp();
await fastify.listen({ port: DEFAULTS.port, host: "0.0.0.0" });
