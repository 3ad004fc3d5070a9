import { z } from "zod";
import { ConfigError } from "./errors.js";

const IdentitySchema = z.enum(["chrome", "googlebot"]);

const EnvSchema = z.object({
  CRAWLER_USER_AGENT: z
    .string()
    .optional()
    .transform((v) => (v?.trim() ? v.trim() : undefined)),
  CRAWLER_IDENTITY: IdentitySchema.default("chrome"),
  CRAWLER_PROBE_IDENTITY: IdentitySchema.default("googlebot"),
  CRAWLER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CRAWLER_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  CRAWLER_MAX_URLS: z.coerce.number().int().positive().default(50_000),
  CRAWLER_MAX_CONCURRENCY: z.coerce.number().int().positive().default(30),
  CRAWLER_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  CRAWLER_MAX_BODY_BYTES: z.coerce.number().int().positive().default(250_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8787),
});

export interface CrawlerConfig {
  userAgent?: string;
  identity: z.infer<typeof IdentitySchema>;
  probeIdentity: z.infer<typeof IdentitySchema>;
  timeoutMs: number;
  probeTimeoutMs: number;
  maxUrls: number;
  maxConcurrency: number;
  retryDelayMs: number;
  maxBodyBytes: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  port: number;
}

/** Lee la configuración del entorno; strings vacíos cuentan como no definidos */
export function loadConfig(env: Record<string, string | undefined> = process.env): CrawlerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;
  return {
    userAgent: e.CRAWLER_USER_AGENT,
    identity: e.CRAWLER_IDENTITY,
    probeIdentity: e.CRAWLER_PROBE_IDENTITY,
    timeoutMs: e.CRAWLER_TIMEOUT_MS,
    probeTimeoutMs: e.CRAWLER_PROBE_TIMEOUT_MS,
    maxUrls: e.CRAWLER_MAX_URLS,
    maxConcurrency: e.CRAWLER_MAX_CONCURRENCY,
    retryDelayMs: e.CRAWLER_RETRY_DELAY_MS,
    maxBodyBytes: e.CRAWLER_MAX_BODY_BYTES,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
}

export const DEFAULTS: CrawlerConfig = loadConfig();
