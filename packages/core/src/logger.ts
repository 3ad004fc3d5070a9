import { pino, type Logger } from "pino";
import { DEFAULTS } from "./config.js";

export type { Logger };

export const logger: Logger = pino({
  name: "sitemap-audit",
  level: DEFAULTS.logLevel,
});
