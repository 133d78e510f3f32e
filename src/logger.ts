/**
 * Process-wide pino logger. Modules take a child logger tagged with their name
 * so scheduler, pipeline and http lines can be filtered apart.
 */
import pino from "pino";
import type { Logger } from "pino";

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "cycle-count" },
  formatters: {
    level: (label: string) => ({ level: label }),
  },
});

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}

export type { Logger };
