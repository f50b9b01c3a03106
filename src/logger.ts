import pino, { type Logger } from "pino";

const root = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    base: undefined,
  },
  pino.destination(2)
);

export type { Logger };

export function createLogger(module: string): Logger {
  return root.child({ module });
}
