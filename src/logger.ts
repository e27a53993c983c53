import pino, { type Logger } from "pino";

function defaultLevel(): string {
  if (process.env.MEDIANAME_LOG_LEVEL) return process.env.MEDIANAME_LOG_LEVEL;
  return process.env.VITEST ? "silent" : "info";
}

// stderr, so script-mode stdout carries only results
const rootLogger = pino({ level: defaultLevel() }, pino.destination(2));

export type { Logger };

export function createLogger(service: string): Logger {
  return rootLogger.child({ service });
}
