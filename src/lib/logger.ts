import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// stderr, so log lines stay out of the chat transcript on stdout
const rootLogger = pino(
  {
    name: "llm-switchboard",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2)
);

/** Child logger tagged with the component that owns it */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

/** Applies to loggers created from now on; existing children keep their level */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}
