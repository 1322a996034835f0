import pino, { type BaseLogger, type Logger as PinoLogger } from "pino";

/** What components log through; Fastify's request loggers fit it too. */
export type Logger = BaseLogger;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const parseLevel = (value?: string | null): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

let rootLogger: PinoLogger = pino({
  name: "xliff-translator",
  level: parseLevel(process.env.LOG_LEVEL),
});

export interface LoggerSetupOptions {
  level?: string;
  /** Append log lines to this file instead of stdout. */
  file?: string | null;
}

/**
 * Replaces the root logger. Child loggers created afterwards pick up the new
 * destination; loggers created before keep writing where they were.
 */
export const configureLogger = (options: LoggerSetupOptions = {}): PinoLogger => {
  const level = parseLevel(options.level ?? process.env.LOG_LEVEL);
  rootLogger = options.file
    ? pino(
        { name: "xliff-translator", level },
        pino.destination({ dest: options.file, mkdir: true, sync: true }),
      )
    : pino({ name: "xliff-translator", level });
  return rootLogger;
};

export const getRootLogger = (): PinoLogger => rootLogger;

export const createLogger = (module: string): Logger =>
  rootLogger.child({ module });
