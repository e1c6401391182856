import pino, { type Logger, type LoggerOptions } from "pino";

// Configured from the environment:
// - LOG_LEVEL: pino level (default: info, silent under NODE_ENV=test)
// - LOG_PRETTY: 'true' for the pino-pretty transport
// Output always goes to stderr so the stdio transport keeps stdout for protocol frames.

export type { Logger };

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

function createBaseLogger(): Logger {
  const options: LoggerOptions = {
    level: resolveLevel(),
    base: { service: "grounded-kb" },
  };

  if (process.env.LOG_PRETTY === "true") {
    try {
      return pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: 2,
          },
        },
      });
    } catch (error) {
      // pino-pretty resolves in a worker; fall back to JSON lines if it cannot load.
      const fallback = pino(options, pino.destination(2));
      fallback.warn({ err: error }, "pino-pretty unavailable, using JSON logs");
      return fallback;
    }
  }

  return pino(options, pino.destination(2));
}

const baseLogger = createBaseLogger();

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return baseLogger.child(bindings);
  }
  return baseLogger;
}
