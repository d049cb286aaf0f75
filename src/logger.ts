import { destination as pinoDestination, pino } from "pino";
import type { Logger, LoggerOptions } from "pino";

export type { Logger } from "pino";

export interface LogTarget {
  /** 1 for stdout, 2 for stderr. */
  dest: 1 | 2;
  sync: boolean;
}

export interface LoggerConfig {
  options: LoggerOptions;
  destination: LogTarget;
}

/**
 * Resolve pino settings from the environment. Level comes from
 * PINO_LOG_LEVEL; output is disabled under Vitest or NODE_ENV=test.
 * Commands that print to stdout log to stderr instead.
 */
export function loggerConfig(
  bindings: Record<string, unknown> = {},
  stream: "stdout" | "stderr" = "stdout",
  env: NodeJS.ProcessEnv = process.env
): LoggerConfig {
  const nodeEnv = env.NODE_ENV ?? "development";
  const isTestTooling = env.VITEST === "true" || nodeEnv === "test";

  return {
    options: {
      level: env.PINO_LOG_LEVEL ?? "info",
      enabled: !isTestTooling,
      base: { ...bindings, service: "prompt-analytics" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination: {
      dest: stream === "stderr" ? 2 : 1,
      sync: nodeEnv !== "production",
    },
  };
}

/** JSON logger, on stdout unless `stream` says otherwise. */
export function makeLogger(
  bindings?: Record<string, unknown>,
  stream: "stdout" | "stderr" = "stdout"
): Logger {
  const { options, destination } = loggerConfig(bindings, stream);
  return pino(options, pinoDestination(destination));
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
