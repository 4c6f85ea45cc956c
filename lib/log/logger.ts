/**
 * Structured logger (pino-backed).
 *
 * Every line is a JSON object carrying `service` (the tag passed to
 * `createLogger`) next to the message and any payload fields. Pipe through
 * `pino-pretty` for local reading.
 */
import pino from "pino";
import { getEnv } from "@/lib/env";

function defaultLevel(): pino.LevelWithSilent {
  const env = getEnv();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

let root: pino.Logger | null = null;

function rootLogger(): pino.Logger {
  if (!root) {
    root = pino({
      level: defaultLevel(),
      serializers: pino.stdSerializers,
    });
  }
  return root;
}

export type LogPayload = Record<string, unknown>;

export interface Logger {
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
}

/**
 * Child logger scoped to one module:
 *   const logger = createLogger("reconcile");
 *   logger.warn({ canonical_id }, "no stats row matched");
 */
export function createLogger(service: string): Logger {
  let child: pino.Logger | null = null;
  const get = () => (child ??= rootLogger().child({ service }));

  function log(level: "info" | "debug" | "warn" | "error", payload: LogPayload | string, message?: string): void {
    if (typeof payload === "string") {
      get()[level](payload);
    } else {
      get()[level](payload, message ?? "");
    }
  }

  return {
    info: (p, m) => log("info", p, m),
    debug: (p, m) => log("debug", p, m),
    warn: (p, m) => log("warn", p, m),
    error: (p, m) => log("error", p, m),
  };
}
