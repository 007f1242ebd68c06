import { pino } from "pino";

/**
 * Logger interface for injected logging.
 */
export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

type PinoMethod = "debug" | "info" | "warn" | "error";

/**
 * Split trailing log arguments into pino's merge object.
 * Errors go under `err` so pino's serializer picks them up.
 */
export function toLogFields(args: unknown[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  const rest: unknown[] = [];
  for (const arg of args) {
    if (arg instanceof Error && !("err" in fields)) {
      fields.err = arg;
    } else {
      rest.push(arg);
    }
  }
  if (rest.length > 0) {
    fields.args = rest;
  }
  return fields;
}

/**
 * Create a Logger backed by pino (structured JSON on stdout).
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const log = pino({ name: options.name ?? "live-call-bridge", level: options.level ?? "info" });

  const emit =
    (method: PinoMethod) =>
    (msg: string, ...args: unknown[]): void => {
      if (args.length === 0) {
        log[method](msg);
      } else {
        log[method](toLogFields(args), msg);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
