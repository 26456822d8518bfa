import pino, { type DestinationStream, type Logger as PinoInstance, type LoggerOptions as PinoOptions } from "pino";
import { errWithCause } from "pino-std-serializers";

/** Levels the serializer logs at, lowest first. */
export const logLevelNames = ["debug", "info", "warn", "error"] as const;

export type LogLevelName = (typeof logLevelNames)[number];

/** Structured fields of an entry. `err` is serialized with its cause chain. */
export type LogMeta = Record<string, unknown> & { err?: unknown };

export type LoggerOptions = {
  /** Entries below this level are dropped. Default: "info" */
  level?: LogLevelName;
  /** Human-readable output through pino-pretty, for local runs. */
  prettify?: boolean;
  /** Sink for JSON lines. Default: stdout. Not used with `prettify`. */
  destination?: DestinationStream;
};

/**
 * Logging port of the serializer. Bindings given to `child` are added to every
 * entry the child writes.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: Record<string, unknown>): Logger;
}

function rootInstance({ level = "info", prettify = false, destination }: LoggerOptions): PinoInstance {
  const options: PinoOptions = { level, serializers: { err: errWithCause } };
  if (prettify) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
      },
    });
  }
  return destination ? pino(options, destination) : pino(options);
}

/** Logger backed by a pino instance. */
export class PinoLogger implements Logger {
  private readonly instance: PinoInstance;

  constructor(source: LoggerOptions | PinoInstance = {}) {
    this.instance = isPinoInstance(source) ? source : rootInstance(source);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.instance.child(bindings));
  }

  private write(level: LogLevelName, message: string, meta: LogMeta = {}): void {
    this.instance[level](meta, message);
  }
}

function isPinoInstance(source: LoggerOptions | PinoInstance): source is PinoInstance {
  return "child" in source && typeof source.child === "function";
}

/** Discards everything. The serializer's default. */
export class NullLogger implements Logger {
  debug(_message: string, _meta?: LogMeta): void {}
  info(_message: string, _meta?: LogMeta): void {}
  warn(_message: string, _meta?: LogMeta): void {}
  error(_message: string, _meta?: LogMeta): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}

export function createNullLogger(): Logger {
  return new NullLogger();
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new PinoLogger(options);
}
