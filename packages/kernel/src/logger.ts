// Structured logging with pino
// One root logger; every component logs through a child bound to its name

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import type { LoggingConfig } from "./config.js";

export type LogLevel = LoggingConfig["level"];

/** Log context data */
export interface LogContext {
  [key: string]: unknown;
}

/** Logger interface that our code uses */
export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
  readonly level: string;
  flush(): void;
}

export interface CreateLoggerOptions {
  /** Component name, logged as `component` */
  name: string;
  level?: LogLevel;
  /** Extra bindings for every entry */
  bindings?: LogContext;
}

const ROOT_NAME = "sealwire";

// Secret key material must never reach a log line, whatever object carries it
const REDACT_PATHS = [
  "boxSecretKey",
  "signSecretKey",
  "*.boxSecretKey",
  "*.signSecretKey",
  "requestHeaders.authorization",
  "requestHeaders.cookie",
];

let rootLogger: PinoLogger | null = null;

function wrap(logger: PinoLogger): Logger {
  const write =
    (level: "trace" | "debug" | "info" | "warn" | "error" | "fatal") =>
    (msg: string, context?: LogContext) =>
      context ? logger[level](context, msg) : logger[level](msg);

  return {
    trace: write("trace"),
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    fatal: write("fatal"),
    child: (bindings) => wrap(logger.child(bindings)),
    get level() {
      return logger.level;
    },
    flush: () => logger.flush(),
  };
}

function baseOptions(level: string): pino.LoggerOptions {
  return {
    name: ROOT_NAME,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS },
  };
}

/**
 * Install the root logger.
 * Without an explicit destination, output goes through pino transports:
 * pino-pretty when `pretty` is set, stdout JSON otherwise, plus `file` if given.
 */
export function initLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
  if (destination) {
    rootLogger = pino(baseOptions(config.level), destination);
    return wrap(rootLogger);
  }

  const targets: pino.TransportTargetOptions[] = [
    config.pretty
      ? {
          target: "pino-pretty",
          level: config.level,
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss.l",
            ignore: "pid,hostname",
            messageFormat: "{component} | {msg}",
          },
        }
      : { target: "pino/file", level: config.level, options: { destination: 1 } },
  ];
  if (config.file) {
    targets.push({ target: "pino/file", level: config.level, options: { destination: config.file, mkdir: true } });
  }

  rootLogger = pino(
    { ...baseOptions(config.level), base: { env: process.env.NODE_ENV ?? "development" } },
    pino.transport({ targets })
  );
  return wrap(rootLogger);
}

/** Child logger for one component; creates a default root logger on first use */
export function createLogger(options: CreateLoggerOptions): Logger {
  rootLogger ??= pino(baseOptions(process.env.LOG_LEVEL ?? options.level ?? "info"));

  const child = rootLogger.child({ component: options.name, ...options.bindings });
  if (options.level) {
    child.level = options.level;
  }
  return wrap(child);
}
