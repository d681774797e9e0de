import winston from "winston";
import { mkdirSync } from "fs";
import { join } from "path";

const { combine, timestamp, printf, errors } = winston.format;

export const LOG_FILE = "cavesync.log";

const logFormat = printf(({ level, message, timestamp, scope, stack, ...meta }) => {
  const prefix = typeof scope === "string" ? ` [${scope}]` : "";
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  const trace = typeof stack === "string" ? `\n${stack}` : "";
  return `${timestamp} ${level}${prefix} ${message}${metaStr}${trace}`;
});

export interface LoggerOptions {
  level?: string;
  /** Directory for the append-only log file. Omit to log to stderr only. */
  home?: string;
  /** Drop every entry; the test setup uses this. */
  silent?: boolean;
}

// stdout carries MCP frames, so every console level goes to stderr.
const STDERR_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

let root: winston.Logger = createRootLogger({});

function createRootLogger(opts: LoggerOptions): winston.Logger {
  const stderr = new winston.transports.Console({ stderrLevels: STDERR_LEVELS });
  if (opts.home) mkdirSync(opts.home, { recursive: true });
  const transports = opts.home
    ? [stderr, new winston.transports.File({ filename: join(opts.home, LOG_FILE) })]
    : [stderr];
  return winston.createLogger({
    level: opts.level ?? "info",
    format: combine(
      errors({ stack: true }),
      timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
      logFormat
    ),
    transports,
    silent: opts.silent ?? false,
  });
}

/** Reconfigure the process-wide logger (level and log file). */
export function configureLogging(opts: LoggerOptions): void {
  const previous = root;
  root = createRootLogger(opts);
  previous.close();
}

export interface Logger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Scoped logger that always writes through the current root logger. */
export function getLogger(scope: string): Logger {
  return {
    error: (message, meta) => root.error(message, { scope, ...meta }),
    warn: (message, meta) => root.warn(message, { scope, ...meta }),
    info: (message, meta) => root.info(message, { scope, ...meta }),
    debug: (message, meta) => root.debug(message, { scope, ...meta }),
  };
}
