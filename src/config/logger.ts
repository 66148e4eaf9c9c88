import path from "node:path";
import winston from "winston";

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: string;
  /** Directory for the daily log file. Omit to log to the console only. */
  logDir?: string;
  service?: string;
  /** Suppress every transport (tests). */
  silent?: boolean;
}

/** Name of today's log file, e.g. `2025-01-31.log`. */
export function dailyLogFileName(date: Date = new Date()): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}.log`;
}

const lineFormat = winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} - ${String(service)} - ${level.toUpperCase()} - ${String(message)}${rest}`;
});

/** Build the process logger: console plus a size-capped daily file. */
export function createLogger(opts: LoggerOptions): Logger {
  const logger = winston.createLogger({
    level: opts.level,
    silent: opts.silent,
    defaultMeta: { service: opts.service ?? "foundry-agent-gateway" },
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      lineFormat,
    ),
    transports: [new winston.transports.Console()],
  });

  if (opts.logDir) {
    logger.add(
      new winston.transports.File({
        filename: path.join(opts.logDir, dailyLogFileName()),
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
      }),
    );
  }

  return logger;
}
