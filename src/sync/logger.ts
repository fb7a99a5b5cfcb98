import fs from "fs";
import path from "path";
import winston from "winston";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, context, ...rest }) => {
    const ctx = context ? `[${context}]` : "";
    const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
    return `${timestamp} ${level} ${ctx} ${message}${extra}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  transports: [new winston.transports.Console({ stderrLevels: ["error"], format: consoleFormat })],
});

export function createChildLogger(context: string) {
  return logger.child({ context });
}

export interface LoggingOptions {
  /** Only errors reach the console; the log file still gets everything. */
  quiet?: boolean;
  logFile?: string | null;
  level?: string;
}

/**
 * Swap the root logger's transports for a CLI run. Child loggers write
 * through the root, so loggers created at import time pick this up.
 */
export function configureLogging(options: LoggingOptions): void {
  const level = options.level ?? logger.level;
  logger.clear();
  logger.level = options.logFile ? "debug" : level;

  logger.add(
    new winston.transports.Console({
      level: options.quiet ? "error" : level,
      stderrLevels: ["error"],
      format: consoleFormat,
    })
  );

  if (options.logFile) {
    fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
    logger.add(
      new winston.transports.File({
        filename: options.logFile,
        level: "debug",
        format: fileFormat,
      })
    );
  }
}
