import winston from "winston";
import type { LoggingConfig } from "../config";

function buildFormat(format: string): winston.Logform.Format {
  switch (format) {
    case "json":
      return winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      );
    case "combined":
      return winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
        })
      );
    default:
      return winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level}: ${String(message)}`)
      );
  }
}

function buildTransports(): winston.transport[] {
  // stdout belongs to the run report
  return [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "debug"],
    }),
  ];
}

const logger = winston.createLogger({
  level: (process.env.LOG_LEVEL || "info").toLowerCase(),
  format: buildFormat((process.env.LOG_FORMAT || "simple").toLowerCase()),
  transports: buildTransports(),
  silent: process.env.NODE_ENV === "test",
});

/**
 * Applies a validated logging configuration to the shared logger.
 */
export function configureLogger(config: LoggingConfig): void {
  logger.configure({
    level: config.level,
    format: buildFormat(config.format),
    transports: buildTransports(),
    silent: process.env.NODE_ENV === "test",
  });
}

export default logger;
