import { createLogger, format, transports } from "winston";

const { combine, timestamp, printf, colorize } = format;

const logFormat = printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} [${level}]: ${message}${extra}`;
});

const level = process.env.LOG_LEVEL || "info";

/**
 * Process-wide winston logger. `LOG_LEVEL=silent` mutes every transport,
 * which is what the test runner sets.
 */
export const logger = createLogger({
  level: level === "silent" ? "error" : level,
  silent: level === "silent",
  format: combine(
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    colorize({ all: process.env.NODE_ENV !== "production" }),
    logFormat
  ),
  transports: [new transports.Console()],
  exitOnError: false
});
