import winston from "winston";
import { config } from "./config";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, scope }) => {
  const prefix = typeof scope === "string" ? `[${scope}] ` : "";
  return `${timestamp} ${level}: ${prefix}${message}`;
});

const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(timestamp({ format: "YYYY-MM-DD HH:mm:ss" }), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
      silent: process.env.NODE_ENV === "test",
    }),
  ],
});

/**
 * Child logger tagged with a module scope, e.g. `[layers] layer added`.
 */
export function scopedLogger(scope: string): winston.Logger {
  return logger.child({ scope });
}

export default logger;
