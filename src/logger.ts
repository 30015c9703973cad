import winston, { type Logger } from "winston";
import type { LogLevel } from "./config.js";

export type AppLogger = Pick<Logger, "error" | "warn" | "info" | "debug">;

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append to this file when set. */
  logPath?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports: [
      new winston.transports.Console(),
      ...(options.logPath ? [new winston.transports.File({ filename: options.logPath })] : []),
    ],
  });
}
