import fs from "node:fs";
import path from "node:path";
import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.printf((info) => {
    const { level, timestamp, message, ...rest } = info;
    return (
      `[${level.toUpperCase()}] ${String(timestamp)} -- ${String(message)}` +
      `${Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : ""}`
    );
  }),
);

// The terminal belongs to the editor, so nothing is written until a file
// transport is attached.
export const logger = winston.createLogger({
  level: "info",
  format: logFormat,
  silent: true,
});

export function configureLogger(options: { file: string; level: LogLevel }) {
  fs.mkdirSync(path.dirname(options.file), { recursive: true });
  logger.configure({
    level: options.level,
    format: logFormat,
    silent: false,
    exitOnError: false,
    transports: [new winston.transports.File({ filename: options.file })],
  });
}
