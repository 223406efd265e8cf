import winston from "winston";

const { combine, timestamp, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

/**
 * Library-wide logger. Level from LOG_LEVEL, default "warn"; everything
 * goes to stderr so command output stays clean.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "warn",
  format: combine(timestamp(), lineFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

export const loaderLogger = logger.child({ component: "loader" });

/**
 * A logger that drops everything; handy for tests and embedding.
 */
export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}

export type Logger = winston.Logger;
