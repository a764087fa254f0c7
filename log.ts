/**
 * Structured logger.
 *
 * Call sites use `log.info(message, fields)`; fields end up as JSON
 * properties, or as colored key/value pairs when pretty output is on.
 */
import pino, { type Logger } from "pino";

type Fields = Record<string, unknown>;

export interface LoggerOptions {
  level: string;
  pretty: boolean;
}

function createLogger({ level, pretty }: LoggerOptions): Logger {
  return pino({
    level,
    base: undefined,
    transport:
      pretty ?
        {
          target: "pino-pretty",
          options: { colorize: true, ignore: "time", singleLine: true },
        }
      : undefined,
  });
}

// Until the environment is parsed, fall back to what the process started with
let logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  pretty:
    process.env.LOG_PRETTY === undefined ?
      process.stdout.isTTY === true
    : process.env.LOG_PRETTY === "true",
});

/**
 * Replace the logger once LOG_LEVEL and LOG_PRETTY are known
 */
export function configureLogger(options: LoggerOptions): void {
  logger = createLogger(options);
}

const log = {
  get level(): string {
    return logger.level;
  },
  debug(message: string, fields: Fields = {}): void {
    logger.debug(fields, message);
  },
  info(message: string, fields: Fields = {}): void {
    logger.info(fields, message);
  },
  warn(message: string, fields: Fields = {}): void {
    logger.warn(fields, message);
  },
  error(message: string, fields: Fields = {}): void {
    logger.error(fields, message);
  },
};

export default log;
