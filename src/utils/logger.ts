import winston, { Logger } from "winston";

const { combine, timestamp, errors, json, colorize, simple } = winston.format;

function buildFormat(production: boolean) {
  return production
    ? combine(errors({ stack: true }), timestamp(), json())
    : combine(errors({ stack: true }), timestamp(), colorize(), simple());
}

export const logger: Logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  format: buildFormat(process.env.NODE_ENV === "production"),
  transports: [new winston.transports.Console()],
});

export type LoggerOptions = {
  level: string;
  silent: boolean;
  production: boolean;
};

// Children created through componentLogger read level and silence from here.
export function configureLogger(options: LoggerOptions): void {
  logger.level = options.level;
  logger.silent = options.silent;
  logger.format = buildFormat(options.production);
}

export function componentLogger(name: string): Logger {
  return logger.child({ component: name });
}
