import winston from "winston";

const { combine, timestamp, printf, colorize, errors, splat } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} [${level}] ${stack || message}${extra}`;
});

const logger = winston.createLogger({
  level: "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(errors({ stack: true }), splat(), timestamp()),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
