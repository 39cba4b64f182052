// src/utils/logger.ts
import winston from 'winston';

export function createLogger(service: string, level: string = process.env.LOG_LEVEL || 'info'): winston.Logger {
  return winston.createLogger({
    level,
    defaultMeta: { service },
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
  });
}

/** Logger that drops everything; tests pass this to services */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
