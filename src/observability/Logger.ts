// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';
const API_KEY_HEADER = 'x-algolia-api-key';

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return obj;

    const redacted: Record<string, unknown> = { ...obj };

    if ('apiKey' in redacted) redacted.apiKey = REDACTED;

    // Nested credentials
    const credentials = redacted.credentials;
    if (credentials && typeof credentials === 'object' && 'apiKey' in credentials) {
      redacted.credentials = { ...credentials, apiKey: REDACTED };
    }

    // Request headers
    const headers = redacted.headers;
    if (headers && typeof headers === 'object' && !Array.isArray(headers)) {
      const copy: Record<string, unknown> = { ...headers };
      for (const key of Object.keys(copy)) {
        if (key.toLowerCase() === API_KEY_HEADER) copy[key] = REDACTED;
      }
      redacted.headers = copy;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
