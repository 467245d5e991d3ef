import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const redactPaths = [
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
  'headers["api-key"]',
  'request.headers.authorization',
  'request.headers.Authorization',
  'request.headers["x-api-key"]',
  'apiKey',
  'settings.apiKey',
  'accessToken',
];

export function createLogger(
  options: LoggerOptions = {},
  destination?: DestinationStream
): Logger {
  const config: LoggerOptions = {
    name: 'llm-dispatch',
    level: process.env.LOG_LEVEL ?? 'info',
    redact: { paths: redactPaths, censor: '***' },
    ...options,
  };
  return destination ? pino(config, destination) : pino(config);
}

export const logger = createLogger();
