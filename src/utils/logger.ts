/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Centraliserad logger med Winston
 *
 * - JSON-format i produktion
 * - Färgade, läsbara rader under utveckling
 * - Nivå styrs av LOG_LEVEL
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

type LogMeta = Record<string, unknown>;

const isProduction = process.env.NODE_ENV === 'production';

// Läsbart format för utveckling
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    isProduction ? json() : combine(colorize(), devFormat)
  ),
  defaultMeta: { service: 'aqualog' },
  // Tyst under test så att vitest-utskriften inte drunknar
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console(),
  ],
});

export const log = {
  info: (message: string, meta?: LogMeta) => {
    logger.info(message, meta);
  },

  warn: (message: string, meta?: LogMeta) => {
    logger.warn(message, meta);
  },

  /**
   * Fel - Error-objekt packas upp till message + stack
   */
  error: (message: string, error?: Error | unknown, meta?: LogMeta) => {
    const errorMeta = error instanceof Error
      ? { error: error.message, stack: error.stack, ...meta }
      : { error: String(error), ...meta };
    logger.error(message, errorMeta);
  },

  /**
   * Debug (visas bara om LOG_LEVEL=debug)
   */
  debug: (message: string, meta?: LogMeta) => {
    logger.debug(message, meta);
  },

  /**
   * Startup-meddelanden (alltid synliga)
   */
  startup: (message: string) => {
    logger.info(`🚀 ${message}`);
  },

  request: (method: string, path: string, meta?: LogMeta) => {
    logger.info(`📥 ${method} ${path}`, { type: 'request', ...meta });
  },

  response: (method: string, path: string, statusCode: number, durationMs: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logger[level](`📤 ${method} ${path} ${statusCode}`, {
      type: 'response',
      statusCode,
      durationMs
    });
  },

  /**
   * Kemiberäkningar och klassificering
   */
  chemistry: (message: string, meta?: LogMeta) => {
    logger.debug(`🧪 ${message}`, { type: 'chemistry', ...meta });
  },

  /**
   * Databasoperationer
   */
  db: (message: string, meta?: LogMeta) => {
    logger.debug(`🗄️ ${message}`, { type: 'database', ...meta });
  },
};

export { logger };

export default log;
