/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Översättning av domänfel till HTTP-svar
 */

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  AquaLogError,
  StorageError,
  TankNotFoundError,
  getErrorMessage,
} from '../../utils/errors';
import log from '../../utils/logger';

export function statusForError(error: unknown): number {
  if (error instanceof TankNotFoundError) return 404;
  if (error instanceof StorageError) return 503;
  if (error instanceof AquaLogError) return 400;
  if (error instanceof ZodError) return 400;
  if (isBodyParseError(error)) return 400;
  return 500;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Skicka ett felsvar. Lagringsfel och okända fel visas som generiska
 * meddelanden; valideringsfel skickas vidare som de är.
 */
export function respondWithError(req: Request, res: Response, error: unknown): void {
  const status = statusForError(error);

  if (error instanceof ZodError) {
    res.status(status).json({
      success: false,
      error: 'Valideringsfel',
      code: 'VALIDATION_ERROR',
      details: error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  if (error instanceof StorageError) {
    log.error('Lagringsfel', error, { path: req.path });
    res.status(status).json({
      success: false,
      error: 'Databasen är inte tillgänglig just nu. Försök igen senare.',
      code: error.code,
    });
    return;
  }

  if (error instanceof AquaLogError) {
    log.warn('Ogiltig förfrågan', { path: req.path, code: error.code, message: error.message });
    res.status(status).json({ success: false, error: error.message, code: error.code });
    return;
  }

  if (status === 400) {
    res.status(status).json({ success: false, error: 'Ogiltig JSON i request body', code: 'INVALID_JSON' });
    return;
  }

  log.error('Oväntat fel', error, { path: req.path });
  res.status(500).json({
    success: false,
    error: 'Internt serverfel',
    details: process.env.NODE_ENV === 'production' ? undefined : getErrorMessage(error),
  });
}

/**
 * Sista middleware i kedjan - fångar fel som routes skickat vidare
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  respondWithError(req, res, error);
}

/**
 * Loggar varje request och dess svarstid
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  log.request(req.method, req.path);
  res.on('finish', () => {
    log.response(req.method, req.originalUrl, res.statusCode, Date.now() - started);
  });
  next();
}
