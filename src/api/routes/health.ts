/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Health Check Route
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AppContext } from '../../context';
import { getErrorMessage } from '../../utils/errors';
import log from '../../utils/logger';

export function createHealthRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /health
   * Svarar 503 om databasen inte går att läsa
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      ctx.storage.fetchScalar('SELECT 1;');
      res.json({
        success: true,
        status: 'OK',
        database: 'OK',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      log.error('Health check misslyckades', error);
      res.status(503).json({
        success: false,
        status: 'DEGRADED',
        database: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
