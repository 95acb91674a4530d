/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Custom Range Routes
 * Monteras under /api/tanks/:id/ranges
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AppContext } from '../../context';
import { TankNotFoundError } from '../../utils/errors';
import { respondWithError } from '../middleware';
import type { CustomRangeRequest } from '../validation';
import { CustomRangeSchema, parseId, validateBody } from '../validation';

export function createRangeRoutes(ctx: AppContext): Router {
  const router = Router({ mergeParams: true });

  function requireTankId(req: Request): number {
    const tankId = parseId(req.params.id);
    if (!ctx.tanks.getById(tankId)) {
      throw new TankNotFoundError(tankId);
    }
    return tankId;
  }

  /**
   * GET /api/tanks/:id/ranges
   * Effektiva intervall för alla parametrar (anpassat eller standard)
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      const tankId = requireTankId(req);
      res.json({ success: true, tankId, ranges: ctx.resolver.effectiveRanges(tankId) });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * GET /api/tanks/:id/ranges/:parameter
   */
  router.get('/:parameter', (req: Request, res: Response) => {
    try {
      const tankId = requireTankId(req);
      const range = ctx.resolver.effectiveRange(tankId, req.params.parameter);
      res.json({ success: true, tankId, parameter: req.params.parameter, range });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * PUT /api/tanks/:id/ranges/:parameter
   * Skapar eller ersätter tankens intervall för parametern
   */
  router.put('/:parameter', validateBody(CustomRangeSchema), (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const body: CustomRangeRequest = req.body;
      const customRange = ctx.customRanges.set(tankId, req.params.parameter, body.low, body.high);
      res.json({ success: true, customRange });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * DELETE /api/tanks/:id/ranges/:parameter
   * Återgår till standardintervallet
   */
  router.delete('/:parameter', (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const removed = ctx.customRanges.remove(tankId, req.params.parameter);
      res.json({ success: true, removed });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  return router;
}
