/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Water Test & Warning Routes
 * Monteras under /api/tanks/:id
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AppContext } from '../../context';
import { validateReadings } from '../../repositories/water-test';
import { respondWithError } from '../middleware';
import type { WaterTestRequest } from '../validation';
import { WaterTestQuerySchema, WaterTestSchema, parseId, validateBody } from '../validation';

const WarningsQuerySchema = WaterTestQuerySchema.pick({ limit: true });

export function createWaterTestRoutes(ctx: AppContext): Router {
  const router = Router({ mergeParams: true });

  /**
   * GET /api/tanks/:id/tests?from=&to=&limit=
   */
  router.get('/tests', (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const query = WaterTestQuerySchema.parse(req.query);
      const tests = ctx.waterTests.listForTank(tankId, query);
      res.json({ success: true, tests, count: tests.length });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tanks/:id/tests
   * Sparar testet och returnerar direkt dess utvärdering
   */
  router.post('/tests', validateBody(WaterTestSchema), (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const body: WaterTestRequest = req.body;
      const test = ctx.waterTests.save(tankId, body);
      const evaluation = ctx.warnings.evaluate(tankId, test);
      res.status(201).json({ success: true, test, evaluation });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tanks/:id/evaluate
   * Utvärderar mätvärden utan att spara dem. Samma rimlighetskontroll som vid sparande.
   */
  router.post('/evaluate', validateBody(WaterTestSchema), (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const body: WaterTestRequest = req.body;
      const evaluation = ctx.warnings.evaluate(tankId, { ...body, readings: validateReadings(body.readings) });
      res.json({ success: true, evaluation });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * GET /api/tanks/:id/warnings?limit=10
   * De senaste testen som har varningar
   */
  router.get('/warnings', (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const { limit } = WarningsQuerySchema.parse(req.query);
      const evaluations = ctx.warnings.recentWarnings(tankId, limit ?? 10);
      res.json({ success: true, evaluations, count: evaluations.length });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  return router;
}
