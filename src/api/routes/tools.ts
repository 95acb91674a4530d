/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Tool Routes
 * Beräkningar som inte kräver någon tank: NH3, enhetsomvandling och dosering
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AppContext } from '../../context';
import { classify, unionisedAmmoniaFraction } from '../../engine/chemistry';
import {
  alkalineBufferDose,
  equilibriumDose,
  nitrifyingBacteriaDose,
  waterChangePercentage,
} from '../../engine/dosing';
import {
  celsiusToFahrenheit,
  dropsToPpm,
  fahrenheitToCelsius,
  gallonsToLitres,
  litresToGallons,
  ppmToDrops,
  tankVolume,
} from '../../engine/units';
import { respondWithError } from '../middleware';
import type {
  Conversion,
  ConvertRequest,
  DoseRequest,
  Nh3Request,
  VolumeRequest,
  WaterChangeRequest,
} from '../validation';
import {
  ConvertRequestSchema,
  DoseRequestSchema,
  Nh3RequestSchema,
  VolumeRequestSchema,
  WaterChangeRequestSchema,
  validateBody,
} from '../validation';

const CONVERTERS: Record<Conversion, (value: number) => number> = {
  'drops-to-ppm': dropsToPpm,
  'ppm-to-drops': ppmToDrops,
  'litres-to-gallons': litresToGallons,
  'gallons-to-litres': gallonsToLitres,
  'celsius-to-fahrenheit': celsiusToFahrenheit,
  'fahrenheit-to-celsius': fahrenheitToCelsius,
};

export function createToolRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/tools/defaults
   * Standardintervall och bandpolicy per parameter
   */
  router.get('/defaults', (req: Request, res: Response) => {
    res.json({
      success: true,
      ranges: ctx.rangeConfig.defaults,
      policies: ctx.rangeConfig.policies,
    });
  });

  /**
   * POST /api/tools/nh3
   * Fri (toxisk) ammoniak ur total ammoniak, pH och temperatur
   */
  router.post('/nh3', validateBody(Nh3RequestSchema), (req: Request, res: Response) => {
    try {
      const body: Nh3Request = req.body;
      const nh3 = unionisedAmmoniaFraction(body.totalAmmonia, body.ph, body.temperatureC);
      const range = ctx.rangeConfig.defaults.ammonia;
      res.json({
        success: true,
        nh3,
        classification: classify(nh3, range.low, range.high, ctx.rangeConfig.policies.ammonia),
        range,
      });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tools/convert
   */
  router.post('/convert', validateBody(ConvertRequestSchema), (req: Request, res: Response) => {
    try {
      const body: ConvertRequest = req.body;
      res.json({ success: true, conversion: body.conversion, result: CONVERTERS[body.conversion](body.value) });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tools/volume
   */
  router.post('/volume', validateBody(VolumeRequestSchema), (req: Request, res: Response) => {
    try {
      const body: VolumeRequest = req.body;
      res.json({ success: true, ...tankVolume(body.length, body.width, body.height, body.unit) });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tools/dose
   */
  router.post('/dose', validateBody(DoseRequestSchema), (req: Request, res: Response) => {
    try {
      const body: DoseRequest = req.body;
      switch (body.product) {
        case 'alkaline-buffer':
          res.json({ success: true, product: body.product, grams: alkalineBufferDose(body.volumeL, body.delta) });
          return;
        case 'equilibrium':
          res.json({ success: true, product: body.product, grams: equilibriumDose(body.volumeL, body.delta) });
          return;
        case 'nitrifying-bacteria':
          res.json({ success: true, product: body.product, ...nitrifyingBacteriaDose(body.volumeL, body.newSystem) });
          return;
      }
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tools/water-change
   * Procent vatten som behöver bytas för att nå målvärdet
   */
  router.post('/water-change', validateBody(WaterChangeRequestSchema), (req: Request, res: Response) => {
    try {
      const body: WaterChangeRequest = req.body;
      res.json({ success: true, percentage: waterChangePercentage(body.current, body.target) });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  return router;
}
