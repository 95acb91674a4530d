/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog API - validering av indata
 *
 * Zod-scheman för alla requests. Domänregler (t.ex. high > low) ligger
 * kvar i repositories så att det bara finns en källa till sanning.
 */

import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { mapParameters } from '../models/Parameter';
import { CO2_INDICATORS } from '../models/WaterTest';
import { InvalidInputError } from '../utils/errors';
import log from '../utils/logger';

// =============================================================================
// GRUNDLÄGGANDE SCHEMAN
// =============================================================================

/**
 * Positivt heltals-id från URL:en
 */
export const IdParamSchema = z.coerce.number().int().positive();

export function parseId(value: string | undefined, label = 'tank-id'): number {
  const result = IdParamSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Ogiltigt ${label}: måste vara ett positivt heltal (fick "${value}")`);
  }
  return result.data;
}

/**
 * Mätvärden i kanoniska enheter - alla valfria
 */
export const ReadingsSchema = z.object(
  mapParameters(() => z.number().finite().nullable().optional())
).strict();

// =============================================================================
// API ENDPOINT SCHEMAN
// =============================================================================

/**
 * POST /api/tanks
 */
export const CreateTankSchema = z.object({
  name: z.string().trim().min(1, 'Namn krävs'),
  volumeL: z.number().positive().nullable().optional(),
  notes: z.string().max(2000).optional(),
});

export type CreateTankRequest = z.infer<typeof CreateTankSchema>;

/**
 * PATCH /api/tanks/:id
 */
export const UpdateTankSchema = z.object({
  name: z.string().trim().min(1).optional(),
  volumeL: z.number().positive().optional(),
  notes: z.string().max(2000).optional(),
}).refine(
  (data) => data.name !== undefined || data.volumeL !== undefined || data.notes !== undefined,
  { message: 'Minst ett av name, volumeL eller notes måste anges' }
);

export type UpdateTankRequest = z.infer<typeof UpdateTankSchema>;

/**
 * PUT /api/tanks/:id/ranges/:parameter
 */
export const CustomRangeSchema = z.object({
  low: z.number().finite(),
  high: z.number().finite(),
});

export type CustomRangeRequest = z.infer<typeof CustomRangeSchema>;

/**
 * POST /api/tanks/:id/tests och POST /api/tanks/:id/evaluate
 */
export const WaterTestSchema = z.object({
  date: z.string().min(1).optional(),
  readings: ReadingsSchema,
  co2Indicator: z.enum(CO2_INDICATORS).nullable().optional(),
  notes: z.string().max(2000).optional(),
});

export type WaterTestRequest = z.infer<typeof WaterTestSchema>;

/**
 * GET /api/tanks/:id/tests?from=&to=&limit=
 */
export const WaterTestQuerySchema = z.object({
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

/**
 * POST /api/tools/nh3
 */
export const Nh3RequestSchema = z.object({
  totalAmmonia: z.number().min(0),
  ph: z.number(),
  temperatureC: z.number(),
});

export type Nh3Request = z.infer<typeof Nh3RequestSchema>;

export const CONVERSIONS = [
  'drops-to-ppm',
  'ppm-to-drops',
  'litres-to-gallons',
  'gallons-to-litres',
  'celsius-to-fahrenheit',
  'fahrenheit-to-celsius',
] as const;

export type Conversion = typeof CONVERSIONS[number];

/**
 * POST /api/tools/convert
 */
export const ConvertRequestSchema = z.object({
  conversion: z.enum(CONVERSIONS),
  value: z.number().finite(),
});

export type ConvertRequest = z.infer<typeof ConvertRequestSchema>;

/**
 * POST /api/tools/volume
 */
export const VolumeRequestSchema = z.object({
  length: z.number().min(0),
  width: z.number().min(0),
  height: z.number().min(0),
  unit: z.enum(['cm', 'inches']),
});

export type VolumeRequest = z.infer<typeof VolumeRequestSchema>;

/**
 * POST /api/tools/dose
 */
export const DoseRequestSchema = z.discriminatedUnion('product', [
  z.object({ product: z.literal('alkaline-buffer'), volumeL: z.number().min(0), delta: z.number().min(0) }),
  z.object({ product: z.literal('equilibrium'), volumeL: z.number().min(0), delta: z.number().min(0) }),
  z.object({ product: z.literal('nitrifying-bacteria'), volumeL: z.number().min(0), newSystem: z.boolean().default(true) }),
]);

export type DoseRequest = z.infer<typeof DoseRequestSchema>;

/**
 * POST /api/tools/water-change
 */
export const WaterChangeRequestSchema = z.object({
  current: z.number().finite(),
  target: z.number().finite(),
});

export type WaterChangeRequest = z.infer<typeof WaterChangeRequestSchema>;

// =============================================================================
// VALIDERINGS-MIDDLEWARE
// =============================================================================

/**
 * Skapar en Express-middleware som validerar request body mot ett Zod-schema
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = result.error.issues.map((err: z.ZodIssue) => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      log.warn('Valideringsfel', {
        path: req.path,
        errors,
      });

      return res.status(400).json({
        success: false,
        error: 'Valideringsfel',
        code: 'VALIDATION_ERROR',
        details: errors,
      });
    }

    // Ersätt body med validerad och transformerad data
    req.body = result.data;
    next();
  };
}
