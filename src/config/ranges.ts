/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Standardintervall och bandpolicy per parameter
 *
 * Tabellen byggs en gång vid start (createRangeConfig), fryses och
 * injiceras i RangeResolver. Ingen modul läser den som global state.
 */

import fs from 'fs';
import { z } from 'zod';
import type { Classification, Parameter, SafeRange } from '../models/Parameter';
import { PARAMETERS, mapParameters } from '../models/Parameter';

/**
 * Hur avvikelser utanför [low, high] graderas.
 * Utan policy är varje avvikelse 'danger'.
 */
export interface BandPolicy {
  /** Absolut marginal utanför en gräns som räknas som 'warning' */
  warningMargin?: number;
  /** Fast allvarlighetsgrad för avvikelser under low */
  lowSeverity?: Exclude<Classification, 'safe'>;
  /** Exakt 0 under low räknas som säkert (t.ex. nitrat) */
  zeroIsSafe?: boolean;
}

export interface RangeConfig {
  readonly defaults: Readonly<Record<Parameter, Readonly<SafeRange>>>;
  readonly policies: Readonly<Record<Parameter, Readonly<BandPolicy>>>;
}

/**
 * Globala standardintervall i kanoniska enheter.
 *
 * ammonia avser fritt NH3 (ppm), inte total ammoniak.
 * kh/gh anges i dKH/dGH (droppar), pH är enhetslöst.
 */
export const DEFAULT_RANGES: Record<Parameter, SafeRange> = {
  temperature: { low: 18.0, high: 28.0 },
  ammonia: { low: 0.0, high: 0.05 },
  nitrite: { low: 0.0, high: 0.0 },
  nitrate: { low: 20.0, high: 50.0 },
  ph: { low: 6.0, high: 8.0 },
  kh: { low: 4.0, high: 8.0 },
  gh: { low: 6.0, high: 10.0 },
};

export const DEFAULT_POLICIES: Record<Parameter, BandPolicy> = {
  temperature: {},
  ammonia: {},
  nitrite: {},
  // Låg nitrat är ett gödslingsråd, inte en fara. 0 ppm ger aldrig varning.
  nitrate: { lowSeverity: 'warning', zeroIsSafe: true },
  ph: {},
  kh: { lowSeverity: 'warning' },
  gh: { lowSeverity: 'warning' },
};

const SafeRangeSchema = z.object({
  low: z.number().finite(),
  high: z.number().finite(),
}).refine((r) => r.low <= r.high, { message: 'low får inte vara större än high' });

const BandPolicySchema = z.object({
  warningMargin: z.number().min(0).optional(),
  lowSeverity: z.enum(['warning', 'danger']).optional(),
  zeroIsSafe: z.boolean().optional(),
});

const parameterShape = <T extends z.ZodTypeAny>(schema: T) =>
  z.object(mapParameters(() => schema.optional())).strict();

/**
 * Format för en JSON-fil med överstyrningar (AQUALOG_RANGES_FILE)
 */
export const RangeOverridesSchema = z.object({
  defaults: parameterShape(SafeRangeSchema).optional(),
  policies: parameterShape(BandPolicySchema).optional(),
}).strict();

export type RangeOverrides = z.infer<typeof RangeOverridesSchema>;

function freezeTable<T extends object>(table: Record<Parameter, T>): Readonly<Record<Parameter, Readonly<T>>> {
  for (const p of PARAMETERS) {
    Object.freeze(table[p]);
  }
  return Object.freeze(table);
}

/**
 * Bygg en oföränderlig intervallkonfiguration
 */
export function createRangeConfig(overrides: RangeOverrides = {}): RangeConfig {
  const parsed = RangeOverridesSchema.parse(overrides);

  return Object.freeze({
    defaults: freezeTable(mapParameters((p): SafeRange => ({ ...DEFAULT_RANGES[p], ...parsed.defaults?.[p] }))),
    policies: freezeTable(mapParameters((p): BandPolicy => ({ ...DEFAULT_POLICIES[p], ...parsed.policies?.[p] }))),
  });
}

/**
 * Läs överstyrningar från fil och bygg konfigurationen
 */
export function loadRangeConfig(file?: string): RangeConfig {
  if (!file) {
    return createRangeConfig();
  }
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return createRangeConfig(RangeOverridesSchema.parse(raw));
}
