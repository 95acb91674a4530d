/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Varningar med åtgärdsplaner och dosering
 *
 * Varje mätvärde i ett test klassificeras mot tankens effektiva intervall.
 * För avvikande värden returneras åtgärdsplan och, när tankens volym är
 * känd, en konkret dos.
 */

import { z } from 'zod';
import type { Co2Schedule } from '../config/env';
import actionPlansJson from '../data/action-plans.json';
import type { Classification, Parameter } from '../models/Parameter';
import { PARAMETERS, PARAMETER_LABELS } from '../models/Parameter';
import type { Tank } from '../models/Tank';
import type { Co2Indicator, Readings, WaterTest } from '../models/WaterTest';
import { TankNotFoundError } from '../utils/errors';
import log from '../utils/logger';
import type { Direction, EvaluationBasis } from './chemistry';
import { co2IndicatorWarns, evaluateReading } from './chemistry';
import { alkalineBufferDose, equilibriumDose, nitrifyingBacteriaDose } from './dosing';
import type { EffectiveRange, RangeResolver } from './range-resolver';
import { roundForDisplay } from './units';

const PlanSchema = z.object({ low: z.array(z.string()), high: z.array(z.string()) });

const ActionPlansSchema = z.object({
  parameters: z.object({
    ph: PlanSchema,
    temperature: PlanSchema,
    ammonia: PlanSchema,
    nitrite: PlanSchema,
    nitrate: PlanSchema,
    kh: PlanSchema,
    gh: PlanSchema,
  }),
  co2: z.object({ Blue: z.string(), Green: z.string(), Yellow: z.string() }),
});

export type ActionPlans = z.infer<typeof ActionPlansSchema>;

export const ACTION_PLANS: ActionPlans = ActionPlansSchema.parse(actionPlansJson);

/** Målvärden vid dosering för låg KH/GH */
export const KH_TARGET_DKH = 6.0;
export const GH_TARGET_DGH = 6.0;

export function getActionPlan(parameter: Parameter, direction: Direction): string[] {
  return [...ACTION_PLANS.parameters[parameter][direction]];
}

export type DoseProduct = 'alkaline-buffer' | 'equilibrium' | 'nitrifying-bacteria';

export interface DoseRecommendation {
  product: DoseProduct;
  amount: number;
  unit: 'g' | 'ml';
  text: string;
}

export interface ParameterWarning {
  parameter: Parameter;
  label: string;
  measured: number;
  displayValue: number;
  evaluated: number;
  basis: EvaluationBasis;
  classification: Exclude<Classification, 'safe'>;
  direction: Direction;
  range: EffectiveRange;
  actions: string[];
  dose: DoseRecommendation | null;
}

export interface Co2Warning {
  indicator: Co2Indicator;
  advice: string;
}

export interface TestEvaluation {
  testId: number | null;
  date: string | null;
  warnings: ParameterWarning[];
  co2: Co2Warning | null;
}

export interface EvaluatedTest {
  readings: Readings;
  co2Indicator?: Co2Indicator | null;
  date?: string | null;
  id?: number | null;
}

/**
 * Dosförslag för en avvikelse, eller null om inget finns / volym saknas
 */
export function recommendDose(
  parameter: Parameter,
  direction: Direction,
  measured: number,
  volumeL: number | null
): DoseRecommendation | null {
  if (volumeL === null || volumeL <= 0) {
    return null;
  }
  const litres = volumeL.toFixed(0);

  if (direction === 'low' && parameter === 'kh') {
    const grams = alkalineBufferDose(volumeL, Math.max(0, KH_TARGET_DKH - measured));
    return {
      product: 'alkaline-buffer',
      amount: grams,
      unit: 'g',
      text: `Dosering: för ditt ${litres} L-akvarium, tillsätt ${grams.toFixed(2)} g alkalisk buffert.`,
    };
  }

  if (direction === 'low' && parameter === 'gh') {
    const grams = equilibriumDose(volumeL, Math.max(0, GH_TARGET_DGH - measured));
    return {
      product: 'equilibrium',
      amount: grams,
      unit: 'g',
      text: `Dosering: för ditt ${litres} L-akvarium, tillsätt ${grams.toFixed(2)} g remineraliseringsmedel.`,
    };
  }

  if (direction === 'high' && (parameter === 'ammonia' || parameter === 'nitrite')) {
    const { ml, oz } = nitrifyingBacteriaDose(volumeL, true);
    return {
      product: 'nitrifying-bacteria',
      amount: ml,
      unit: 'ml',
      text: `Dosering: för ditt ${litres} L-akvarium, tillsätt ${ml.toFixed(0)} ml / ${oz.toFixed(1)} oz nitrifierande bakterier.`,
    };
  }

  return null;
}

/**
 * Timme ur ett ISO-datum ("2026-03-01T10:15:00" → 10), null om klockslag saknas
 */
export function hourOf(date: string | null | undefined): number | null {
  const match = date ? /[T ](\d{2}):\d{2}/.exec(date) : null;
  return match ? Number(match[1]) : null;
}

/**
 * Utvärdera ett test mot givna intervall. Ren funktion - inga lagringsanrop.
 */
export function evaluateTest(
  test: EvaluatedTest,
  ranges: Record<Parameter, EffectiveRange>,
  resolver: Pick<RangeResolver, 'policy'>,
  volumeL: number | null,
  co2Schedule: Co2Schedule
): TestEvaluation {
  const warnings: ParameterWarning[] = [];
  const { readings } = test;

  for (const parameter of PARAMETERS) {
    const measured = readings[parameter];
    if (measured === undefined || measured === null) {
      continue;
    }

    const evaluation = evaluateReading(parameter, measured, ranges[parameter], resolver.policy(parameter), {
      ph: readings.ph,
      temperatureC: readings.temperature,
    });

    if (evaluation.classification === 'safe' || evaluation.direction === null) {
      continue;
    }

    warnings.push({
      parameter,
      label: PARAMETER_LABELS[parameter],
      measured,
      displayValue: roundForDisplay(parameter, measured),
      evaluated: evaluation.evaluated,
      basis: evaluation.basis,
      classification: evaluation.classification,
      direction: evaluation.direction,
      range: ranges[parameter],
      actions: getActionPlan(parameter, evaluation.direction),
      dose: recommendDose(parameter, evaluation.direction, measured, volumeL),
    });
  }

  const indicator = test.co2Indicator ?? null;
  const co2 = indicator !== null && co2IndicatorWarns(indicator, hourOf(test.date), co2Schedule)
    ? { indicator, advice: ACTION_PLANS.co2[indicator] }
    : null;

  return {
    testId: test.id ?? null,
    date: test.date ?? null,
    warnings,
    co2,
  };
}

export interface WarningServiceDeps {
  tanks: { getById(tankId: number): Tank | null };
  waterTests: { listForTank(tankId: number): WaterTest[] };
  resolver: RangeResolver;
  co2Schedule: Co2Schedule;
}

/**
 * Hämtar tank, intervall och tester och utvärderar dem
 */
export class WarningService {
  constructor(private readonly deps: WarningServiceDeps) {}

  evaluate(tankId: number, test: EvaluatedTest): TestEvaluation {
    const tank = this.requireTank(tankId);
    const ranges = this.deps.resolver.effectiveRanges(tankId);
    return evaluateTest(test, ranges, this.deps.resolver, tank.volumeL, this.deps.co2Schedule);
  }

  /**
   * De senaste testen (nyaste först) som har minst en varning.
   * Hela historiken gås igenom tills limit träffar har hittats, så en
   * gammal avvikelse syns även efter många felfria tester.
   */
  recentWarnings(tankId: number, limit = 10): TestEvaluation[] {
    const tank = this.requireTank(tankId);
    const ranges = this.deps.resolver.effectiveRanges(tankId);
    const tests = this.deps.waterTests.listForTank(tankId);

    const evaluations: TestEvaluation[] = [];
    for (const test of tests) {
      if (evaluations.length >= limit) {
        break;
      }
      const evaluation = evaluateTest(test, ranges, this.deps.resolver, tank.volumeL, this.deps.co2Schedule);
      if (evaluation.warnings.length > 0 || evaluation.co2 !== null) {
        evaluations.push(evaluation);
      }
    }

    log.debug('Varningar utvärderade', { tankId, tests: tests.length, withWarnings: evaluations.length });
    return evaluations;
  }

  private requireTank(tankId: number): Tank {
    const tank = this.deps.tanks.getById(tankId);
    if (!tank) {
      throw new TankNotFoundError(tankId);
    }
    return tank;
  }
}
