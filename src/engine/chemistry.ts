/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Kemimotor
 *
 * Fritt (oladdat) NH3 ur total ammoniak, klassificering mot ett
 * säkert intervall, samt CO₂-droppkontrollen.
 */

import type { BandPolicy } from '../config/ranges';
import type { Classification, Parameter, SafeRange } from '../models/Parameter';
import type { Co2Indicator } from '../models/WaterTest';
import { InvalidInputError, InvalidRangeError } from '../utils/errors';
import log from '../utils/logger';

const ABSOLUTE_ZERO_C = -273.15;

/** log10(Number.MAX_VALUE) - över detta blir 10^x Infinity */
const MAX_POW10_EXPONENT = Math.log10(Number.MAX_VALUE);

/**
 * pKa för NH4+/NH3 vid given temperatur (Emerson et al.)
 */
export function ammoniaPka(temperatureC: number): number {
  if (!Number.isFinite(temperatureC) || temperatureC <= ABSOLUTE_ZERO_C) {
    throw new InvalidInputError(`Temperaturen måste vara över absoluta nollpunkten (fick ${temperatureC} °C)`);
  }
  return 0.09018 + 2729.92 / (273.15 + temperatureC);
}

/**
 * Beräkna giftigt fritt NH3 (ppm) ur total ammoniak (NH3 + NH4+).
 *
 * NH3 = total / (1 + 10^(pKa − pH))
 *
 * pH utanför 0-14 tillåts; klassificeringen flaggar sådana värden.
 */
export function unionisedAmmoniaFraction(
  totalAmmoniaPpm: number,
  pH: number,
  temperatureC: number
): number {
  if (!Number.isFinite(totalAmmoniaPpm) || totalAmmoniaPpm < 0) {
    throw new InvalidInputError(`Total ammoniak måste vara ett icke-negativt tal (fick ${totalAmmoniaPpm})`);
  }
  if (!Number.isFinite(pH)) {
    throw new InvalidInputError(`pH måste vara ett tal (fick ${pH})`);
  }

  const exponent = ammoniaPka(temperatureC) - pH;

  // Exponenten först: 10^x får inte bli Infinity
  if (exponent >= MAX_POW10_EXPONENT) {
    return 0;
  }
  if (exponent <= -MAX_POW10_EXPONENT) {
    return totalAmmoniaPpm;
  }

  return totalAmmoniaPpm / (1 + 10 ** exponent);
}

function severityOutside(distance: number, policy: BandPolicy): Exclude<Classification, 'safe'> {
  return policy.warningMargin !== undefined && distance <= policy.warningMargin ? 'warning' : 'danger';
}

/**
 * Klassificera ett värde mot [low, high] (inklusive gränser).
 *
 * Utanför intervallet avgör bandpolicyn graden; utan policy är allt 'danger'.
 */
export function classify(value: number, low: number, high: number, policy: BandPolicy = {}): Classification {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`Mätvärdet måste vara ett tal (fick ${value})`);
  }
  if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
    throw new InvalidRangeError(`Ogiltigt intervall ${low}–${high}`);
  }

  if (value >= low && value <= high) {
    return 'safe';
  }

  if (value < low) {
    if (policy.zeroIsSafe && value === 0) {
      return 'safe';
    }
    return policy.lowSeverity ?? severityOutside(low - value, policy);
  }

  return severityOutside(value - high, policy);
}

export type Direction = 'low' | 'high';

/** Vad som jämförts mot intervallet */
export type EvaluationBasis = 'reading' | 'unionised-nh3' | 'total-ammonia';

export interface ReadingEvaluation {
  parameter: Parameter;
  measured: number;
  evaluated: number;
  basis: EvaluationBasis;
  range: SafeRange;
  classification: Classification;
  direction: Direction | null;
}

export interface ReadingContext {
  ph?: number | null;
  temperatureC?: number | null;
}

/**
 * Utvärdera ett enskilt mätvärde.
 *
 * Ammoniak jämförs som fritt NH3 när pH och temperatur finns. Annars
 * används total ammoniak, som alltid är minst lika stor som NH3.
 * KH och GH har egna intervall och kopplas aldrig till pH.
 */
export function evaluateReading(
  parameter: Parameter,
  measured: number,
  range: SafeRange,
  policy: BandPolicy = {},
  context: ReadingContext = {}
): ReadingEvaluation {
  let evaluated = measured;
  let basis: EvaluationBasis = 'reading';

  if (parameter === 'ammonia') {
    const { ph, temperatureC } = context;
    if (ph != null && temperatureC != null) {
      evaluated = unionisedAmmoniaFraction(measured, ph, temperatureC);
      basis = 'unionised-nh3';
    } else {
      basis = 'total-ammonia';
    }
  }

  const classification = classify(evaluated, range.low, range.high, policy);
  const direction: Direction | null = classification === 'safe'
    ? null
    : evaluated < range.low ? 'low' : 'high';

  log.chemistry('Mätvärde utvärderat', { parameter, measured, evaluated, basis, classification });

  return { parameter, measured, evaluated, basis, range, classification, direction };
}

/**
 * Ligger timmen inom CO₂-schemat? start > end betyder över midnatt.
 */
export function isWithinSchedule(hour: number, onHour: number, offHour: number): boolean {
  if (onHour <= offHour) {
    return onHour <= hour && hour < offHour;
  }
  return onHour <= hour || hour < offHour;
}

/**
 * Ska droppkontrollens färg ge en varning?
 *
 * Yellow (hög) varnar alltid. Blue (låg) varnar bara när CO₂ förväntas
 * vara på; utan klockslag varnar Blue alltid. Green varnar aldrig.
 */
export function co2IndicatorWarns(
  indicator: Co2Indicator,
  testHour: number | null,
  schedule: { onHour: number; offHour: number }
): boolean {
  switch (indicator) {
    case 'Green':
      return false;
    case 'Yellow':
      return true;
    case 'Blue':
      return testHour === null || isWithinSchedule(testHour, schedule.onHour, schedule.offHour);
  }
}
