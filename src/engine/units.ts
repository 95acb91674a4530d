/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Enhetsomvandling
 *
 * All kärnlogik arbetar i kanoniska enheter (ppm, °C, liter).
 * Omvandling för visning sker hos anroparen.
 */

import type { Parameter } from '../models/Parameter';
import { InvalidInputError } from '../utils/errors';

/** 1 droppe (1 dKH/dGH) ≈ 17.86 ppm CaCO3 */
export const PPM_PER_DROP = 17.86;

/** 1 liter = 0.264172 US gallon */
export const GALLONS_PER_LITRE = 0.264172;

/** 1 kubiktum = 0.0163871 liter */
const LITRES_PER_CUBIC_INCH = 0.0163871;

export type DimensionUnit = 'cm' | 'inches';

function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${label} måste vara ett icke-negativt tal (fick ${value})`);
  }
}

/**
 * Droppar från ett KH/GH-test till ppm
 */
export function dropsToPpm(drops: number): number {
  assertNonNegative(drops, 'Antal droppar');
  return drops * PPM_PER_DROP;
}

export function ppmToDrops(ppm: number): number {
  assertNonNegative(ppm, 'ppm');
  return ppm / PPM_PER_DROP;
}

export function litresToGallons(litres: number): number {
  assertNonNegative(litres, 'Volym (liter)');
  return litres * GALLONS_PER_LITRE;
}

export function gallonsToLitres(gallons: number): number {
  assertNonNegative(gallons, 'Volym (gallon)');
  return gallons / GALLONS_PER_LITRE;
}

export function celsiusToFahrenheit(celsius: number): number {
  return celsius * 9 / 5 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return (fahrenheit - 32) * 5 / 9;
}

/**
 * Volym för ett rektangulärt akvarium
 *
 * @example tankVolume(100, 50, 40, 'cm') → { litres: 200, gallons: 52.83 }
 */
export function tankVolume(
  length: number,
  width: number,
  height: number,
  unit: DimensionUnit
): { litres: number; gallons: number } {
  assertNonNegative(length, 'Längd');
  assertNonNegative(width, 'Bredd');
  assertNonNegative(height, 'Höjd');

  const cubic = length * width * height;
  const litres = unit === 'cm' ? cubic / 1000 : cubic * LITRES_PER_CUBIC_INCH;

  return { litres, gallons: litres * GALLONS_PER_LITRE };
}

/**
 * Antal decimaler vid visning per parameter
 */
export const DISPLAY_DECIMALS: Record<Parameter, number> = {
  ph: 1,
  temperature: 1,
  ammonia: 2,
  nitrite: 2,
  nitrate: 1,
  kh: 1,
  gh: 1,
};

/**
 * Avrunda ett mätvärde för visning. 0 förblir 0 (aldrig 0.05 eller -0).
 */
export function roundForDisplay(parameter: Parameter, value: number): number {
  const factor = 10 ** DISPLAY_DECIMALS[parameter];
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}
