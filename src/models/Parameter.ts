/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Vattenparametrar som kan ha anpassade intervall.
 *
 * Stängd union i stället för fria strängar - alla tabeller nedan är
 * Record<Parameter, ...> så att en saknad parameter är ett kompileringsfel.
 */
export const PARAMETERS = [
  'ph',
  'temperature',
  'ammonia',
  'nitrite',
  'nitrate',
  'kh',
  'gh',
] as const;

export type Parameter = typeof PARAMETERS[number];

export function isParameter(value: string): value is Parameter {
  return (PARAMETERS as readonly string[]).includes(value);
}

/**
 * Bygg en tabell med ett värde per parameter
 */
export function mapParameters<T>(fn: (parameter: Parameter) => T): Record<Parameter, T> {
  return {
    ph: fn('ph'),
    temperature: fn('temperature'),
    ammonia: fn('ammonia'),
    nitrite: fn('nitrite'),
    nitrate: fn('nitrate'),
    kh: fn('kh'),
    gh: fn('gh'),
  };
}

/**
 * Enheter i kanonisk form (ppm, °C, dKH/dGH)
 */
export const PARAMETER_UNITS: Record<Parameter, string> = {
  ph: '',
  temperature: '°C',
  ammonia: 'ppm',
  nitrite: 'ppm',
  nitrate: 'ppm',
  kh: '°dKH',
  gh: '°dGH',
};

export const PARAMETER_LABELS: Record<Parameter, string> = {
  ph: 'pH',
  temperature: 'Temperatur',
  ammonia: 'Ammoniak',
  nitrite: 'Nitrit',
  nitrate: 'Nitrat',
  kh: 'KH',
  gh: 'GH',
};

/**
 * Ett säkert intervall (low, high), inklusive gränser
 */
export interface SafeRange {
  low: number;
  high: number;
}

export type Classification = 'safe' | 'warning' | 'danger';
