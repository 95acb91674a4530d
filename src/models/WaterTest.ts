/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { Parameter } from './Parameter';

export const CO2_INDICATORS = ['Green', 'Blue', 'Yellow'] as const;

/**
 * Färg på CO₂-droppkontroll: Blue = låg, Green = idealisk, Yellow = hög
 */
export type Co2Indicator = typeof CO2_INDICATORS[number];

export type Readings = Partial<Record<Parameter, number | null>>;

/**
 * Ett vattentest - mätvärden i kanoniska enheter
 */
export interface WaterTest {
  id: number;
  tankId: number;
  date: string; // ISO 8601
  readings: Readings;
  co2Indicator: Co2Indicator | null;
  notes: string;
}

export interface WaterTestInput {
  date?: string;
  readings: Readings;
  co2Indicator?: Co2Indicator | null;
  notes?: string;
}
