/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Doseringsberäkningar för vanliga tillsatser
 *
 * Faktorerna kommer från tillverkarnas doseringsanvisningar.
 */

import { InvalidInputError } from '../utils/errors';

/** Alkaline Buffer: 1 tsk (≈6 g) höjer KH 2.8 dKH i 80 L */
const BUFFER_GRAMS_PER_TSP = 6;
const BUFFER_TSP_PER_LITRE_PER_DKH = 1 / (80 * 2.8);

/** Equilibrium: 16 g höjer GH 3 dGH i 80 L */
const EQUILIBRIUM_GRAMS_PER_LITRE_PER_DGH = 16 / (80 * 3);

/** Nitrifierande bakterier: ml per 38 L (≈10 US gal) */
const BACTERIA_ML_PER_38L_NEW = 119;
const BACTERIA_ML_PER_38L_ESTABLISHED = 60;

const ML_PER_FL_OZ = 29.5735;

function assertVolume(volumeL: number): void {
  if (!Number.isFinite(volumeL) || volumeL < 0) {
    throw new InvalidInputError(`Volymen måste vara ett icke-negativt tal (fick ${volumeL})`);
  }
}

function assertFinite(value: number, label: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${label} måste vara ett tal (fick ${value})`);
  }
}

function assertDelta(delta: number, label: string): void {
  if (!Number.isFinite(delta) || delta < 0) {
    throw new InvalidInputError(`${label} måste vara ett icke-negativt tal (fick ${delta})`);
  }
}

/**
 * Gram Alkaline Buffer för att höja KH med deltaKh dKH
 */
export function alkalineBufferDose(volumeL: number, deltaKh: number): number {
  assertVolume(volumeL);
  assertDelta(deltaKh, 'ΔKH');
  return volumeL * deltaKh * BUFFER_TSP_PER_LITRE_PER_DKH * BUFFER_GRAMS_PER_TSP;
}

/**
 * Gram Equilibrium för att höja GH med deltaGh dGH
 */
export function equilibriumDose(volumeL: number, deltaGh: number): number {
  assertVolume(volumeL);
  assertDelta(deltaGh, 'ΔGH');
  return volumeL * deltaGh * EQUILIBRIUM_GRAMS_PER_LITRE_PER_DGH;
}

export function nitrifyingBacteriaDose(volumeL: number, newSystem = true): { ml: number; oz: number } {
  assertVolume(volumeL);
  const perDose = newSystem ? BACTERIA_ML_PER_38L_NEW : BACTERIA_ML_PER_38L_ESTABLISHED;
  const ml = (volumeL / 38.0) * perDose;
  return { ml, oz: ml / ML_PER_FL_OZ };
}

/**
 * Procent vatten att byta för att sänka en parameter från current till target.
 * 0 om inget behöver sänkas.
 */
export function waterChangePercentage(current: number, target: number): number {
  assertFinite(current, 'Nuvarande värde');
  assertFinite(target, 'Målvärde');
  if (current <= 0 || target >= current) {
    return 0;
  }
  return ((current - target) / current) * 100;
}
