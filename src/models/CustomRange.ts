/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { Parameter } from './Parameter';

/**
 * Tank-specifik överstyrning av standardintervallet för en parameter.
 * Nyckel: (tankId, parameter)
 */
export interface CustomRange {
  tankId: number;
  parameter: Parameter;
  safeLow: number;
  safeHigh: number;
  createdAt: string;
  updatedAt: string;
}
