/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

export { BaseRepository } from './base';
export type { ConstraintMapping } from './base';
export { TankRepository, tankFromRow } from './tank';
export type { TankRemoval } from './tank';
export { CustomRangeRepository, customRangeFromRow } from './custom-range';
export type { CustomRangeLookup } from './custom-range';
export { WaterTestRepository, waterTestFromRow, PLAUSIBLE_LIMITS, validateReadings, localTimestamp } from './water-test';
export type { WaterTestQuery } from './water-test';
