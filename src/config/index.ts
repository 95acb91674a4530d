/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

export { loadEnv, co2ScheduleFromEnv, EnvSchema } from './env';
export type { AppEnv, Co2Schedule } from './env';
export {
  createRangeConfig,
  loadRangeConfig,
  DEFAULT_RANGES,
  DEFAULT_POLICIES,
  RangeOverridesSchema,
} from './ranges';
export type { BandPolicy, RangeConfig, RangeOverrides } from './ranges';
