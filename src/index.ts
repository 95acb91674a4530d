/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - publika exporter för användning som bibliotek
 */

export * from './engine/units';
export * from './engine/chemistry';
export * from './engine/dosing';
export { RangeResolver } from './engine/range-resolver';
export type { EffectiveRange, RangeSource } from './engine/range-resolver';
export { WarningService, evaluateTest, recommendDose, getActionPlan, ACTION_PLANS } from './engine/warnings';
export type {
  Co2Warning,
  DoseRecommendation,
  ParameterWarning,
  TestEvaluation,
} from './engine/warnings';

export * from './config';
export * from './db';
export * from './repositories';
export * from './utils/errors';

export { PARAMETERS, PARAMETER_UNITS, PARAMETER_LABELS, isParameter } from './models/Parameter';
export type { Parameter, SafeRange, Classification } from './models/Parameter';
export type { Tank } from './models/Tank';
export type { CustomRange } from './models/CustomRange';
export { CO2_INDICATORS } from './models/WaterTest';
export type { Co2Indicator, Readings, WaterTest, WaterTestInput } from './models/WaterTest';

export { createAppContext, DEFAULT_CO2_SCHEDULE } from './context';
export type { AppContext, AppContextOptions } from './context';
export { createApp } from './api/server';
export type { AppOptions } from './api/server';
export { log, logger } from './utils/logger';
