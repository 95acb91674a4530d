/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Sammankoppling av lagring, repositories och tjänster
 */

import type { Co2Schedule } from './config/env';
import type { RangeConfig } from './config/ranges';
import { createRangeConfig } from './config/ranges';
import type { Storage } from './db/storage';
import { RangeResolver } from './engine/range-resolver';
import { WarningService } from './engine/warnings';
import { CustomRangeRepository } from './repositories/custom-range';
import { TankRepository } from './repositories/tank';
import { WaterTestRepository } from './repositories/water-test';

export const DEFAULT_CO2_SCHEDULE: Co2Schedule = { onHour: 9, offHour: 17 };

export interface AppContext {
  storage: Storage;
  rangeConfig: RangeConfig;
  tanks: TankRepository;
  customRanges: CustomRangeRepository;
  waterTests: WaterTestRepository;
  resolver: RangeResolver;
  warnings: WarningService;
}

export interface AppContextOptions {
  storage: Storage;
  rangeConfig?: RangeConfig;
  co2Schedule?: Co2Schedule;
}

export function createAppContext(options: AppContextOptions): AppContext {
  const { storage } = options;
  const rangeConfig = options.rangeConfig ?? createRangeConfig();

  const tanks = new TankRepository(storage);
  const customRanges = new CustomRangeRepository(storage);
  const waterTests = new WaterTestRepository(storage);
  const resolver = new RangeResolver(customRanges, rangeConfig);
  const warnings = new WarningService({
    tanks,
    waterTests,
    resolver,
    co2Schedule: options.co2Schedule ?? DEFAULT_CO2_SCHEDULE,
  });

  return { storage, rangeConfig, tanks, customRanges, waterTests, resolver, warnings };
}
