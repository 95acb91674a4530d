/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Routes Index
 */

export { createHealthRoutes } from './health';
export { createTankRoutes } from './tanks';
export { createRangeRoutes } from './ranges';
export { createWaterTestRoutes } from './water-tests';
export { createToolRoutes } from './tools';
