/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

export { SqliteStorage, sqliteErrorCode } from './storage';
export type { Storage, SqlParam, Row, ExecuteResult, SqliteStorageOptions } from './storage';
export { initSchema, TANK_DEPENDENT_TABLES } from './schema';
export type { TankDependentTable } from './schema';
