/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Databasschema: tabeller, index och triggers
 *
 * Alla tank-ägda tabeller har ON DELETE CASCADE mot tanks(id).
 * custom_ranges har UNIQUE(tank_id, parameter) som bär upserten.
 */

import { PARAMETERS } from '../models/Parameter';
import { CO2_INDICATORS } from '../models/WaterTest';
import log from '../utils/logger';
import type { Storage } from './storage';

const sqlList = (values: readonly string[]) => values.map((v) => `'${v}'`).join(', ');

/**
 * Tabeller som refererar tanks(id) och raderas i kaskad med tanken
 */
export const TANK_DEPENDENT_TABLES = [
  'water_tests',
  'custom_ranges',
  'owned_fish',
  'owned_plants',
  'maintenance_log',
] as const;

export type TankDependentTable = typeof TANK_DEPENDENT_TABLES[number];

const TABLES = `
  CREATE TABLE IF NOT EXISTS tanks (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    name        TEXT    NOT NULL CHECK(length(trim(name)) > 0),
    volume_l    REAL    CHECK(volume_l IS NULL OR volume_l > 0),
    notes       TEXT    NOT NULL DEFAULT '',
    created_at  TEXT    NOT NULL DEFAULT (datetime('now')),
    updated_at  TEXT    NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS water_tests (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    tank_id       INTEGER NOT NULL REFERENCES tanks(id) ON DELETE CASCADE,
    date          TEXT    NOT NULL CHECK(date != ''),
    ph            REAL    CHECK(ph >= 0 AND ph <= 14),
    temperature   REAL    CHECK(temperature >= 0 AND temperature <= 40),
    ammonia       REAL    CHECK(ammonia >= 0 AND ammonia <= 10),
    nitrite       REAL    CHECK(nitrite >= 0 AND nitrite <= 10),
    nitrate       REAL    CHECK(nitrate >= 0 AND nitrate <= 500),
    kh            REAL    CHECK(kh >= 0 AND kh <= 20),
    gh            REAL    CHECK(gh >= 0 AND gh <= 30),
    co2_indicator TEXT    CHECK(co2_indicator IN (${sqlList(CO2_INDICATORS)})),
    notes         TEXT    NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS custom_ranges (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    tank_id     INTEGER NOT NULL REFERENCES tanks(id) ON DELETE CASCADE,
    parameter   TEXT    NOT NULL CHECK(parameter IN (${sqlList(PARAMETERS)})),
    safe_low    REAL    NOT NULL,
    safe_high   REAL    NOT NULL CHECK(safe_high > safe_low),
    created_at  TEXT    NOT NULL DEFAULT (datetime('now')),
    updated_at  TEXT    NOT NULL DEFAULT (datetime('now')),
    UNIQUE(tank_id, parameter)
  );

  CREATE TABLE IF NOT EXISTS owned_fish (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    tank_id      INTEGER NOT NULL REFERENCES tanks(id) ON DELETE CASCADE,
    species_name TEXT    NOT NULL CHECK(length(trim(species_name)) > 0),
    quantity     INTEGER NOT NULL DEFAULT 1 CHECK(quantity > 0),
    created_at   TEXT    NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS owned_plants (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    tank_id      INTEGER NOT NULL REFERENCES tanks(id) ON DELETE CASCADE,
    species_name TEXT    NOT NULL CHECK(length(trim(species_name)) > 0),
    created_at   TEXT    NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS maintenance_log (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    tank_id          INTEGER NOT NULL REFERENCES tanks(id) ON DELETE CASCADE,
    date             TEXT    NOT NULL,
    maintenance_type TEXT    NOT NULL CHECK(length(trim(maintenance_type)) > 0),
    volume_changed   REAL    CHECK(volume_changed IS NULL OR volume_changed >= 0),
    notes            TEXT    NOT NULL DEFAULT '',
    created_at       TEXT    NOT NULL DEFAULT (datetime('now'))
  );
`;

const INDEXES = TANK_DEPENDENT_TABLES
  .map((table) => `CREATE INDEX IF NOT EXISTS idx_${table}_tank_id ON ${table}(tank_id);`)
  .join('\n') + `
  CREATE INDEX IF NOT EXISTS idx_water_tests_date ON water_tests(date);
`;

const TRIGGERS = `
  CREATE TRIGGER IF NOT EXISTS update_tank_timestamp
  AFTER UPDATE OF name, volume_l, notes ON tanks
  FOR EACH ROW
  BEGIN
    UPDATE tanks SET updated_at = datetime('now') WHERE id = OLD.id;
  END;
`;

/**
 * Skapa tabeller, index och triggers (idempotent)
 */
export function initSchema(storage: Storage): void {
  storage.transaction(() => {
    storage.exec(TABLES);
    storage.exec(INDEXES);
    storage.exec(TRIGGERS);
  });
  log.db('Schema initierat', { tables: ['tanks', ...TANK_DEPENDENT_TABLES] });
}
