/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Vattentester - sparas per tank med rimlighetskontroll
 */

import { z } from 'zod';
import type { Row, SqlParam } from '../db/storage';
import type { Parameter, SafeRange } from '../models/Parameter';
import { PARAMETERS, mapParameters } from '../models/Parameter';
import type { Co2Indicator, Readings, WaterTest, WaterTestInput } from '../models/WaterTest';
import { CO2_INDICATORS } from '../models/WaterTest';
import { InvalidInputError, TankNotFoundError } from '../utils/errors';
import log from '../utils/logger';
import { BaseRepository } from './base';

/**
 * Fysiskt rimliga gränser. Värden utanför är nästan alltid inmatningsfel,
 * oavsett vilka säkra intervall tanken har.
 */
export const PLAUSIBLE_LIMITS: Record<Parameter, SafeRange> = {
  ph: { low: 0, high: 14 },
  temperature: { low: 0, high: 40 },
  ammonia: { low: 0, high: 10 },
  nitrite: { low: 0, high: 10 },
  nitrate: { low: 0, high: 500 },
  kh: { low: 0, high: 20 },
  gh: { low: 0, high: 30 },
};

const WaterTestRowSchema = z.object({
  id: z.number().int(),
  tank_id: z.number().int(),
  date: z.string(),
  ph: z.number().nullable(),
  temperature: z.number().nullable(),
  ammonia: z.number().nullable(),
  nitrite: z.number().nullable(),
  nitrate: z.number().nullable(),
  kh: z.number().nullable(),
  gh: z.number().nullable(),
  co2_indicator: z.enum(CO2_INDICATORS).nullable(),
  notes: z.string(),
});

export function waterTestFromRow(row: Row): WaterTest {
  const r = WaterTestRowSchema.parse(row);
  return {
    id: r.id,
    tankId: r.tank_id,
    date: r.date,
    readings: mapParameters((p) => r[p]),
    co2Indicator: r.co2_indicator,
    notes: r.notes,
  };
}

export interface WaterTestQuery {
  from?: string;
  to?: string;
  limit?: number;
}

/**
 * Lokal tid som "YYYY-MM-DDTHH:MM:SS". CO₂-schemat och sorteringen utgår
 * från akvariets klocka, inte UTC.
 */
export function localTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Kontrollera mätvärden mot PLAUSIBLE_LIMITS. Tomma värden hoppas över.
 */
export function validateReadings(readings: Readings): Readings {
  const validated: Readings = {};
  for (const p of PARAMETERS) {
    const value = readings[p];
    if (value === undefined || value === null) {
      continue;
    }
    const { low, high } = PLAUSIBLE_LIMITS[p];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < low || value > high) {
      throw new InvalidInputError(`${p.toUpperCase()} ${value} ligger utanför rimligt intervall (${low}–${high})`);
    }
    validated[p] = value;
  }
  return validated;
}

function isCo2Indicator(value: string): value is Co2Indicator {
  return (CO2_INDICATORS as readonly string[]).includes(value);
}

export class WaterTestRepository extends BaseRepository {
  /**
   * Validera och spara ett test. Datum sätts till nu om det saknas.
   */
  save(tankId: number, input: WaterTestInput): WaterTest {
    this.assertTankId(tankId);
    const readings = validateReadings(input.readings);
    const date = input.date ?? localTimestamp();
    this.assertDate(date);

    const co2 = input.co2Indicator ?? null;
    if (co2 !== null && !isCo2Indicator(co2)) {
      throw new InvalidInputError(`CO₂-indikatorn måste vara en av ${CO2_INDICATORS.join(', ')}`);
    }

    const columns = ['tank_id', 'date', ...PARAMETERS, 'co2_indicator', 'notes'];
    const values: SqlParam[] = [
      tankId,
      date,
      ...PARAMETERS.map((p) => readings[p] ?? null),
      co2,
      (input.notes ?? '').trim(),
    ];

    const saved = this.guarded('sparande av vattentest', () =>
      this.storage.transaction(() => {
        const { lastInsertRowid } = this.storage.execute(
          `INSERT INTO water_tests (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')});`,
          values
        );
        const row = this.storage.fetchOne('SELECT * FROM water_tests WHERE id = ?;', [lastInsertRowid]);
        if (!row) {
          throw new TankNotFoundError(tankId);
        }
        return waterTestFromRow(row);
      }),
      {
        check: (message) => new InvalidInputError(`Ogiltigt mätvärde: ${message}`),
        foreignKey: () => new TankNotFoundError(tankId),
      }
    );

    log.info('Vattentest sparat', { tankId, testId: saved.id });
    return saved;
  }

  latestForTank(tankId: number): WaterTest | null {
    const [latest] = this.listForTank(tankId, { limit: 1 });
    return latest ?? null;
  }

  /**
   * Tester för en tank, nyaste först
   */
  listForTank(tankId: number, query: WaterTestQuery = {}): WaterTest[] {
    this.assertTankId(tankId);

    let sql = 'SELECT * FROM water_tests WHERE tank_id = ?';
    const params: SqlParam[] = [tankId];

    if (query.from !== undefined) {
      this.assertDate(query.from);
      sql += ' AND date >= ?';
      params.push(query.from);
    }
    if (query.to !== undefined) {
      this.assertDate(query.to);
      sql += ' AND date <= ?';
      params.push(query.to);
    }
    sql += ' ORDER BY date DESC, id DESC';
    if (query.limit !== undefined) {
      if (!Number.isInteger(query.limit) || query.limit < 1) {
        throw new InvalidInputError(`limit måste vara ett positivt heltal (fick ${query.limit})`);
      }
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.guarded('hämtning av vattentester', () =>
      this.storage.fetchAll(`${sql};`, params).map(waterTestFromRow)
    );
  }

  private assertDate(date: string): void {
    if (typeof date !== 'string' || date.trim() === '' || Number.isNaN(Date.parse(date))) {
      throw new InvalidInputError(`Ogiltigt datum: "${date}"`);
    }
  }
}
