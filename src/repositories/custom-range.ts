/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Anpassade intervall per tank och parameter
 *
 * Högst en rad per (tank_id, parameter). set() är en atomisk upsert.
 */

import { z } from 'zod';
import type { Row } from '../db/storage';
import type { CustomRange } from '../models/CustomRange';
import type { Parameter, SafeRange } from '../models/Parameter';
import { PARAMETERS } from '../models/Parameter';
import { InvalidRangeError, StorageError, TankNotFoundError } from '../utils/errors';
import log from '../utils/logger';
import { BaseRepository } from './base';

const CustomRangeRowSchema = z.object({
  tank_id: z.number().int(),
  parameter: z.enum(PARAMETERS),
  safe_low: z.number(),
  safe_high: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});

export function customRangeFromRow(row: Row): CustomRange {
  const r = CustomRangeRowSchema.parse(row);
  return {
    tankId: r.tank_id,
    parameter: r.parameter,
    safeLow: r.safe_low,
    safeHigh: r.safe_high,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/**
 * Uppslag som RangeResolver behöver - gör det enkelt att byta ut i tester
 */
export interface CustomRangeLookup {
  get(tankId: number, parameter: string): SafeRange | null;
  getAllForTank(tankId: number): Map<Parameter, SafeRange>;
}

export class CustomRangeRepository extends BaseRepository implements CustomRangeLookup {
  /**
   * Hämta överstyrningen, eller null om ingen finns
   */
  get(tankId: number, parameter: string): SafeRange | null {
    this.assertTankId(tankId);
    this.assertParameter(parameter);

    return this.guarded('hämtning av anpassat intervall', () => {
      const row = this.storage.fetchOne(
        'SELECT * FROM custom_ranges WHERE tank_id = ? AND parameter = ?;',
        [tankId, parameter]
      );
      if (!row) {
        return null;
      }
      const range = customRangeFromRow(row);
      return { low: range.safeLow, high: range.safeHigh };
    });
  }

  /**
   * Spara eller ersätt intervallet och returnera den sparade raden
   */
  set(tankId: number, parameter: string, low: number, high: number): CustomRange {
    this.assertTankId(tankId);
    this.assertParameter(parameter);
    this.assertRange(low, high);

    const saved = this.guarded('sparande av anpassat intervall', () =>
      this.storage.transaction(() => {
        this.storage.execute(
          `INSERT INTO custom_ranges (tank_id, parameter, safe_low, safe_high)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(tank_id, parameter)
           DO UPDATE SET safe_low   = excluded.safe_low,
                         safe_high  = excluded.safe_high,
                         updated_at = datetime('now');`,
          [tankId, parameter, low, high]
        );

        const row = this.storage.fetchOne(
          'SELECT * FROM custom_ranges WHERE tank_id = ? AND parameter = ?;',
          [tankId, parameter]
        );
        if (!row) {
          throw new StorageError(`Intervallet för ${parameter} kunde inte läsas tillbaka`);
        }
        return customRangeFromRow(row);
      }),
      {
        check: (message) => new InvalidRangeError(`Ogiltigt intervall: ${message}`),
        foreignKey: () => new TankNotFoundError(tankId),
      }
    );

    log.info('Anpassat intervall sparat', { tankId, parameter, low, high });
    return saved;
  }

  /**
   * Alla överstyrningar för en tank. Okänd tank ger en tom Map.
   */
  getAllForTank(tankId: number): Map<Parameter, SafeRange> {
    this.assertTankId(tankId);

    return this.guarded('hämtning av anpassade intervall', () => {
      const rows = this.storage.fetchAll(
        'SELECT * FROM custom_ranges WHERE tank_id = ? ORDER BY parameter;',
        [tankId]
      );
      return new Map(rows.map(customRangeFromRow).map((r): [Parameter, SafeRange] => [
        r.parameter,
        { low: r.safeLow, high: r.safeHigh },
      ]));
    });
  }

  /**
   * Ta bort en överstyrning. Returnerar true om en rad togs bort.
   */
  remove(tankId: number, parameter: string): boolean {
    this.assertTankId(tankId);
    this.assertParameter(parameter);

    const { changes } = this.guarded('borttagning av anpassat intervall', () =>
      this.storage.transaction(() =>
        this.storage.execute(
          'DELETE FROM custom_ranges WHERE tank_id = ? AND parameter = ?;',
          [tankId, parameter]
        )
      )
    );

    if (changes > 0) {
      log.info('Anpassat intervall borttaget', { tankId, parameter });
    }
    return changes > 0;
  }
}
