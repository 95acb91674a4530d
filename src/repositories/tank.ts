/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Tank-repository med validering
 */

import { z } from 'zod';
import type { Row } from '../db/storage';
import type { TankDependentTable } from '../db/schema';
import { TANK_DEPENDENT_TABLES } from '../db/schema';
import type { Tank } from '../models/Tank';
import { InvalidInputError, StorageError, TankNotFoundError } from '../utils/errors';
import log from '../utils/logger';
import { BaseRepository } from './base';

const TankRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  volume_l: z.number().nullable(),
  notes: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const CountRowSchema = z.object({ n: z.number().int() });

export function tankFromRow(row: Row): Tank {
  const r = TankRowSchema.parse(row);
  return {
    id: r.id,
    name: r.name,
    volumeL: r.volume_l,
    notes: r.notes,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/**
 * Resultat av en borttagning: antal rader som försvann per beroende tabell
 */
export interface TankRemoval {
  tankId: number;
  removed: Map<TankDependentTable, number>;
}

const invalidTankData = (message: string) => new InvalidInputError(`Ogiltig tankdata: ${message}`);

export class TankRepository extends BaseRepository {
  list(): Tank[] {
    return this.guarded('hämtning av tankar', () =>
      this.storage
        .fetchAll('SELECT * FROM tanks ORDER BY id;')
        .map(tankFromRow)
    );
  }

  getById(tankId: number): Tank | null {
    this.assertTankId(tankId);
    return this.guarded('hämtning av tank', () => {
      const row = this.storage.fetchOne('SELECT * FROM tanks WHERE id = ?;', [tankId]);
      return row ? tankFromRow(row) : null;
    });
  }

  add(name: string, volumeL: number | null = null, notes = ''): Tank {
    this.assertName(name);
    if (volumeL !== null) {
      this.assertVolume(volumeL);
    }

    const tank = this.guarded('skapande av tank', () =>
      this.storage.transaction(() => {
        const { lastInsertRowid } = this.storage.execute(
          'INSERT INTO tanks (name, volume_l, notes) VALUES (?, ?, ?);',
          [name.trim(), volumeL, notes.trim()]
        );
        return this.requireTank(lastInsertRowid);
      }),
      { check: invalidTankData }
    );

    log.info('Tank skapad', { tankId: tank.id, name: tank.name });
    return tank;
  }

  /**
   * Byt namn. Anroparen ansvarar för att uppdatera cachade tanklistor.
   */
  rename(tankId: number, newName: string): Tank {
    this.assertTankId(tankId);
    this.assertName(newName);
    return this.update(tankId, 'namnbyte', 'UPDATE tanks SET name = ? WHERE id = ?;', [newName.trim(), tankId]);
  }

  updateVolume(tankId: number, volumeL: number): Tank {
    this.assertTankId(tankId);
    this.assertVolume(volumeL);
    return this.update(tankId, 'volymändring', 'UPDATE tanks SET volume_l = ? WHERE id = ?;', [volumeL, tankId]);
  }

  updateNotes(tankId: number, notes: string): Tank {
    this.assertTankId(tankId);
    return this.update(tankId, 'ändring av anteckningar', 'UPDATE tanks SET notes = ? WHERE id = ?;', [notes.trim(), tankId]);
  }

  /**
   * Ta bort en tank. Beroende rader försvinner via ON DELETE CASCADE.
   *
   * Borttagningen gäller exakt ett tank-id: antalet rader som hör till
   * andra tankar kontrolleras före och efter, och vid avvikelse rullas
   * hela transaktionen tillbaka.
   */
  remove(tankId: number): TankRemoval {
    this.assertTankId(tankId);

    const removal = this.guarded('borttagning av tank', () =>
      this.storage.transaction(() => {
        const removed = this.dependentRowCounts(tankId);
        const othersBefore = this.countOtherTanksRows(tankId);

        const { changes } = this.storage.execute('DELETE FROM tanks WHERE id = ?;', [tankId]);
        if (changes === 0) {
          throw new TankNotFoundError(tankId);
        }

        const othersAfter = this.countOtherTanksRows(tankId);
        if (othersAfter !== othersBefore) {
          throw new StorageError(
            `Borttagning av tank ${tankId} påverkade andra tankar (${othersBefore} → ${othersAfter} rader)`
          );
        }

        return { tankId, removed };
      })
    );

    log.info('Tank borttagen', { tankId, removed: Object.fromEntries(removal.removed) });
    return removal;
  }

  /**
   * Antal rader per beroende tabell som hör till tanken
   */
  dependentRowCounts(tankId: number): Map<TankDependentTable, number> {
    this.assertTankId(tankId);
    return this.guarded('räkning av beroende rader', () =>
      new Map(TANK_DEPENDENT_TABLES.map((table): [TankDependentTable, number] => [
        table,
        this.count(`SELECT COUNT(*) AS n FROM ${table} WHERE tank_id = ?;`, tankId),
      ]))
    );
  }

  private countOtherTanksRows(tankId: number): number {
    let total = this.count('SELECT COUNT(*) AS n FROM tanks WHERE id != ?;', tankId);
    for (const table of TANK_DEPENDENT_TABLES) {
      total += this.count(`SELECT COUNT(*) AS n FROM ${table} WHERE tank_id != ?;`, tankId);
    }
    return total;
  }

  private count(sql: string, tankId: number): number {
    return CountRowSchema.parse(this.storage.fetchOne(sql, [tankId])).n;
  }

  private update(tankId: number, operation: string, sql: string, params: Array<string | number>): Tank {
    const tank = this.guarded(operation, () =>
      this.storage.transaction(() => {
        const { changes } = this.storage.execute(sql, params);
        if (changes === 0) {
          throw new TankNotFoundError(tankId);
        }
        return this.requireTank(tankId);
      }),
      { check: invalidTankData }
    );

    log.db(`Tank uppdaterad (${operation})`, { tankId });
    return tank;
  }

  private requireTank(tankId: number): Tank {
    const row = this.storage.fetchOne('SELECT * FROM tanks WHERE id = ?;', [tankId]);
    if (!row) {
      throw new TankNotFoundError(tankId);
    }
    return tankFromRow(row);
  }

  private assertName(name: string): void {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new InvalidInputError('Tankens namn får inte vara tomt');
    }
  }

  private assertVolume(volumeL: number): void {
    if (typeof volumeL !== 'number' || !Number.isFinite(volumeL) || volumeL <= 0) {
      throw new InvalidInputError(`Tankens volym måste vara ett positivt tal (fick ${volumeL})`);
    }
  }
}
