/**
 * AquaLog - Tester för SQLite-lagret
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteStorage, initSchema, sqliteErrorCode } from '../../db';

describe('SqliteStorage', () => {
  let storage: SqliteStorage;

  beforeEach(() => {
    storage = new SqliteStorage({ file: ':memory:' });
    initSchema(storage);
  });

  afterEach(() => {
    storage.close();
  });

  it('ska ha foreign keys påslaget', () => {
    expect(storage.fetchScalar('PRAGMA foreign_keys;')).toBe(1);
  });

  it('ska kunna initiera schemat flera gånger', () => {
    expect(() => initSchema(storage)).not.toThrow();
  });

  it('ska rulla tillbaka hela transaktionen vid fel', () => {
    expect(() =>
      storage.transaction(() => {
        storage.execute("INSERT INTO tanks (name) VALUES ('A');");
        throw new Error('avbruten');
      })
    ).toThrow('avbruten');
    expect(storage.fetchScalar('SELECT COUNT(*) FROM tanks;')).toBe(0);
  });

  it('ska returnera id för ny rad', () => {
    const result = storage.execute("INSERT INTO tanks (name) VALUES ('A');");
    expect(result).toEqual({ changes: 1, lastInsertRowid: 1 });
    expect(storage.fetchOne('SELECT name FROM tanks WHERE id = ?;', [1])).toEqual({ name: 'A' });
  });

  it('ska känna igen SQLite-felkoder', () => {
    let caught: unknown;
    try {
      storage.execute('INSERT INTO tanks (name, volume_l) VALUES (?, ?);', ['A', -1]);
    } catch (error) {
      caught = error;
    }
    expect(sqliteErrorCode(caught)).toBe('SQLITE_CONSTRAINT_CHECK');
    expect(sqliteErrorCode(new Error('x'))).toBeNull();
  });

  it('ska radera beroende rader i kaskad', () => {
    storage.execute("INSERT INTO tanks (name) VALUES ('A');");
    storage.execute("INSERT INTO owned_fish (tank_id, species_name) VALUES (1, 'Guppy');");
    storage.execute('DELETE FROM tanks WHERE id = 1;');
    expect(storage.fetchScalar('SELECT COUNT(*) FROM owned_fish;')).toBe(0);
  });

});
