/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Lagringslager ovanpå en lokal SQLite-fil (better-sqlite3)
 *
 * Repositories pratar bara med Storage-gränssnittet. Anslutningen är
 * synkron och enkelanvändare, så en transaktion är en vanlig funktion
 * som antingen committas eller rullas tillbaka i sin helhet.
 */

import Database from 'better-sqlite3';
import log from '../utils/logger';

export type SqlParam = string | number | bigint | Buffer | null;

export type Row = Record<string, unknown>;

export interface ExecuteResult {
  changes: number;
  lastInsertRowid: number;
}

export interface Storage {
  fetchOne(sql: string, params?: readonly SqlParam[]): Row | undefined;
  fetchAll(sql: string, params?: readonly SqlParam[]): Row[];
  fetchScalar(sql: string, params?: readonly SqlParam[]): unknown;
  execute(sql: string, params?: readonly SqlParam[]): ExecuteResult;
  /** Kör ett SQL-skript utan parametrar (DDL) */
  exec(sql: string): void;
  /** fn körs i en transaktion; ett kastat fel rullar tillbaka allt */
  transaction<T>(fn: () => T): T;
  close(): void;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

export interface SqliteStorageOptions {
  /** Sökväg till databasfilen, eller ':memory:' */
  file: string;
  readonly?: boolean;
}

export class SqliteStorage implements Storage {
  private readonly db: Database.Database;

  constructor(options: SqliteStorageOptions) {
    this.db = new Database(options.file, { readonly: options.readonly ?? false });
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    log.db('SQLite öppnad', { file: options.file });
  }

  fetchOne(sql: string, params: readonly SqlParam[] = []): Row | undefined {
    const row: unknown = this.db.prepare(sql).get(...params);
    return isRow(row) ? row : undefined;
  }

  fetchAll(sql: string, params: readonly SqlParam[] = []): Row[] {
    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.filter(isRow);
  }

  fetchScalar(sql: string, params: readonly SqlParam[] = []): unknown {
    const row = this.fetchOne(sql, params);
    return row ? Object.values(row)[0] : undefined;
  }

  execute(sql: string, params: readonly SqlParam[] = []): ExecuteResult {
    const result = this.db.prepare(sql).run(...params);
    return { changes: result.changes, lastInsertRowid: Number(result.lastInsertRowid) };
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      log.db('SQLite stängd');
    }
  }
}

/**
 * Känn igen ett SQLite-fel och dess kod (t.ex. SQLITE_CONSTRAINT_CHECK)
 */
export function sqliteErrorCode(error: unknown): string | null {
  return error instanceof Database.SqliteError ? error.code : null;
}
