/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Gemensam bas för repositories: validering och omklassning av SQLite-fel
 */

import type { Storage } from '../db/storage';
import { sqliteErrorCode } from '../db/storage';
import type { Parameter } from '../models/Parameter';
import { PARAMETERS, isParameter } from '../models/Parameter';
import {
  AquaLogError,
  InvalidInputError,
  InvalidParameterError,
  InvalidRangeError,
  StorageError,
} from '../utils/errors';
import log from '../utils/logger';

/**
 * Hur constraint-fel ska översättas för en viss operation.
 * Fel som inte matchar blir StorageError.
 */
export interface ConstraintMapping {
  check?: (message: string) => AquaLogError;
  foreignKey?: (message: string) => AquaLogError;
}

export abstract class BaseRepository {
  constructor(protected readonly storage: Storage) {}

  /**
   * Kör en lagringsoperation och klassa om fel vid gränsen
   */
  protected guarded<T>(operation: string, fn: () => T, mapping: ConstraintMapping = {}): T {
    try {
      return fn();
    } catch (error) {
      throw this.toStoreError(operation, error, mapping);
    }
  }

  protected toStoreError(operation: string, error: unknown, mapping: ConstraintMapping): AquaLogError {
    if (error instanceof AquaLogError) {
      return error;
    }

    const code = sqliteErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);

    if (code === 'SQLITE_CONSTRAINT_CHECK' && mapping.check) {
      return mapping.check(message);
    }
    if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY' && mapping.foreignKey) {
      return mapping.foreignKey(message);
    }

    log.error(`Databasfel vid ${operation}`, error, { code });
    return new StorageError(`Databasfel vid ${operation}`, { cause: error });
  }

  protected assertTankId(tankId: number): void {
    if (!Number.isInteger(tankId) || tankId < 1) {
      throw new InvalidInputError(`Ogiltigt tank-id: måste vara ett positivt heltal (fick ${tankId})`);
    }
  }

  protected assertParameter(parameter: string): asserts parameter is Parameter {
    if (!isParameter(parameter)) {
      throw new InvalidParameterError(parameter, PARAMETERS);
    }
  }

  protected assertRange(low: number, high: number): void {
    if (typeof low !== 'number' || typeof high !== 'number' || !Number.isFinite(low) || !Number.isFinite(high)) {
      throw new InvalidRangeError('Intervallets gränser måste vara tal');
    }
    if (high <= low) {
      throw new InvalidRangeError(`Övre gränsen måste vara större än den undre (${low}–${high})`);
    }
  }
}
