/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Feltaxonomi för AquaLog
 *
 * All validering sker innan någon skrivning görs. Fel från SQLite
 * klassas om vid store-gränsen och når aldrig anroparen i rå form.
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'TANK_NOT_FOUND'
  | 'INVALID_PARAMETER'
  | 'INVALID_RANGE'
  | 'STORAGE_ERROR';

export abstract class AquaLogError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Felaktigt eller orimligt argument (tank-id, namn, volym, temperatur) */
export class InvalidInputError extends AquaLogError {
  readonly code: ErrorCode = 'INVALID_INPUT';
}

/** Tanken finns inte - uppdateringen påverkade noll rader */
export class TankNotFoundError extends InvalidInputError {
  override readonly code: ErrorCode = 'TANK_NOT_FOUND';

  constructor(readonly tankId: number) {
    super(`Tank ${tankId} finns inte`);
  }
}

export class InvalidParameterError extends AquaLogError {
  readonly code: ErrorCode = 'INVALID_PARAMETER';

  constructor(readonly parameter: string, validParameters: readonly string[]) {
    super(`Ogiltig parameter "${parameter}": måste vara en av ${[...validParameters].sort().join(', ')}`);
  }
}

/** safe_high måste vara strikt större än safe_low */
export class InvalidRangeError extends AquaLogError {
  readonly code: ErrorCode = 'INVALID_RANGE';
}

/** Lagringsfel som inte kan förklaras av valideringen (I/O, oväntad constraint) */
export class StorageError extends AquaLogError {
  readonly code: ErrorCode = 'STORAGE_ERROR';
}

/** Hjälpfunktion för att få ut ett felmeddelande ur unknown */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
