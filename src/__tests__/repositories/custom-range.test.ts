/**
 * AquaLog - Tester för CustomRangeRepository
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteStorage, initSchema } from '../../db';
import { CustomRangeRepository } from '../../repositories/custom-range';
import { TankRepository } from '../../repositories/tank';
import {
  InvalidInputError,
  InvalidParameterError,
  InvalidRangeError,
  TankNotFoundError,
} from '../../utils/errors';

describe('CustomRangeRepository', () => {
  let storage: SqliteStorage;
  let ranges: CustomRangeRepository;
  let tankId: number;

  const rowCount = () => storage.fetchScalar('SELECT COUNT(*) FROM custom_ranges;');

  beforeEach(() => {
    storage = new SqliteStorage({ file: ':memory:' });
    initSchema(storage);
    ranges = new CustomRangeRepository(storage);
    tankId = new TankRepository(storage).add('Vardagsrum', 76).id;
  });

  afterEach(() => {
    storage.close();
  });

  it('ska returnera null när ingen överstyrning finns', () => {
    expect(ranges.get(tankId, 'ph')).toBeNull();
  });

  it('ska skilja på saknad överstyrning och en som är lika med standard', () => {
    ranges.set(tankId, 'ph', 6.0, 8.0);
    expect(ranges.get(tankId, 'ph')).toEqual({ low: 6.0, high: 8.0 });
    expect(ranges.get(tankId, 'kh')).toBeNull();
  });

  it('ska spara och returnera den sparade raden', () => {
    const saved = ranges.set(tankId, 'nitrate', 10, 30);
    expect(saved).toMatchObject({ tankId, parameter: 'nitrate', safeLow: 10, safeHigh: 30 });
  });

  it('ska lämna exakt en rad med de senaste gränserna vid dubbel set', () => {
    ranges.set(tankId, 'ph', 6.5, 7.5);
    ranges.set(tankId, 'ph', 6.8, 7.2);

    expect(rowCount()).toBe(1);
    expect(ranges.get(tankId, 'ph')).toEqual({ low: 6.8, high: 7.2 });
  });

  it('ska kasta InvalidRangeError och inte skriva något när low > high', () => {
    expect(() => ranges.set(tankId, 'ph', 8, 6)).toThrow(InvalidRangeError);
    expect(rowCount()).toBe(0);
  });

  it('ska kräva att high är strikt större än low', () => {
    expect(() => ranges.set(tankId, 'ph', 7, 7)).toThrow(InvalidRangeError);
    expect(() => ranges.set(tankId, 'ph', Number.NaN, 7)).toThrow(InvalidRangeError);
  });

  it('ska behålla det gamla intervallet när en uppdatering avvisas', () => {
    ranges.set(tankId, 'kh', 3, 6);
    expect(() => ranges.set(tankId, 'kh', 6, 3)).toThrow(InvalidRangeError);
    expect(ranges.get(tankId, 'kh')).toEqual({ low: 3, high: 6 });
  });

  it('ska kasta InvalidParameterError för okänd parameter', () => {
    expect(() => ranges.set(tankId, 'salinity', 1, 2)).toThrow(InvalidParameterError);
    expect(() => ranges.get(tankId, 'salinity')).toThrow(InvalidParameterError);
    expect(rowCount()).toBe(0);
  });

  it('ska kasta TankNotFoundError när tanken saknas', () => {
    expect(() => ranges.set(999, 'ph', 6, 7)).toThrow(TankNotFoundError);
    expect(rowCount()).toBe(0);
  });

  it('ska avvisa ogiltigt tank-id', () => {
    expect(() => ranges.set(0, 'ph', 6, 7)).toThrow(InvalidInputError);
    expect(() => ranges.getAllForTank(-1)).toThrow(InvalidInputError);
  });

  it('ska hämta alla överstyrningar för en tank', () => {
    ranges.set(tankId, 'ph', 6.5, 7.5);
    ranges.set(tankId, 'gh', 4, 8);

    const all = ranges.getAllForTank(tankId);

    expect([...all.keys()].sort()).toEqual(['gh', 'ph']);
    expect(all.get('gh')).toEqual({ low: 4, high: 8 });
    expect(ranges.getAllForTank(999).size).toBe(0);
  });

  it('ska ta bort en överstyrning', () => {
    ranges.set(tankId, 'ph', 6.5, 7.5);

    expect(ranges.remove(tankId, 'ph')).toBe(true);
    expect(ranges.remove(tankId, 'ph')).toBe(false);
    expect(ranges.get(tankId, 'ph')).toBeNull();
  });

});
