/**
 * AquaLog - Tester för WaterTestRepository
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SqliteStorage, initSchema } from '../../db';
import { TankRepository } from '../../repositories/tank';
import { WaterTestRepository, localTimestamp, validateReadings } from '../../repositories/water-test';
import { InvalidInputError, TankNotFoundError } from '../../utils/errors';

describe('WaterTestRepository', () => {
  let storage: SqliteStorage;
  let tests: WaterTestRepository;
  let tankId: number;

  beforeEach(() => {
    storage = new SqliteStorage({ file: ':memory:' });
    initSchema(storage);
    tests = new WaterTestRepository(storage);
    tankId = new TankRepository(storage).add('Vardagsrum', 76).id;
  });

  afterEach(() => {
    storage.close();
  });

  it('ska spara ett test och fylla saknade mätvärden med null', () => {
    const saved = tests.save(tankId, {
      date: '2026-03-01T10:00:00',
      readings: { ph: 7.2, ammonia: 0.25 },
      co2Indicator: 'Green',
      notes: '  efter vattenbyte ',
    });

    expect(saved).toEqual({
      id: 1,
      tankId,
      date: '2026-03-01T10:00:00',
      readings: { ph: 7.2, temperature: null, ammonia: 0.25, nitrite: null, nitrate: null, kh: null, gh: null },
      co2Indicator: 'Green',
      notes: 'efter vattenbyte',
    });
  });

  it('ska sätta datum till lokal tid nu när det saknas', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 2, 1, 10, 5, 9));
    try {
      const saved = tests.save(tankId, { readings: { ph: 7 } });
      expect(saved.date).toBe('2026-03-01T10:05:09');
    } finally {
      vi.useRealTimers();
    }
  });

  it('ska sortera tester utan datum i samma tidsskala som angivna datum', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 2, 1, 23, 30, 0));
    try {
      tests.save(tankId, { date: '2026-03-01T22:00:00', readings: { ph: 7.0 } });
      tests.save(tankId, { readings: { ph: 7.4 } });
      expect(tests.latestForTank(tankId)?.readings.ph).toBe(7.4);
    } finally {
      vi.useRealTimers();
    }
  });

  it('ska formatera lokal tid med nollutfyllnad', () => {
    expect(localTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02T03:04:05');
  });

  it('ska rimlighetskontrollera mätvärden utan att spara', () => {
    expect(validateReadings({ ph: 7, nitrate: null })).toEqual({ ph: 7 });
    expect(() => validateReadings({ nitrate: -1 })).toThrow(InvalidInputError);
  });

  it('ska avvisa orimliga mätvärden utan att skriva något', () => {
    expect(() => tests.save(tankId, { readings: { ph: 15 } })).toThrow(InvalidInputError);
    expect(() => tests.save(tankId, { readings: { nitrate: -1 } })).toThrow(InvalidInputError);
    expect(() => tests.save(tankId, { readings: { temperature: 45 } })).toThrow(InvalidInputError);
    expect(tests.listForTank(tankId)).toEqual([]);
  });

  it('ska avvisa ogiltigt datum', () => {
    expect(() => tests.save(tankId, { date: 'inte-ett-datum', readings: {} })).toThrow(InvalidInputError);
  });

  it('ska kasta TankNotFoundError för okänd tank', () => {
    expect(() => tests.save(999, { readings: { ph: 7 } })).toThrow(TankNotFoundError);
  });

  it('ska lista tester nyaste först och filtrera på datum', () => {
    tests.save(tankId, { date: '2026-03-01T10:00:00', readings: { ph: 7.0 } });
    tests.save(tankId, { date: '2026-03-03T10:00:00', readings: { ph: 7.2 } });
    tests.save(tankId, { date: '2026-03-02T10:00:00', readings: { ph: 7.1 } });

    expect(tests.listForTank(tankId).map((t) => t.readings.ph)).toEqual([7.2, 7.1, 7.0]);
    expect(tests.listForTank(tankId, { from: '2026-03-02' }).map((t) => t.readings.ph)).toEqual([7.2, 7.1]);
    expect(tests.listForTank(tankId, { to: '2026-03-02T23:59:59' }).map((t) => t.readings.ph)).toEqual([7.1, 7.0]);
    expect(tests.listForTank(tankId, { limit: 1 })).toHaveLength(1);
  });

  it('ska returnera senaste testet eller null', () => {
    expect(tests.latestForTank(tankId)).toBeNull();

    tests.save(tankId, { date: '2026-03-01T10:00:00', readings: { kh: 4 } });
    tests.save(tankId, { date: '2026-03-05T10:00:00', readings: { kh: 5 } });

    expect(tests.latestForTank(tankId)?.readings.kh).toBe(5);
  });

  it('ska avvisa ogiltig limit', () => {
    expect(() => tests.listForTank(tankId, { limit: 0 })).toThrow(InvalidInputError);
  });

});
