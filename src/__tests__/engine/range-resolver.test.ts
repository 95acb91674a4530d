/**
 * AquaLog - Tester för RangeResolver
 */

import { describe, it, expect, vi } from 'vitest';
import { createRangeConfig } from '../../config/ranges';
import { RangeResolver } from '../../engine/range-resolver';
import type { Parameter, SafeRange } from '../../models/Parameter';
import type { CustomRangeLookup } from '../../repositories/custom-range';
import { InvalidParameterError } from '../../utils/errors';

/**
 * Uppslag i minnet: tankId → parameter → intervall
 */
function createLookup(ranges: Record<number, Partial<Record<Parameter, SafeRange>>>) {
  const get = vi.fn((tankId: number, parameter: string): SafeRange | null => {
    const forTank = ranges[tankId] ?? {};
    const entry = Object.entries(forTank).find(([key]) => key === parameter);
    return entry?.[1] ?? null;
  });
  const getAllForTank = vi.fn((tankId: number) => {
    const map = new Map<Parameter, SafeRange>();
    const forTank = ranges[tankId] ?? {};
    if (forTank.ph) map.set('ph', forTank.ph);
    if (forTank.nitrate) map.set('nitrate', forTank.nitrate);
    return map;
  });
  const lookup: CustomRangeLookup = { get, getAllForTank };
  return { lookup, get, getAllForTank };
}

describe('RangeResolver', () => {

  it('ska returnera standardintervallet när ingen överstyrning finns', () => {
    const { lookup } = createLookup({});
    const resolver = new RangeResolver(lookup, createRangeConfig());

    expect(resolver.effectiveRange(1, 'ph')).toEqual({ low: 6.0, high: 8.0, source: 'default' });
  });

  it('ska föredra tankens anpassade intervall', () => {
    const { lookup } = createLookup({ 1: { ph: { low: 6.5, high: 7.5 } } });
    const resolver = new RangeResolver(lookup, createRangeConfig());

    expect(resolver.effectiveRange(1, 'ph')).toEqual({ low: 6.5, high: 7.5, source: 'custom' });
    expect(resolver.effectiveRange(2, 'ph')).toEqual({ low: 6.0, high: 8.0, source: 'default' });
  });

  it('ska fråga lagret vid varje anrop', () => {
    const { lookup, get } = createLookup({});
    const resolver = new RangeResolver(lookup, createRangeConfig());

    resolver.effectiveRange(1, 'kh');
    resolver.effectiveRange(1, 'kh');

    expect(get).toHaveBeenCalledTimes(2);
  });

  it('ska kasta InvalidParameterError för okänd parameter', () => {
    const { lookup, get } = createLookup({});
    const resolver = new RangeResolver(lookup, createRangeConfig());

    expect(() => resolver.effectiveRange(1, 'salinity')).toThrow(InvalidParameterError);
    expect(get).not.toHaveBeenCalled();
  });

  it('ska använda injicerad konfiguration som standard', () => {
    const { lookup } = createLookup({});
    const config = createRangeConfig({ defaults: { temperature: { low: 22, high: 26 } } });
    const resolver = new RangeResolver(lookup, config);

    expect(resolver.effectiveRange(1, 'temperature')).toEqual({ low: 22, high: 26, source: 'default' });
    expect(resolver.defaultRange('temperature')).toEqual({ low: 22, high: 26 });
  });

  it('ska ge alla parametrar i ett anrop', () => {
    const { lookup, getAllForTank } = createLookup({ 3: { nitrate: { low: 5, high: 25 } } });
    const resolver = new RangeResolver(lookup, createRangeConfig());

    const ranges = resolver.effectiveRanges(3);

    expect(getAllForTank).toHaveBeenCalledWith(3);
    expect(ranges.nitrate).toEqual({ low: 5, high: 25, source: 'custom' });
    expect(ranges.gh).toEqual({ low: 6.0, high: 10.0, source: 'default' });
    expect(Object.keys(ranges)).toHaveLength(7);
  });

});
