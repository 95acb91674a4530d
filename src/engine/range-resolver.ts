/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Effektivt säkert intervall för (tank, parameter)
 *
 * Anpassat intervall om det finns, annars globalt standardvärde.
 * Frågar lagret vid varje anrop - ingen cache mellan ändringar av tankens
 * inställningar.
 */

import type { BandPolicy, RangeConfig } from '../config/ranges';
import type { Parameter, SafeRange } from '../models/Parameter';
import { PARAMETERS, isParameter, mapParameters } from '../models/Parameter';
import type { CustomRangeLookup } from '../repositories/custom-range';
import { InvalidParameterError } from '../utils/errors';

export type RangeSource = 'custom' | 'default';

export interface EffectiveRange extends SafeRange {
  source: RangeSource;
}

export class RangeResolver {
  constructor(
    private readonly customRanges: CustomRangeLookup,
    private readonly config: RangeConfig
  ) {}

  effectiveRange(tankId: number, parameter: string): EffectiveRange {
    if (!isParameter(parameter)) {
      throw new InvalidParameterError(parameter, PARAMETERS);
    }

    const custom = this.customRanges.get(tankId, parameter);
    if (custom) {
      return { ...custom, source: 'custom' };
    }

    return { ...this.config.defaults[parameter], source: 'default' };
  }

  /**
   * Alla parametrar för en tank i en enda läsning av överstyrningarna
   */
  effectiveRanges(tankId: number): Record<Parameter, EffectiveRange> {
    const overrides = this.customRanges.getAllForTank(tankId);

    return mapParameters((p): EffectiveRange => {
      const custom = overrides.get(p);
      return custom
        ? { ...custom, source: 'custom' }
        : { ...this.config.defaults[p], source: 'default' };
    });
  }

  defaultRange(parameter: Parameter): SafeRange {
    return { ...this.config.defaults[parameter] };
  }

  policy(parameter: Parameter): Readonly<BandPolicy> {
    return this.config.policies[parameter];
  }
}
