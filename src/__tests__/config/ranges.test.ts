/**
 * AquaLog - Tester för intervallkonfigurationen
 */

import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_RANGES, createRangeConfig, loadRangeConfig } from '../../config/ranges';

describe('createRangeConfig', () => {

  it('ska innehålla standardintervallen', () => {
    const config = createRangeConfig();
    expect(config.defaults).toEqual(DEFAULT_RANGES);
    expect(config.defaults.ammonia).toEqual({ low: 0, high: 0.05 });
    expect(config.defaults.nitrate).toEqual({ low: 20, high: 50 });
  });

  it('ska ha nitratpolicy där 0 är säkert och låg nitrat bara är en varning', () => {
    expect(createRangeConfig().policies.nitrate).toEqual({ lowSeverity: 'warning', zeroIsSafe: true });
  });

  it('ska vara fryst', () => {
    const config = createRangeConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.defaults)).toBe(true);
    expect(Object.isFrozen(config.defaults.ph)).toBe(true);
  });

  it('ska inte ändra den globala tabellen', () => {
    createRangeConfig({ defaults: { ph: { low: 6.5, high: 7.5 } } });
    expect(DEFAULT_RANGES.ph).toEqual({ low: 6.0, high: 8.0 });
  });

  it('ska slå ihop överstyrningar med standardvärden', () => {
    const config = createRangeConfig({
      defaults: { ph: { low: 6.5, high: 7.5 } },
      policies: { temperature: { warningMargin: 1 } },
    });
    expect(config.defaults.ph).toEqual({ low: 6.5, high: 7.5 });
    expect(config.defaults.kh).toEqual({ low: 4, high: 8 });
    expect(config.policies.temperature).toEqual({ warningMargin: 1 });
  });

  it('ska avvisa omvända intervall och okända parametrar', () => {
    expect(() => createRangeConfig({ defaults: { ph: { low: 8, high: 6 } } })).toThrow();
    expect(() => createRangeConfig(JSON.parse('{"defaults":{"salinity":{"low":1,"high":2}}}'))).toThrow();
  });

});

describe('loadRangeConfig', () => {
  const tmpFiles: string[] = [];

  afterEach(() => {
    for (const file of tmpFiles.splice(0)) {
      fs.rmSync(file, { force: true });
    }
  });

  function writeTmp(content: string): string {
    const file = path.join(os.tmpdir(), `aqualog-ranges-${process.pid}-${tmpFiles.length}.json`);
    fs.writeFileSync(file, content, 'utf8');
    tmpFiles.push(file);
    return file;
  }

  it('ska ge standardkonfigurationen utan fil', () => {
    expect(loadRangeConfig().defaults).toEqual(DEFAULT_RANGES);
  });

  it('ska läsa överstyrningar från JSON-fil', () => {
    const file = writeTmp(JSON.stringify({ defaults: { temperature: { low: 22, high: 26 } } }));
    expect(loadRangeConfig(file).defaults.temperature).toEqual({ low: 22, high: 26 });
  });

  it('ska avvisa en fil med ogiltigt innehåll', () => {
    const file = writeTmp(JSON.stringify({ defaults: { temperature: { low: 'varm' } } }));
    expect(() => loadRangeConfig(file)).toThrow();
  });

});
