/**
 * AquaLog - Validering Enhetstester
 *
 * Testar valideringsscheman och middleware
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  ConvertRequestSchema,
  CreateTankSchema,
  CustomRangeSchema,
  DoseRequestSchema,
  ReadingsSchema,
  UpdateTankSchema,
  WaterTestQuerySchema,
  WaterTestSchema,
  parseId,
  validateBody,
} from '../../api/validation';
import { InvalidInputError } from '../../utils/errors';

// Mock helpers for Express Request/Response
// We use explicit casts because mocking Express types fully is complex and not the focus of these tests
interface MockRequest {
  body: unknown;
  path: string;
}

interface MockResponse {
  status: ReturnType<typeof vi.fn>;
  json: ReturnType<typeof vi.fn>;
}

function createMockReq(overrides: Partial<MockRequest> = {}): MockRequest {
  return { path: '/test', body: {}, ...overrides };
}

function createMockRes(): MockResponse {
  return { status: vi.fn().mockReturnThis(), json: vi.fn() };
}

// ============================================================================
// ID
// ============================================================================

describe('parseId', () => {

  it('ska tolka positiva heltal', () => {
    expect(parseId('5')).toBe(5);
  });

  it('ska avvisa noll, decimaltal och text', () => {
    expect(() => parseId('0')).toThrow(InvalidInputError);
    expect(() => parseId('1.5')).toThrow(InvalidInputError);
    expect(() => parseId('abc')).toThrow(InvalidInputError);
    expect(() => parseId(undefined)).toThrow(InvalidInputError);
  });

});

// ============================================================================
// TANK
// ============================================================================

describe('CreateTankSchema', () => {

  it('ska trimma namnet', () => {
    const result = CreateTankSchema.parse({ name: '  Vardagsrum ', volumeL: 76 });
    expect(result.name).toBe('Vardagsrum');
  });

  it('ska avvisa namn med bara blanksteg och negativ volym', () => {
    expect(CreateTankSchema.safeParse({ name: '   ' }).success).toBe(false);
    expect(CreateTankSchema.safeParse({ name: 'A', volumeL: -1 }).success).toBe(false);
  });

  it('ska tillåta null som volym', () => {
    expect(CreateTankSchema.safeParse({ name: 'A', volumeL: null }).success).toBe(true);
  });

});

describe('UpdateTankSchema', () => {

  it('ska kräva minst ett fält', () => {
    expect(UpdateTankSchema.safeParse({}).success).toBe(false);
    expect(UpdateTankSchema.safeParse({ notes: '' }).success).toBe(true);
  });

});

// ============================================================================
// INTERVALL OCH TESTER
// ============================================================================

describe('CustomRangeSchema', () => {

  it('ska kräva numeriska gränser', () => {
    expect(CustomRangeSchema.safeParse({ low: 6, high: 7 }).success).toBe(true);
    expect(CustomRangeSchema.safeParse({ low: '6', high: 7 }).success).toBe(false);
  });

});

describe('ReadingsSchema och WaterTestSchema', () => {

  it('ska tillåta delvisa mätvärden och null', () => {
    expect(ReadingsSchema.safeParse({ ph: 7.1, nitrate: null }).success).toBe(true);
  });

  it('ska avvisa okända parametrar', () => {
    expect(ReadingsSchema.safeParse({ salinity: 1.02 }).success).toBe(false);
  });

  it('ska bara tillåta kända CO₂-färger', () => {
    expect(WaterTestSchema.safeParse({ readings: {}, co2Indicator: 'Blue' }).success).toBe(true);
    expect(WaterTestSchema.safeParse({ readings: {}, co2Indicator: 'Red' }).success).toBe(false);
  });

  it('ska tolka limit från query-strängen', () => {
    expect(WaterTestQuerySchema.parse({ limit: '20' })).toEqual({ limit: 20 });
    expect(WaterTestQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
  });

});

// ============================================================================
// VERKTYG
// ============================================================================

describe('Verktygsscheman', () => {

  it('ska bara tillåta kända omvandlingar', () => {
    expect(ConvertRequestSchema.safeParse({ conversion: 'drops-to-ppm', value: 3 }).success).toBe(true);
    expect(ConvertRequestSchema.safeParse({ conversion: 'ppm-to-kelvin', value: 3 }).success).toBe(false);
  });

  it('ska sätta newSystem till true som standard för bakterier', () => {
    const result = DoseRequestSchema.parse({ product: 'nitrifying-bacteria', volumeL: 76 });
    expect(result).toEqual({ product: 'nitrifying-bacteria', volumeL: 76, newSystem: true });
  });

  it('ska kräva delta för buffert', () => {
    expect(DoseRequestSchema.safeParse({ product: 'alkaline-buffer', volumeL: 100 }).success).toBe(false);
  });

});

// ============================================================================
// VALIDATE BODY MIDDLEWARE
// ============================================================================

describe('validateBody middleware', () => {
  const TestSchema = z.object({
    name: z.string().trim().min(1),
    value: z.number().min(0),
  });

  it('ska kalla next() för giltig body', () => {
    const middleware = validateBody(TestSchema);
    const req = createMockReq({ body: { name: ' test ', value: 42 } });
    const res = createMockRes();
    const next = vi.fn();

    middleware(req as unknown as Parameters<typeof middleware>[0], res as unknown as Parameters<typeof middleware>[1], next);

    expect(next).toHaveBeenCalled();
    // validateBody ersätter req.body med parsad data
    expect(req.body).toEqual({ name: 'test', value: 42 });
  });

  it('ska ge 400 med fältdetaljer för ogiltig body', () => {
    const middleware = validateBody(TestSchema);
    const req = createMockReq({ body: { name: 'test', value: -1 } });
    const res = createMockRes();
    const next = vi.fn();

    middleware(req as unknown as Parameters<typeof middleware>[0], res as unknown as Parameters<typeof middleware>[1], next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
      success: false,
      code: 'VALIDATION_ERROR',
      details: [expect.objectContaining({ field: 'value', code: 'too_small' })],
    }));
    expect(next).not.toHaveBeenCalled();
  });

});
