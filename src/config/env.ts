/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Miljökonfiguration - laddas från .env och valideras med Zod
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const hour = z.coerce.number().int().min(0).max(23);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  AQUALOG_DB_FILE: z.string().min(1).default('aqualog.db'),
  AQUALOG_RANGES_FILE: z.string().min(1).optional(),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  CO2_ON_HOUR: hour.default(9),
  CO2_OFF_HOUR: hour.default(17),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * CO₂-schema: timmar då injektionen förväntas vara på (slut exklusivt).
 * start > end betyder att perioden går över midnatt.
 */
export interface Co2Schedule {
  onHour: number;
  offHour: number;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Ogiltig konfiguration i .env: ${details}`);
  }

  return result.data;
}

export function co2ScheduleFromEnv(env: AppEnv): Co2Schedule {
  return { onHour: env.CO2_ON_HOUR, offHour: env.CO2_OFF_HOUR };
}
