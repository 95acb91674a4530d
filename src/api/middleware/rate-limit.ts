/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Rate Limiting Middleware
 *
 * Lokal enanvändartjänst, så gränserna är generösa. De skyddar mot
 * skenande klienter snarare än mot angrepp.
 */

import rateLimit from 'express-rate-limit';

/**
 * Allmän gräns för API:t. En ny räknare per app-instans.
 */
export const createApiLimiter = () => rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minut
  max: 300,
  message: {
    success: false,
    error: 'För många förfrågningar. Försök igen om en minut.',
    code: 'RATE_LIMIT_EXCEEDED'
  },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Striktare gräns för skrivningar
 */
export const createWriteLimiter = () => rateLimit({
  windowMs: 1 * 60 * 1000,
  max: 60,
  message: {
    success: false,
    error: 'För många ändringar. Försök igen om en minut.',
    code: 'WRITE_RATE_LIMIT_EXCEEDED'
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.method === 'GET',
});
