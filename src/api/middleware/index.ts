/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Middleware exports
 */

export { createApiLimiter, createWriteLimiter } from './rate-limit';
export { errorHandler, requestLogger, respondWithError, statusForError } from './errors';
