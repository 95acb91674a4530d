/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Express-app
 *
 * createApp bygger appen kring en färdig AppContext så att testerna kan
 * köra mot en databas i minnet.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppContext } from '../context';
import log from '../utils/logger';

// Middleware
import { createApiLimiter, createWriteLimiter, errorHandler, requestLogger } from './middleware';

// Routes
import {
  createHealthRoutes,
  createRangeRoutes,
  createTankRoutes,
  createToolRoutes,
  createWaterTestRoutes,
} from './routes';

export interface AppOptions {
  /** Kommaseparerad vitlista, '*' tillåter alla */
  corsAllowedOrigins?: string;
  nodeEnv?: string;
}

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];

export function createCorsOptions(options: AppOptions = {}): cors.CorsOptions {
  const allowedOrigins = options.corsAllowedOrigins
    ? options.corsAllowedOrigins.split(',').map((origin) => origin.trim())
    : DEFAULT_ORIGINS;
  const isProduction = options.nodeEnv === 'production';

  return {
    origin: (origin, callback) => {
      // Requests utan origin (same-origin, curl, skript)
      if (!origin) {
        return callback(null, true);
      }
      if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        return callback(null, true);
      }
      // I development-läge, tillåt alla localhost-varianter
      if (!isProduction && (origin.startsWith('http://localhost') || origin.startsWith('http://127.0.0.1'))) {
        return callback(null, true);
      }
      log.warn('CORS blockad för origin', { origin, allowedOrigins });
      return callback(new Error('Not allowed by CORS'));
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Requested-With'],
  };
}

export function createApp(ctx: AppContext, options: AppOptions = {}): Express {
  const app = express();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use(helmet());
  app.use(cors(createCorsOptions(options)));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  app.use('/api/', createApiLimiter());
  app.use('/api/', createWriteLimiter());

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/health', createHealthRoutes(ctx));
  app.use('/api/tanks', createTankRoutes(ctx));
  app.use('/api/tanks/:id/ranges', createRangeRoutes(ctx));
  app.use('/api/tanks/:id', createWaterTestRoutes(ctx));
  app.use('/api/tools', createToolRoutes(ctx));

  app.use('/api', (req, res) => {
    res.status(404).json({ success: false, error: `Okänd endpoint: ${req.method} ${req.originalUrl}` });
  });

  app.use(errorHandler);

  return app;
}

export default createApp;
