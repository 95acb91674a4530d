/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - startpunkt
 */

import { co2ScheduleFromEnv, loadEnv, loadRangeConfig } from '../config';
import { createAppContext } from '../context';
import { SqliteStorage, initSchema } from '../db';
import log from '../utils/logger';
import { createApp } from './server';

const env = loadEnv();

const storage = new SqliteStorage({ file: env.AQUALOG_DB_FILE });
initSchema(storage);

const ctx = createAppContext({
  storage,
  rangeConfig: loadRangeConfig(env.AQUALOG_RANGES_FILE),
  co2Schedule: co2ScheduleFromEnv(env),
});

const app = createApp(ctx, {
  corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS,
  nodeEnv: env.NODE_ENV,
});

const server = app.listen(env.PORT, () => {
  log.startup('AquaLog - vattenkvalitet för akvarier');
  log.startup(`Server körs på: http://localhost:${env.PORT}`);
  log.startup(`Databas: ${env.AQUALOG_DB_FILE}`);
  log.startup(`Health: http://localhost:${env.PORT}/health`);
});

function shutdown(signal: string): void {
  log.info('Stänger ner', { signal });
  server.close(() => {
    storage.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
