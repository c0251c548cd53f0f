import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { analysisRouter } from './routes/analysis.routes';
import { wordCacheRouter } from './routes/word-cache.routes';
import { templateRouter } from './routes/template.routes';
import { getVocabulary } from './controllers/vocabulary.controller';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createRateLimiter } from './middleware/rate-limit';
import { logger } from './utils/logger';
import { withRetry } from './utils/retry';
import { getAllowedCorsOrigins, getApiRateLimit, getTrustProxy, isTestEnv } from './config/env';
import { AppDataSource } from './config/data-source';

const DB_HEALTH_TIMEOUT_MS = 2000;

export function createApp() {
  const app = express();
  const allowedOrigins = getAllowedCorsOrigins();
  app.set('trust proxy', getTrustProxy());
  const apiRateLimiter = createRateLimiter({
    windowMs: 60 * 1000,
    max: getApiRateLimit(),
    message: 'Too many requests.',
  });

  app.use(helmet());
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      return callback(new Error('CORS origin is not allowed'));
    },
  }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use('/api', apiRateLimiter);

  app.use((req, _res, next) => {
    if (!isTestEnv()) {
      logger.info(`${req.method} ${req.url}`);
    }
    next();
  });

  app.use('/api', analysisRouter);
  app.use('/api/words', wordCacheRouter);
  app.use('/api/templates', templateRouter);
  app.get('/api/vocabulary', getVocabulary);

  app.get('/health', (_req, res) => {
    res.json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  app.get('/health/db', async (_req, res) => {
    if (!AppDataSource.isInitialized) {
      res.status(503).json({ status: 'DOWN', reason: 'Datasource not initialized' });
      return;
    }

    try {
      const startedAt = Date.now();
      await withRetry(async () => {
        let timer: NodeJS.Timeout | null = null;
        try {
          const timeoutPromise = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error('DB health timeout')), DB_HEALTH_TIMEOUT_MS);
          });
          return await Promise.race([AppDataSource.query('SELECT 1'), timeoutPromise]);
        } finally {
          if (timer) {
            clearTimeout(timer);
          }
        }
      }, { attempts: 2, baseDelayMs: 200, maxDelayMs: 1000 });
      res.json({ status: 'OK', latencyMs: Date.now() - startedAt });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'DB health check failed';
      logger.warn('DB health check failed', { error: message });
      res.status(503).json({ status: 'DOWN', error: message });
    }
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
