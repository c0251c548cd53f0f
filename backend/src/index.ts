import 'reflect-metadata';
import { config } from 'dotenv';
import { AppDataSource } from './config/data-source';
import { createApp } from './app';
import { assertProductionEnv, getAppPort, getOpenAIApiKey } from './config/env';
import { ensureDefaults } from './services/bootstrap.service';
import { logger } from './utils/logger';

config();

async function startServer() {
  try {
    assertProductionEnv();
    await AppDataSource.initialize();
    logger.info('Database connected successfully', { type: AppDataSource.options.type });
    await ensureDefaults();

    if (getOpenAIApiKey()) {
      logger.info('OPENAI_API_KEY loaded');
    } else {
      logger.error('OPENAI_API_KEY is not set; analysis and speech requests will fail');
    }

    const port = getAppPort();
    const server = createApp().listen(port, () => {
      logger.info(`Server running on port ${port}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      server.close(() => {
        AppDataSource.destroy()
          .catch((error) => logger.error('Failed to close database connection:', error))
          .finally(() => process.exit(0));
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
