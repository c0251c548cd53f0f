import 'reflect-metadata';
import { AppDataSource } from '../config/data-source';
import { ensureDefaults } from '../services/bootstrap.service';
import { logger } from '../utils/logger';

/**
 * Drops every table, recreates the schema and seeds the defaults.
 */
export async function rebuildDatabase(): Promise<void> {
  if (!AppDataSource.isInitialized) {
    await AppDataSource.initialize();
  }
  await AppDataSource.synchronize(true);
  logger.info('Schema recreated');
  await ensureDefaults();
}

if (require.main === module) {
  rebuildDatabase()
    .then(() => {
      logger.info('Database rebuilt successfully');
      return AppDataSource.destroy();
    })
    .catch((error) => {
      logger.error('Database rebuild failed:', error);
      process.exitCode = 1;
    });
}
