import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { config } from 'dotenv';
import { ENTITIES } from '../models';
import { getDatabaseType } from './env';

config();

export function buildDataSourceOptions(): DataSourceOptions {
  const logging = process.env.NODE_ENV === 'development';

  if (getDatabaseType() === 'postgres') {
    return {
      type: 'postgres',
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432', 10),
      username: process.env.DB_USERNAME || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
      database: process.env.DB_DATABASE || 'word_cache',
      synchronize: true,
      logging,
      entities: ENTITIES,
    };
  }

  return {
    type: 'better-sqlite3',
    database: process.env.DB_DATABASE || 'word_cache.db',
    synchronize: true,
    logging,
    entities: ENTITIES,
  };
}

export const AppDataSource = new DataSource(buildDataSourceOptions());

export default AppDataSource;
