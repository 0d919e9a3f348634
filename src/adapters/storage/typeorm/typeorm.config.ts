import { DataSource, DataSourceOptions } from 'typeorm';
import { KASSA_ENTITIES } from './entities';

export interface DatabaseSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolSize: number;
  logging: boolean;
  synchronize: boolean;
}

export const defaultDatabaseSettings: DatabaseSettings = {
  host: 'localhost',
  port: 5432,
  username: 'kassa',
  password: 'kassa',
  database: 'kassa',
  poolSize: 10,
  logging: false,
  synchronize: false,
};

/**
 * TypeORM configuration for Kassa
 */
export const createTypeORMConfig = (
  settings: Partial<DatabaseSettings> = {},
): DataSourceOptions => {
  const resolved = { ...defaultDatabaseSettings, ...settings };

  return {
    type: 'postgres',
    host: resolved.host,
    port: resolved.port,
    username: resolved.username,
    password: resolved.password,
    database: resolved.database,
    entities: KASSA_ENTITIES,
    synchronize: resolved.synchronize,
    logging: resolved.logging,
    // Connection pool settings
    extra: {
      max: resolved.poolSize,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  settings: Partial<DatabaseSettings> = {},
): DataSource => {
  return new DataSource(createTypeORMConfig(settings));
};
