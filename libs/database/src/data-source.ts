import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { ENTITIES } from './entities';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * Used by `typeorm migration:run` and `typeorm migration:revert`.
 * Credentials come from the environment with local dev defaults.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'biocurate',
  password: process.env['POSTGRES_PASSWORD'] || 'biocurate_secret',
  database: process.env['POSTGRES_DB'] || 'biocurate',
  entities: [...ENTITIES],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
