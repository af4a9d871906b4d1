// src/database/data-source.ts
import 'reflect-metadata';
import 'dotenv/config';

import { DataSource } from 'typeorm';
import type { DataSourceOptions } from 'typeorm';
import path from 'path';
import { ENTITIES } from './entities.js';

const isProd = process.env.NODE_ENV === 'production';

// .ts under src when run from sources, .js under dist once built
const migrationsGlob = path.join(__dirname, 'migrations', '*.{ts,js}');

export function dataSourceOptions(url = process.env.DATABASE_URL): DataSourceOptions {
  return {
    type: 'postgres',
    url,
    ssl: isProd ? { rejectUnauthorized: false } : false,
    entities: ENTITIES,
    migrations: [migrationsGlob],
    migrationsTableName: 'typeorm_migrations',
    logging: false,
  };
}

const dataSource = new DataSource(dataSourceOptions());

export default dataSource;
