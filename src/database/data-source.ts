import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { envFlag } from '../config/env.util';
import { loadEnv } from '../config/load-env';
import { buildPostgresOptions } from './database.config';

loadEnv();

// DataSource standalone para migrate / makemigrations
export const AppDataSource = new DataSource(
  buildPostgresOptions({
    url: process.env.DATABASE_URL,
    ssl: envFlag('DATABASE_SSL', false),
    logging: envFlag('DB_LOGGING', false),
  }),
);
