import { DataSourceOptions } from 'typeorm';
import { ENTITIES, SUBSCRIBERS } from './entities';
import { ReadableNamingStrategy } from './naming.strategy';

export interface PostgresSettings {
  url: string | undefined;
  ssl: boolean;
  logging: boolean;
}

/** Opciones comunes de la app y del DataSource de CLI (migraciones). */
export function buildPostgresOptions(settings: PostgresSettings): DataSourceOptions {
  if (!settings.url) throw new Error('DATABASE_URL is not defined');
  return {
    type: 'postgres',
    url: settings.url,
    synchronize: false,
    logging: settings.logging ? ['query', 'error'] : ['error'],
    ssl: settings.ssl ? { rejectUnauthorized: false } : false,
    entities: ENTITIES,
    subscribers: SUBSCRIBERS,
    namingStrategy: new ReadableNamingStrategy(),
    migrations: [__dirname + '/../migrations/*.{ts,js}'],
    migrationsTableName: 'typeorm_migrations',
  };
}
