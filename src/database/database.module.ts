import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildPostgresOptions } from './database.config';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) =>
        buildPostgresOptions({
          url: cfg.get<string>('DATABASE_URL'),
          ssl: cfg.get<string>('DATABASE_SSL')?.toLowerCase() === 'true',
          logging: cfg.get<string>('DB_LOGGING')?.toLowerCase() === 'true',
        }),
    }),
  ],
})
export class DatabaseModule {}
