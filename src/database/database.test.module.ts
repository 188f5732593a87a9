import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES, SUBSCRIBERS } from './entities';
import { ReadableNamingStrategy } from './naming.strategy';

// BD en memoria para e2e: cada app de test arranca con un esquema limpio
@Module({
  imports: [
    TypeOrmModule.forRoot({
      type: 'better-sqlite3',
      database: ':memory:',
      dropSchema: true,
      synchronize: true,
      logging: ['error'],
      entities: ENTITIES,
      subscribers: SUBSCRIBERS,
      namingStrategy: new ReadableNamingStrategy(),
    }),
  ],
})
export class DatabaseTestModule {}
