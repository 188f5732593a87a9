import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuthModule } from '../auth/auth.module';
import { DatabaseModule } from '../database/database.module';
import { SeedModule } from '../seed/seed.module';

// Contexto sin HTTP para los comandos que usan servicios de la app
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), DatabaseModule, AuthModule, SeedModule],
})
export class ManageModule {}
