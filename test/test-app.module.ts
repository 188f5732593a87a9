// test/test-app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { AppController } from '../src/app.controller';
import { AppService } from '../src/app.service';
import { GlobalAuthGuard } from '../src/auth/global-auth.guard';
import { DatabaseTestModule } from '../src/database/database.test.module';
import { FEATURE_MODULES } from '../src/feature-modules';
import { HealthController } from '../src/health/health.controller';

// Igual que AppModule salvo BD (sqlite en memoria), throttler y cron
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }), DatabaseTestModule, ...FEATURE_MODULES],
  controllers: [AppController, HealthController],
  providers: [AppService, { provide: APP_GUARD, useClass: GlobalAuthGuard }],
})
export class TestAppModule {}
