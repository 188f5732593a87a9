import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { GlobalAuthGuard } from './auth/global-auth.guard';
import { envFlag, envNumber } from './config/env.util';
import { DatabaseModule } from './database/database.module';
import { FEATURE_MODULES } from './feature-modules';
import { FantasySchedulerModule } from './fantasy/scheduler/fantasy-scheduler.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    // ttl en ms desde throttler v5; RATE_LIMIT_TTL se expresa en segundos
    ThrottlerModule.forRoot([
      { ttl: envNumber('RATE_LIMIT_TTL', 60) * 1000, limit: envNumber('RATE_LIMIT_LIMIT', 120) },
    ]),
    DatabaseModule,
    ...FEATURE_MODULES,
    ...(envFlag('ENABLE_FANTASY_SCHEDULER', true) ? [FantasySchedulerModule] : []),
  ],
  controllers: [AppController, HealthController],
  providers: [
    AppService,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    // JWT obligatorio salvo @Public()
    { provide: APP_GUARD, useClass: GlobalAuthGuard },
  ],
})
export class AppModule {}
