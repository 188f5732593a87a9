// src/fantasy/scheduler/fantasy-scheduler.module.ts
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { FantasyScoringModule } from '../scoring/fantasy-scoring.module';
import { FantasySchedulerService } from './scheduler.service';

@Module({
  imports: [ScheduleModule.forRoot(), FantasyScoringModule],
  providers: [FantasySchedulerService],
})
export class FantasySchedulerModule {}
