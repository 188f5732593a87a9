// src/fantasy/scoring/fantasy-scoring.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { FantasyWeek } from '../schedule/fantasy-week.entity';
import { FantasyScoring } from './fantasy-scoring.entity';
import { FantasyTeamWeekPoints } from './fantasy-team-week-points.entity';
import { PlayerFantasyStats } from './player-fantasy-stats.entity';
import { ScoringController } from './scoring.controller';
import { ScoringService } from './scoring.service';

@Module({
  imports: [TypeOrmModule.forFeature([FantasyLeague, FantasyWeek, FantasyScoring, FantasyTeamWeekPoints, PlayerFantasyStats])],
  controllers: [ScoringController],
  providers: [ScoringService],
  exports: [ScoringService],
})
export class FantasyScoringModule {}
