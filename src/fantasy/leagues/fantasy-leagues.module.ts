// src/fantasy/leagues/fantasy-leagues.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Player } from '../../players/player.entity';
import { Season } from '../../teams/season.entity';
import { ScheduleController } from '../schedule/schedule.controller';
import { ScheduleService } from '../schedule/schedule.service';
import { FantasyWeek } from '../schedule/fantasy-week.entity';
import { Matchup } from '../schedule/matchup.entity';
import { FantasyScoring } from '../scoring/fantasy-scoring.entity';
import { FantasyTeamWeekPoints } from '../scoring/fantasy-team-week-points.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { Roster } from '../teams/roster.entity';
import { FantasyLeague } from './fantasy-league.entity';
import { FantasyLeaguesController } from './fantasy-leagues.controller';
import { FantasyLeaguesService } from './fantasy-leagues.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      FantasyLeague,
      FantasyScoring,
      FantasyTeam,
      Roster,
      Player,
      Season,
      FantasyWeek,
      Matchup,
      FantasyTeamWeekPoints,
    ]),
  ],
  controllers: [FantasyLeaguesController, ScheduleController],
  providers: [FantasyLeaguesService, ScheduleService],
  exports: [FantasyLeaguesService, ScheduleService],
})
export class FantasyLeaguesModule {}
