import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PlayerTeamHistory } from '../players/player-team-history.entity';
import { Conference } from './conference.entity';
import { Division } from './division.entity';
import { LeagueStructureController } from './league-structure.controller';
import { Season } from './season.entity';
import { Team } from './team.entity';
import { TeamsController } from './teams.controller';
import { TeamsService } from './teams.service';

@Module({
  imports: [TypeOrmModule.forFeature([Conference, Division, Team, Season, PlayerTeamHistory])],
  controllers: [TeamsController, LeagueStructureController],
  providers: [TeamsService],
  exports: [TypeOrmModule, TeamsService],
})
export class TeamsModule {}
