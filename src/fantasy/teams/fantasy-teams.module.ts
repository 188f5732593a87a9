// src/fantasy/teams/fantasy-teams.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FantasyTeam } from './fantasy-team.entity';
import { FantasyTeamsController } from './fantasy-teams.controller';
import { FantasyTeamsService } from './fantasy-teams.service';
import { RosterPosition } from './roster-position.entity';
import { RosterSlot } from './roster-slot.entity';
import { Roster } from './roster.entity';

@Module({
  imports: [TypeOrmModule.forFeature([FantasyTeam, Roster, RosterPosition, RosterSlot])],
  controllers: [FantasyTeamsController],
  providers: [FantasyTeamsService],
  exports: [FantasyTeamsService],
})
export class FantasyTeamsModule {}
