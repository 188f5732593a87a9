import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { GameEvent } from './game-event.entity';
import { Game } from './game.entity';
import { GamesController } from './games.controller';
import { GamesService } from './games.service';
import { Goal } from './goal.entity';
import { PlayerGameStats } from './player-game-stats.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Game, GameEvent, Goal, PlayerGameStats, Season, Team])],
  controllers: [GamesController],
  providers: [GamesService],
  exports: [TypeOrmModule, GamesService],
})
export class GamesModule {}
