import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PlayerStats } from './player-stats.entity';
import { PlayerStatsService } from './player-stats.service';
import { PlayerTeamHistory } from './player-team-history.entity';
import { Player } from './player.entity';
import { PlayersController } from './players.controller';
import { PlayersService } from './players.service';
import { Position } from './position.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Position, Player, PlayerTeamHistory, PlayerStats])],
  controllers: [PlayersController],
  providers: [PlayersService, PlayerStatsService],
  exports: [TypeOrmModule, PlayersService, PlayerStatsService],
})
export class PlayersModule {}
