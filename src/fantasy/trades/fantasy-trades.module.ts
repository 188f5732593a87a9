import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { TradePlayer } from './trade-player.entity';
import { Trade } from './trade.entity';
import { TradesController } from './trades.controller';
import { TradesService } from './trades.service';

@Module({
  imports: [TypeOrmModule.forFeature([Trade, TradePlayer, FantasyTeam])],
  controllers: [TradesController],
  providers: [TradesService],
})
export class FantasyTradesModule {}
