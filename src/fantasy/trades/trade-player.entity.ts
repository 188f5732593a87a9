import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Player } from '../../players/player.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { Trade } from './trade.entity';

@Entity({ name: 'trade_player' })
export class TradePlayer {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'trade_id' }) tradeId!: number;
  @ManyToOne(() => Trade, (t) => t.players, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'trade_id' })
  trade!: Trade;

  @Column({ name: 'player_id' }) playerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'player_id' })
  player!: Player;

  @Column({ name: 'from_team_id' }) fromTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'from_team_id' })
  fromTeam!: FantasyTeam;

  @Column({ name: 'to_team_id' }) toTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'to_team_id' })
  toTeam!: FantasyTeam;
}
