import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { TradePlayer } from './trade-player.entity';

export type TradeStatus = 'pending' | 'accepted' | 'rejected' | 'cancelled' | 'completed';
export const TRADE_STATUSES: TradeStatus[] = ['pending', 'accepted', 'rejected', 'cancelled', 'completed'];

@Entity({ name: 'trade' })
export class Trade {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'from_team_id' }) fromTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'from_team_id' })
  fromTeam!: FantasyTeam;

  @Column({ name: 'to_team_id' }) toTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'to_team_id' })
  toTeam!: FantasyTeam;

  @Column({ type: 'varchar', length: 20, default: 'pending' }) status!: TradeStatus;

  @CreateDateColumn({ name: 'proposed_date' }) proposedDate!: Date;
  @Column({ name: 'response_date', type: Date, nullable: true }) responseDate!: Date | null;
  @Column({ name: 'completion_date', type: Date, nullable: true }) completionDate!: Date | null;

  @Column({ type: 'text', default: '' }) message!: string;

  @OneToMany(() => TradePlayer, (tp) => tp.trade)
  players!: TradePlayer[];
}
