// src/fantasy/teams/fantasy-team.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { AppUser } from '../../auth/user.entity';
import { decimalTransformer } from '../../database/decimal.transformer';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { Roster } from './roster.entity';

@Entity({ name: 'fantasy_team' })
@Unique('uq_fantasy_team_owner_league', ['ownerId', 'leagueId'])
export class FantasyTeam {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 100 }) name!: string;

  @Column({ name: 'owner_id' }) ownerId!: number;
  @ManyToOne(() => AppUser, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'owner_id' })
  owner!: AppUser;

  @Column({ name: 'league_id' }) leagueId!: number;
  @ManyToOne(() => FantasyLeague, (l) => l.teams, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'league_id' })
  league!: FantasyLeague;

  @Column({ name: 'logo_url', type: 'varchar', length: 200, default: '' }) logoUrl!: string;

  @Column({ type: 'int', default: 0 }) wins!: number;
  @Column({ type: 'int', default: 0 }) losses!: number;
  @Column({ type: 'int', default: 0 }) ties!: number;
  @Column({ name: 'total_points', type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
  totalPoints!: number;

  @OneToOne(() => Roster, (r) => r.fantasyTeam)
  roster!: Roster;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;

  get winPercentage(): number {
    return winPercentage(this.wins, this.losses, this.ties);
  }
}

/** (W + 0.5·T) / partidos; 0 sin partidos. */
export function winPercentage(wins: number, losses: number, ties: number): number {
  const total = wins + losses + ties;
  if (total === 0) return 0;
  return Number(((wins + ties * 0.5) / total).toFixed(3));
}
