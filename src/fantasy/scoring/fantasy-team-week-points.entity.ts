// src/fantasy/scoring/fantasy-team-week-points.entity.ts
import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique, UpdateDateColumn } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import { FantasyWeek } from '../schedule/fantasy-week.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';

/** Puntos de los titulares de un equipo en una semana. */
@Entity({ name: 'fantasy_team_week_points' })
@Unique('uq_team_week_points', ['fantasyTeamId', 'weekId'])
export class FantasyTeamWeekPoints {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'fantasy_team_id' }) fantasyTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'fantasy_team_id' })
  fantasyTeam!: FantasyTeam;

  @Column({ name: 'week_id' }) weekId!: number;
  @ManyToOne(() => FantasyWeek, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'week_id' })
  week!: FantasyWeek;

  @Column({ type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer }) points!: number;

  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;
}
