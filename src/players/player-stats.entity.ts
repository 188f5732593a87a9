import {
  BeforeInsert,
  BeforeUpdate,
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { decimalTransformer } from '../database/decimal.transformer';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { Player } from './player.entity';
import { applyDerivedTotals, formatSeconds } from './player.util';

@Entity({ name: 'player_stats' })
@Unique('uq_player_stats_player_team_season', ['playerId', 'teamId', 'seasonId'])
export class PlayerStats {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'player_id' }) playerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'player_id' })
  player!: Player;

  @Column({ name: 'team_id' }) teamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team_id' })
  team!: Team;

  @Column({ name: 'season_id' }) seasonId!: number;
  @ManyToOne(() => Season, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'season_id' })
  season!: Season;

  @Column({ name: 'games_played', type: 'int', default: 0 }) gamesPlayed!: number;

  @Column({ type: 'int', default: 0 }) goals!: number;
  @Column({ type: 'int', default: 0 }) assists!: number;
  @Column({ type: 'int', default: 0 }) points!: number;
  @Column({ name: 'plus_minus', type: 'int', default: 0 }) plusMinus!: number;
  @Column({ name: 'penalty_minutes', type: 'int', default: 0 }) penaltyMinutes!: number;

  @Column({ name: 'power_play_goals', type: 'int', default: 0 }) powerPlayGoals!: number;
  @Column({ name: 'power_play_assists', type: 'int', default: 0 }) powerPlayAssists!: number;
  @Column({ name: 'power_play_points', type: 'int', default: 0 }) powerPlayPoints!: number;

  @Column({ name: 'short_handed_goals', type: 'int', default: 0 }) shortHandedGoals!: number;
  @Column({ name: 'short_handed_assists', type: 'int', default: 0 }) shortHandedAssists!: number;
  @Column({ name: 'short_handed_points', type: 'int', default: 0 }) shortHandedPoints!: number;

  @Column({ name: 'shots_on_goal', type: 'int', default: 0 }) shotsOnGoal!: number;
  @Column({ name: 'shooting_percentage', type: 'decimal', precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  shootingPercentage!: number;

  @Column({ name: 'time_on_ice_seconds', type: 'int', default: 0 }) timeOnIceSeconds!: number;
  @Column({ name: 'average_time_on_ice_seconds', type: 'int', default: 0 }) averageTimeOnIceSeconds!: number;

  // Porteros
  @Column({ type: 'int', default: 0 }) wins!: number;
  @Column({ type: 'int', default: 0 }) losses!: number;
  @Column({ name: 'overtime_losses', type: 'int', default: 0 }) overtimeLosses!: number;
  @Column({ type: 'int', default: 0 }) shutouts!: number;
  @Column({ name: 'goals_against', type: 'int', default: 0 }) goalsAgainst!: number;
  @Column({ name: 'shots_against', type: 'int', default: 0 }) shotsAgainst!: number;
  @Column({ type: 'int', default: 0 }) saves!: number;
  @Column({ name: 'goals_against_average', type: 'decimal', precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  goalsAgainstAverage!: number;
  @Column({ name: 'save_percentage', type: 'decimal', precision: 5, scale: 3, default: 0, transformer: decimalTransformer })
  savePercentage!: number;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;

  @BeforeInsert()
  @BeforeUpdate()
  recalculateTotals() {
    applyDerivedTotals(this);
  }

  get averageTimeOnIceDisplay(): string {
    return formatSeconds(this.averageTimeOnIceSeconds);
  }
}
