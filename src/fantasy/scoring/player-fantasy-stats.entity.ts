import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique, UpdateDateColumn } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import { Player } from '../../players/player.entity';
import { FantasyWeek } from '../schedule/fantasy-week.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';

@Entity({ name: 'player_fantasy_stats' })
@Unique('uq_player_fantasy_stats_player_week_team', ['playerId', 'weekId', 'fantasyTeamId'])
export class PlayerFantasyStats {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'player_id' }) playerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'player_id' })
  player!: Player;

  @Column({ name: 'week_id' }) weekId!: number;
  @ManyToOne(() => FantasyWeek, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'week_id' })
  week!: FantasyWeek;

  @Column({ name: 'fantasy_team_id' }) fantasyTeamId!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'fantasy_team_id' })
  fantasyTeam!: FantasyTeam;

  @Column({ name: 'games_played', type: 'int', default: 0 }) gamesPlayed!: number;
  @Column({ type: 'int', default: 0 }) goals!: number;
  @Column({ type: 'int', default: 0 }) assists!: number;
  @Column({ name: 'plus_minus', type: 'int', default: 0 }) plusMinus!: number;
  @Column({ name: 'penalty_minutes', type: 'int', default: 0 }) penaltyMinutes!: number;
  @Column({ name: 'power_play_goals', type: 'int', default: 0 }) powerPlayGoals!: number;
  @Column({ name: 'power_play_assists', type: 'int', default: 0 }) powerPlayAssists!: number;
  @Column({ name: 'short_handed_goals', type: 'int', default: 0 }) shortHandedGoals!: number;
  @Column({ name: 'short_handed_assists', type: 'int', default: 0 }) shortHandedAssists!: number;
  @Column({ name: 'shots_on_goal', type: 'int', default: 0 }) shotsOnGoal!: number;
  @Column({ type: 'int', default: 0 }) hits!: number;
  @Column({ name: 'blocked_shots', type: 'int', default: 0 }) blockedShots!: number;

  @Column({ type: 'int', default: 0 }) wins!: number;
  @Column({ type: 'int', default: 0 }) losses!: number;
  @Column({ name: 'goals_against', type: 'int', default: 0 }) goalsAgainst!: number;
  @Column({ type: 'int', default: 0 }) saves!: number;
  @Column({ type: 'int', default: 0 }) shutouts!: number;

  @Column({ name: 'total_fantasy_points', type: 'decimal', precision: 8, scale: 2, default: 0, transformer: decimalTransformer })
  totalFantasyPoints!: number;

  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;
}
