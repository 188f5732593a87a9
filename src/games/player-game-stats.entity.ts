import {
  BeforeInsert,
  BeforeUpdate,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { Player } from '../players/player.entity';
import { formatSeconds, round } from '../players/player.util';
import { Team } from '../teams/team.entity';
import { Game } from './game.entity';

@Entity({ name: 'player_game_stats' })
@Unique('uq_player_game_stats_player_game', ['playerId', 'gameId'])
@Index('idx_player_game_stats_game', ['gameId'])
export class PlayerGameStats {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'player_id' }) playerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'player_id' })
  player!: Player;

  @Column({ name: 'game_id' }) gameId!: number;
  @ManyToOne(() => Game, (g) => g.playerStats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'game_id' })
  game!: Game;

  @Column({ name: 'team_id' }) teamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team_id' })
  team!: Team;

  @Column({ default: true }) played!: boolean;
  @Column({ default: false }) starter!: boolean;

  @Column({ type: 'int', default: 0 }) goals!: number;
  @Column({ type: 'int', default: 0 }) assists!: number;
  @Column({ type: 'int', default: 0 }) points!: number;
  @Column({ name: 'plus_minus', type: 'int', default: 0 }) plusMinus!: number;
  @Column({ name: 'penalty_minutes', type: 'int', default: 0 }) penaltyMinutes!: number;

  @Column({ name: 'shots_on_goal', type: 'int', default: 0 }) shotsOnGoal!: number;
  @Column({ name: 'shots_missed', type: 'int', default: 0 }) shotsMissed!: number;
  @Column({ name: 'shots_blocked', type: 'int', default: 0 }) shotsBlocked!: number;

  @Column({ name: 'time_on_ice_seconds', type: 'int', default: 0 }) timeOnIceSeconds!: number;

  @Column({ type: 'int', default: 0 }) hits!: number;
  @Column({ name: 'blocked_shots', type: 'int', default: 0 }) blockedShots!: number;

  @Column({ name: 'faceoff_wins', type: 'int', default: 0 }) faceoffWins!: number;
  @Column({ name: 'faceoff_attempts', type: 'int', default: 0 }) faceoffAttempts!: number;

  // Porteros
  @Column({ type: 'int', default: 0 }) saves!: number;
  @Column({ name: 'goals_against', type: 'int', default: 0 }) goalsAgainst!: number;
  @Column({ name: 'shots_against', type: 'int', default: 0 }) shotsAgainst!: number;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;

  @BeforeInsert()
  @BeforeUpdate()
  recalculatePoints() {
    this.points = (this.goals ?? 0) + (this.assists ?? 0);
  }

  get faceoffPercentage(): number {
    return this.faceoffAttempts > 0 ? round((this.faceoffWins / this.faceoffAttempts) * 100, 2) : 0;
  }

  get savePercentage(): number {
    return this.shotsAgainst > 0 ? round(this.saves / this.shotsAgainst, 3) : 0;
  }

  get timeOnIceDisplay(): string {
    return formatSeconds(this.timeOnIceSeconds);
  }
}
