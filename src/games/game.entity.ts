import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { Goal } from './goal.entity';
import { PlayerGameStats } from './player-game-stats.entity';

export type GameType = 'regular' | 'playoff' | 'preseason' | 'all_star';
export const GAME_TYPES: GameType[] = ['regular', 'playoff', 'preseason', 'all_star'];

export type GameStatus = 'scheduled' | 'in_progress' | 'final' | 'overtime' | 'shootout' | 'postponed' | 'cancelled';
export const GAME_STATUSES: GameStatus[] = ['scheduled', 'in_progress', 'final', 'overtime', 'shootout', 'postponed', 'cancelled'];
// Estados con resultado definitivo
export const COMPLETED_STATUSES: GameStatus[] = ['final', 'overtime', 'shootout'];

@Entity({ name: 'game' })
@Unique('uq_game_home_away_date', ['homeTeamId', 'awayTeamId', 'gameDate'])
@Index('idx_game_season_date', ['seasonId', 'gameDate'])
export class Game {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'home_team_id' }) homeTeamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'home_team_id' })
  homeTeam!: Team;

  @Column({ name: 'away_team_id' }) awayTeamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'away_team_id' })
  awayTeam!: Team;

  @Column({ name: 'season_id' }) seasonId!: number;
  @ManyToOne(() => Season, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'season_id' })
  season!: Season;

  @Column({ name: 'game_date' }) gameDate!: Date;
  @Column({ name: 'game_type', type: 'varchar', length: 20, default: 'regular' }) gameType!: GameType;

  @Column({ name: 'home_score', type: 'int', default: 0 }) homeScore!: number;
  @Column({ name: 'away_score', type: 'int', default: 0 }) awayScore!: number;

  @Column({ type: 'varchar', length: 20, default: 'scheduled' }) status!: GameStatus;

  @Column({ name: 'periods_played', type: 'int', default: 0 }) periodsPlayed!: number;
  @Column({ name: 'overtime_periods', type: 'int', default: 0 }) overtimePeriods!: number;
  @Column({ default: false }) shootout!: boolean;

  @Column({ type: 'int', nullable: true }) attendance!: number | null;
  @Column({ type: 'varchar', length: 200, default: '' }) venue!: string;

  @Column({ name: 'nhl_game_id', type: 'varchar', length: 50, unique: true, nullable: true }) nhlGameId!: string | null;

  @OneToMany(() => Goal, (g) => g.game)
  goals!: Goal[];

  @OneToMany(() => PlayerGameStats, (s) => s.game)
  playerStats!: PlayerGameStats[];

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;

  get isCompleted(): boolean {
    return COMPLETED_STATUSES.includes(this.status);
  }

  get winnerTeamId(): number | null {
    if (!this.isCompleted || this.homeScore === this.awayScore) return null;
    return this.homeScore > this.awayScore ? this.homeTeamId : this.awayTeamId;
  }

  get loserTeamId(): number | null {
    if (!this.isCompleted || this.homeScore === this.awayScore) return null;
    return this.homeScore > this.awayScore ? this.awayTeamId : this.homeTeamId;
  }

  get winner(): Team | null {
    const id = this.winnerTeamId;
    if (id === null) return null;
    return id === this.homeTeamId ? this.homeTeam : this.awayTeam;
  }

  get loser(): Team | null {
    const id = this.loserTeamId;
    if (id === null) return null;
    return id === this.homeTeamId ? this.homeTeam : this.awayTeam;
  }

  get isOvertimeGame(): boolean {
    return this.status === 'overtime' || this.status === 'shootout';
  }

  // 'TOR @ BOS - 2024-10-12'; requiere equipos cargados
  get label(): string {
    const day = this.gameDate.toISOString().slice(0, 10);
    return `${this.awayTeam?.abbreviation ?? this.awayTeamId} @ ${this.homeTeam?.abbreviation ?? this.homeTeamId} - ${day}`;
  }
}
