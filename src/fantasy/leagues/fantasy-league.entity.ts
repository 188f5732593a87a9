// src/fantasy/leagues/fantasy-league.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  OneToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { AppUser } from '../../auth/user.entity';
import { Season } from '../../teams/season.entity';
import { FantasyScoring } from '../scoring/fantasy-scoring.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';

export type ScoringSystem = 'points' | 'categories' | 'rotisserie' | 'head_to_head';
export const SCORING_SYSTEMS: ScoringSystem[] = ['points', 'categories', 'rotisserie', 'head_to_head'];

export type DraftType = 'snake' | 'linear' | 'auction';
export const DRAFT_TYPES: DraftType[] = ['snake', 'linear', 'auction'];

export const MIN_LEAGUE_TEAMS = 4;
export const MAX_LEAGUE_TEAMS = 20;

@Entity({ name: 'fantasy_league' })
export class FantasyLeague {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 100 }) name!: string;
  @Column({ type: 'text', default: '' }) description!: string;

  @Column({ name: 'season_id' }) seasonId!: number;
  @ManyToOne(() => Season, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'season_id' })
  season!: Season;

  @Column({ name: 'max_teams', type: 'int', default: 12 }) maxTeams!: number;
  @Column({ name: 'roster_size', type: 'int', default: 23 }) rosterSize!: number;
  @Column({ name: 'starting_lineup_size', type: 'int', default: 9 }) startingLineupSize!: number;

  @Column({ name: 'scoring_system', type: 'varchar', length: 20, default: 'points' }) scoringSystem!: ScoringSystem;

  // Sólo datos: el draft no se gestiona desde la API
  @Column({ name: 'draft_type', type: 'varchar', length: 20, default: 'snake' }) draftType!: DraftType;
  @Column({ name: 'draft_date', type: Date, nullable: true }) draftDate!: Date | null;
  @Column({ name: 'is_drafted', default: false }) isDrafted!: boolean;

  @Column({ name: 'is_active', default: true }) isActive!: boolean;
  @Column({ name: 'is_public', default: false }) isPublic!: boolean;

  @Column({ name: 'invite_code', type: 'varchar', length: 12, unique: true }) inviteCode!: string;

  @Column({ name: 'commissioner_id' }) commissionerId!: number;
  @ManyToOne(() => AppUser, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'commissioner_id' })
  commissioner!: AppUser;

  @OneToMany(() => FantasyTeam, (t) => t.league)
  teams!: FantasyTeam[];

  @OneToOne(() => FantasyScoring, (s) => s.league)
  scoring!: FantasyScoring;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;
}
