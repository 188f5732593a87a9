import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Team } from '../teams/team.entity';
import { Position } from './position.entity';
import { PlayerTeamHistory } from './player-team-history.entity';
import { computeAge, heightDisplay } from './player.util';

export type Handedness = 'L' | 'R' | '';

@Entity({ name: 'player' })
export class Player {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'first_name', type: 'varchar', length: 100 }) firstName!: string;
  @Column({ name: 'last_name', type: 'varchar', length: 100 }) lastName!: string;
  @Column({ name: 'jersey_number', type: 'int', nullable: true }) jerseyNumber!: number | null;

  @Column({ name: 'height_inches', type: 'int', nullable: true }) heightInches!: number | null;
  @Column({ name: 'weight_lbs', type: 'int', nullable: true }) weightLbs!: number | null;

  @Column({ name: 'birth_date', type: 'date', nullable: true }) birthDate!: string | null;
  @Column({ name: 'birth_city', type: 'varchar', length: 100, default: '' }) birthCity!: string;
  @Column({ name: 'birth_country', type: 'varchar', length: 100, default: '' }) birthCountry!: string;
  @Column({ type: 'varchar', length: 100, default: '' }) nationality!: string;

  @Column({ name: 'position_id' }) positionId!: number;

  @ManyToOne(() => Position, (p) => p.players, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'position_id' })
  position!: Position;

  @Column({ type: 'varchar', length: 5, default: '' }) shoots!: Handedness;
  // sólo porteros
  @Column({ type: 'varchar', length: 5, default: '' }) catches!: Handedness;

  @Column({ name: 'draft_year', type: 'int', nullable: true }) draftYear!: number | null;
  @Column({ name: 'draft_round', type: 'int', nullable: true }) draftRound!: number | null;
  @Column({ name: 'draft_pick', type: 'int', nullable: true }) draftPick!: number | null;

  @Column({ name: 'draft_team_id', type: 'int', nullable: true }) draftTeamId!: number | null;

  @ManyToOne(() => Team, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'draft_team_id' })
  draftTeam!: Team | null;

  @Column({ name: 'is_active', default: true }) isActive!: boolean;
  @Column({ name: 'is_rookie', default: false }) isRookie!: boolean;

  // Id externo para importaciones
  @Column({ name: 'nhl_id', type: 'varchar', length: 50, unique: true, nullable: true }) nhlId!: string | null;

  @OneToMany(() => PlayerTeamHistory, (h) => h.player)
  teamHistory!: PlayerTeamHistory[];

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }

  get age(): number | null {
    return computeAge(this.birthDate);
  }

  get heightDisplay(): string | null {
    return heightDisplay(this.heightInches);
  }
}
