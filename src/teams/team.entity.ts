import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { Conference } from './conference.entity';
import { Division } from './division.entity';

@Entity({ name: 'team' })
@Unique('uq_team_city_name', ['city', 'name'])
export class Team {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 100 }) name!: string;
  @Column({ type: 'varchar', length: 100 }) city!: string;
  @Column({ type: 'varchar', length: 10, unique: true }) abbreviation!: string;

  @Column({ name: 'division_id' }) divisionId!: number;

  @ManyToOne(() => Division, (d) => d.teams, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'division_id' })
  division!: Division;

  @Column({ name: 'founded_year', type: 'int', nullable: true }) foundedYear!: number | null;
  @Column({ name: 'arena_name', type: 'varchar', length: 200, default: '' }) arenaName!: string;
  @Column({ name: 'arena_capacity', type: 'int', nullable: true }) arenaCapacity!: number | null;

  // Hex (#RRGGBB) o vacío
  @Column({ name: 'primary_color', type: 'varchar', length: 7, default: '' }) primaryColor!: string;
  @Column({ name: 'secondary_color', type: 'varchar', length: 7, default: '' }) secondaryColor!: string;
  @Column({ name: 'logo_url', type: 'varchar', length: 200, default: '' }) logoUrl!: string;

  @Column({ name: 'is_active', default: true }) isActive!: boolean;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;

  get fullName(): string {
    return `${this.city} ${this.name}`;
  }

  get conference(): Conference | null {
    return this.division?.conference ?? null;
  }
}
