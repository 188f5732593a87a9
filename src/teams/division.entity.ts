import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Conference } from './conference.entity';
import { Team } from './team.entity';

@Entity({ name: 'division' })
export class Division {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 50, unique: true }) name!: string;
  @Column({ type: 'varchar', length: 10, unique: true }) abbreviation!: string;

  @Column({ name: 'conference_id' }) conferenceId!: number;

  @ManyToOne(() => Conference, (c) => c.divisions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'conference_id' })
  conference!: Conference;

  @OneToMany(() => Team, (t) => t.division)
  teams!: Team[];

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;

  // "Atlantic Division (Eastern Conference)"; requiere conference cargada
  get label(): string {
    return this.conference ? `${this.name} (${this.conference.name})` : this.name;
  }
}
