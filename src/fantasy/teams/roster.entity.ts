import { Column, CreateDateColumn, Entity, JoinColumn, OneToMany, OneToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { FantasyTeam } from './fantasy-team.entity';
import { RosterSlot } from './roster-slot.entity';

@Entity({ name: 'roster' })
export class Roster {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'fantasy_team_id' }) fantasyTeamId!: number;
  @OneToOne(() => FantasyTeam, (t) => t.roster, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'fantasy_team_id' })
  fantasyTeam!: FantasyTeam;

  @OneToMany(() => RosterSlot, (s) => s.roster)
  slots!: RosterSlot[];

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;
}
