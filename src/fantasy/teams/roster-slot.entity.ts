// src/fantasy/teams/roster-slot.entity.ts
import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { Player } from '../../players/player.entity';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { Roster } from './roster.entity';
import { RosterPosition } from './roster-position.entity';

@Entity({ name: 'roster_slot' })
@Unique('uq_roster_slot_roster_position_player', ['rosterId', 'positionId', 'playerId'])
// un jugador sólo puede estar en un equipo por liga
@Unique('uq_roster_slot_league_player', ['leagueId', 'playerId'])
@Index('idx_roster_slot_roster', ['rosterId'])
export class RosterSlot {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'roster_id' }) rosterId!: number;
  @ManyToOne(() => Roster, (r) => r.slots, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'roster_id' })
  roster!: Roster;

  @Column({ name: 'league_id' }) leagueId!: number;
  @ManyToOne(() => FantasyLeague, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'league_id' })
  league!: FantasyLeague;

  @Column({ name: 'position_id' }) positionId!: number;
  @ManyToOne(() => RosterPosition, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'position_id' })
  position!: RosterPosition;

  // null si el jugador se borró
  @Column({ name: 'player_id', type: 'int', nullable: true }) playerId!: number | null;
  @ManyToOne(() => Player, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'player_id' })
  player!: Player | null;

  // titular
  @Column({ name: 'is_active', default: true }) isActive!: boolean;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
}
