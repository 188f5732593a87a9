import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/**
 * Posición de alineación fantasy (C, LW, RW, D, G, BN).
 * eligiblePositions: abreviaturas de Position que pueden ocuparla; vacío = cualquiera.
 */
@Entity({ name: 'roster_position' })
export class RosterPosition {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 50 }) name!: string;
  @Column({ type: 'varchar', length: 10, unique: true }) abbreviation!: string;

  // false para banquillo
  @Column({ name: 'is_starting', default: true }) isStarting!: boolean;
  @Column({ name: 'max_players', type: 'int', default: 1 }) maxPlayers!: number;

  @Column({ name: 'eligible_positions', type: 'simple-array', default: '' }) eligiblePositions!: string[];
}
