import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Player } from './player.entity';

export type PositionCategory = 'forward' | 'defense' | 'goalie';
export const POSITION_CATEGORIES: PositionCategory[] = ['forward', 'defense', 'goalie'];

@Entity({ name: 'position' })
export class Position {
  @PrimaryGeneratedColumn() id!: number;

  // 'Center', 'Left Wing'...
  @Column({ type: 'varchar', length: 50, unique: true }) name!: string;
  @Column({ type: 'varchar', length: 5, unique: true }) abbreviation!: string;
  @Column({ type: 'varchar', length: 20 }) category!: PositionCategory;

  @OneToMany(() => Player, (p) => p.position)
  players!: Player[];
}
