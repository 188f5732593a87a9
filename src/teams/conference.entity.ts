import { Column, CreateDateColumn, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Division } from './division.entity';

@Entity({ name: 'conference' })
export class Conference {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 50, unique: true }) name!: string;
  @Column({ type: 'varchar', length: 10, unique: true }) abbreviation!: string;

  @OneToMany(() => Division, (d) => d.conference)
  divisions!: Division[];

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
}
