import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'season' })
// como mucho una temporada actual
@Index('ux_season_single_current', ['isCurrent'], { unique: true, where: '"is_current" = true' })
export class Season {
  @PrimaryGeneratedColumn() id!: number;

  // p.ej. '2024-25'
  @Column({ type: 'varchar', length: 20, unique: true }) name!: string;

  // Fechas como 'YYYY-MM-DD'
  @Column({ name: 'start_date', type: 'date' }) startDate!: string;
  @Column({ name: 'end_date', type: 'date' }) endDate!: string;
  @Column({ name: 'playoffs_start_date', type: 'date', nullable: true }) playoffsStartDate!: string | null;

  @Column({ name: 'is_current', default: false }) isCurrent!: boolean;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
}
