import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity({ name: 'app_user' })
export class AppUser {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ type: 'varchar', length: 150, unique: true }) username!: string;
  @Column({ type: 'varchar', length: 254, default: '' }) email!: string;

  @Column({ name: 'password_hash', type: 'varchar', length: 200 }) passwordHash!: string;

  // staff => rol admin (acceso a /admin)
  @Column({ name: 'is_staff', default: false }) isStaff!: boolean;
  @Column({ name: 'is_superuser', default: false }) isSuperuser!: boolean;
  @Column({ name: 'is_active', default: true }) isActive!: boolean;

  @Column({ name: 'refresh_token_hash', type: 'varchar', length: 200, nullable: true })
  refreshTokenHash!: string | null;

  @Column({ name: 'last_login', type: Date, nullable: true }) lastLogin!: Date | null;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
  @UpdateDateColumn({ name: 'updated_at' }) updatedAt!: Date;
}
