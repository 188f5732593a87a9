import { Column, Entity, JoinColumn, ManyToOne, OneToMany, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { Matchup } from './matchup.entity';

@Entity({ name: 'fantasy_week' })
@Unique('uq_fantasy_week_league_number', ['leagueId', 'weekNumber'])
export class FantasyWeek {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'league_id' }) leagueId!: number;
  @ManyToOne(() => FantasyLeague, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'league_id' })
  league!: FantasyLeague;

  @Column({ name: 'week_number', type: 'int' }) weekNumber!: number;
  // inclusivas, 'YYYY-MM-DD'
  @Column({ name: 'start_date', type: 'date' }) startDate!: string;
  @Column({ name: 'end_date', type: 'date' }) endDate!: string;

  @Column({ name: 'is_playoffs', default: false }) isPlayoffs!: boolean;
  @Column({ name: 'is_complete', default: false }) isComplete!: boolean;

  @OneToMany(() => Matchup, (m) => m.week)
  matchups!: Matchup[];
}
