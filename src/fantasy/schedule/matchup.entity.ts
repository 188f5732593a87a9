import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { FantasyWeek } from './fantasy-week.entity';

@Entity({ name: 'matchup' })
@Unique('uq_matchup_week_teams', ['weekId', 'team1Id', 'team2Id'])
export class Matchup {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'week_id' }) weekId!: number;
  @ManyToOne(() => FantasyWeek, (w) => w.matchups, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'week_id' })
  week!: FantasyWeek;

  @Column({ name: 'team1_id' }) team1Id!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team1_id' })
  team1!: FantasyTeam;

  @Column({ name: 'team2_id' }) team2Id!: number;
  @ManyToOne(() => FantasyTeam, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team2_id' })
  team2!: FantasyTeam;

  @Column({ name: 'team1_score', type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
  team1Score!: number;
  @Column({ name: 'team2_score', type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
  team2Score!: number;

  @Column({ name: 'is_complete', default: false }) isComplete!: boolean;

  get winnerTeamId(): number | null {
    if (!this.isComplete || this.team1Score === this.team2Score) return null;
    return this.team1Score > this.team2Score ? this.team1Id : this.team2Id;
  }
}
