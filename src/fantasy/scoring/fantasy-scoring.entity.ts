import { Column, ColumnOptions, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import { FantasyLeague } from '../leagues/fantasy-league.entity';

const weight = (name: string, value: number): ColumnOptions => ({
  name,
  type: 'decimal',
  precision: 5,
  scale: 2,
  default: value,
  transformer: decimalTransformer,
});

/** Pesos de puntuación por liga (uno a uno). */
@Entity({ name: 'fantasy_scoring' })
export class FantasyScoring {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'league_id' }) leagueId!: number;
  @OneToOne(() => FantasyLeague, (l) => l.scoring, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'league_id' })
  league!: FantasyLeague;

  // Jugadores de campo
  @Column(weight('goals_points', 6)) goalsPoints!: number;
  @Column(weight('assists_points', 4)) assistsPoints!: number;
  @Column(weight('plus_minus_points', 1)) plusMinusPoints!: number;
  @Column(weight('penalty_minutes_points', 0.5)) penaltyMinutesPoints!: number;
  @Column(weight('power_play_goals_points', 1)) powerPlayGoalsPoints!: number;
  @Column(weight('power_play_assists_points', 0.5)) powerPlayAssistsPoints!: number;
  @Column(weight('short_handed_goals_points', 2)) shortHandedGoalsPoints!: number;
  @Column(weight('short_handed_assists_points', 1)) shortHandedAssistsPoints!: number;
  @Column(weight('shots_on_goal_points', 0.4)) shotsOnGoalPoints!: number;
  @Column(weight('hits_points', 0.6)) hitsPoints!: number;
  @Column(weight('blocked_shots_points', 1)) blockedShotsPoints!: number;

  // Porteros
  @Column(weight('wins_points', 4)) winsPoints!: number;
  @Column(weight('losses_points', -1)) lossesPoints!: number;
  @Column(weight('goals_against_points', -1)) goalsAgainstPoints!: number;
  @Column(weight('saves_points', 0.6)) savesPoints!: number;
  @Column(weight('shutouts_points', 5)) shutoutsPoints!: number;
}
