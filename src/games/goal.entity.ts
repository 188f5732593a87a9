import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Player } from '../players/player.entity';
import { Team } from '../teams/team.entity';
import { Game } from './game.entity';

export type GoalType = 'even_strength' | 'power_play' | 'short_handed' | 'penalty_shot' | 'empty_net';
export const GOAL_TYPES: GoalType[] = ['even_strength', 'power_play', 'short_handed', 'penalty_shot', 'empty_net'];

@Entity({ name: 'goal' })
export class Goal {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'game_id' }) gameId!: number;
  @ManyToOne(() => Game, (g) => g.goals, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'game_id' })
  game!: Game;

  @Column({ name: 'scorer_id' }) scorerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'scorer_id' })
  scorer!: Player;

  @Column({ name: 'assist1_id', type: 'int', nullable: true }) assist1Id!: number | null;
  @ManyToOne(() => Player, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'assist1_id' })
  assist1!: Player | null;

  @Column({ name: 'assist2_id', type: 'int', nullable: true }) assist2Id!: number | null;
  @ManyToOne(() => Player, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'assist2_id' })
  assist2!: Player | null;

  @Column({ name: 'team_id' }) teamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team_id' })
  team!: Team;

  @Column({ type: 'int' }) period!: number;
  @Column({ name: 'time_in_period', type: 'varchar', length: 10 }) timeInPeriod!: string;
  @Column({ name: 'game_time_seconds', type: 'int' }) gameTimeSeconds!: number;

  @Column({ name: 'goal_type', type: 'varchar', length: 20, default: 'even_strength' }) goalType!: GoalType;

  @Column({ name: 'home_players_on_ice', type: 'int', default: 6 }) homePlayersOnIce!: number;
  @Column({ name: 'away_players_on_ice', type: 'int', default: 6 }) awayPlayersOnIce!: number;
}
