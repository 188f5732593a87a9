import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Player } from '../players/player.entity';
import { Team } from '../teams/team.entity';
import { Game } from './game.entity';

export type GameEventType =
  | 'goal'
  | 'assist'
  | 'penalty'
  | 'save'
  | 'shot'
  | 'hit'
  | 'blocked_shot'
  | 'faceoff'
  | 'giveaway'
  | 'takeaway';
export const GAME_EVENT_TYPES: GameEventType[] = [
  'goal', 'assist', 'penalty', 'save', 'shot', 'hit', 'blocked_shot', 'faceoff', 'giveaway', 'takeaway',
];

@Entity({ name: 'game_event' })
export class GameEvent {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'game_id' }) gameId!: number;
  @ManyToOne(() => Game, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'game_id' })
  game!: Game;

  @Column({ name: 'event_type', type: 'varchar', length: 20 }) eventType!: GameEventType;

  @Column({ type: 'int' }) period!: number;
  // 'MM:SS' dentro del periodo
  @Column({ name: 'time_in_period', type: 'varchar', length: 10 }) timeInPeriod!: string;
  @Column({ name: 'game_time_seconds', type: 'int' }) gameTimeSeconds!: number;

  @Column({ name: 'primary_player_id' }) primaryPlayerId!: number;
  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'primary_player_id' })
  primaryPlayer!: Player;

  @Column({ name: 'secondary_player_id', type: 'int', nullable: true }) secondaryPlayerId!: number | null;
  @ManyToOne(() => Player, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'secondary_player_id' })
  secondaryPlayer!: Player | null;

  @Column({ name: 'team_id' }) teamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team_id' })
  team!: Team;

  @Column({ name: 'event_details', type: 'simple-json', default: '{}' })
  eventDetails!: Record<string, unknown>;

  @CreateDateColumn({ name: 'created_at' }) createdAt!: Date;
}
