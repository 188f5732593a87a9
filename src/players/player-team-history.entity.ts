import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { Player } from './player.entity';

@Entity({ name: 'player_team_history' })
@Unique('uq_player_team_season', ['playerId', 'teamId', 'seasonId'])
export class PlayerTeamHistory {
  @PrimaryGeneratedColumn() id!: number;

  @Column({ name: 'player_id' }) playerId!: number;
  @ManyToOne(() => Player, (p) => p.teamHistory, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'player_id' })
  player!: Player;

  @Column({ name: 'team_id' }) teamId!: number;
  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'team_id' })
  team!: Team;

  @Column({ name: 'season_id' }) seasonId!: number;
  @ManyToOne(() => Season, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'season_id' })
  season!: Season;

  @Column({ name: 'start_date', type: 'date' }) startDate!: string;
  // null mientras siga en el equipo
  @Column({ name: 'end_date', type: 'date', nullable: true }) endDate!: string | null;
  @Column({ name: 'jersey_number', type: 'int', nullable: true }) jerseyNumber!: number | null;

  @Column({ name: 'is_current', default: false }) isCurrent!: boolean;
}
