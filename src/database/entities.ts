import { AppUser } from '../auth/user.entity';
import { FantasyLeague } from '../fantasy/leagues/fantasy-league.entity';
import { FantasyWeek } from '../fantasy/schedule/fantasy-week.entity';
import { Matchup } from '../fantasy/schedule/matchup.entity';
import { FantasyScoring } from '../fantasy/scoring/fantasy-scoring.entity';
import { FantasyTeamWeekPoints } from '../fantasy/scoring/fantasy-team-week-points.entity';
import { PlayerFantasyStats } from '../fantasy/scoring/player-fantasy-stats.entity';
import { FantasyTeam } from '../fantasy/teams/fantasy-team.entity';
import { RosterPosition } from '../fantasy/teams/roster-position.entity';
import { RosterSlot } from '../fantasy/teams/roster-slot.entity';
import { Roster } from '../fantasy/teams/roster.entity';
import { TradePlayer } from '../fantasy/trades/trade-player.entity';
import { Trade } from '../fantasy/trades/trade.entity';
import { GameEvent } from '../games/game-event.entity';
import { Game } from '../games/game.entity';
import { Goal } from '../games/goal.entity';
import { PlayerGameStats } from '../games/player-game-stats.entity';
import { PlayerStats } from '../players/player-stats.entity';
import { PlayerTeamHistory } from '../players/player-team-history.entity';
import { Player } from '../players/player.entity';
import { Position } from '../players/position.entity';
import { Conference } from '../teams/conference.entity';
import { Division } from '../teams/division.entity';
import { Season } from '../teams/season.entity';
import { SeasonSubscriber } from '../teams/season.subscriber';
import { Team } from '../teams/team.entity';

export const ENTITIES = [
  // Equipos
  Conference, Division, Team, Season,
  // Jugadores
  Position, Player, PlayerTeamHistory, PlayerStats,
  // Partidos
  Game, GameEvent, Goal, PlayerGameStats,
  // Fantasy
  AppUser,
  FantasyLeague, FantasyScoring, FantasyTeam, Roster, RosterPosition, RosterSlot,
  Trade, TradePlayer,
  FantasyWeek, Matchup, PlayerFantasyStats, FantasyTeamWeekPoints,
];

export const SUBSCRIBERS = [SeasonSubscriber];
