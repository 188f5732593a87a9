import type { ClassConstructor } from 'class-transformer';
import * as bcrypt from 'bcryptjs';
import type { ObjectLiteral } from 'typeorm';
import { BCRYPT_ROUNDS } from '../auth/auth.service';
import { AdminCreateUserDto, AdminUpdateUserDto } from '../auth/dto/auth.dto';
import { AppUser } from '../auth/user.entity';
import { AdminCreateFantasyLeagueDto, AdminUpdateFantasyLeagueDto } from '../fantasy/leagues/dto/fantasy-league.dto';
import { FantasyLeague } from '../fantasy/leagues/fantasy-league.entity';
import { genInviteCode } from '../fantasy/leagues/league-access.util';
import { CreateFantasyWeekDto, CreateMatchupDto, UpdateFantasyWeekDto, UpdateMatchupDto } from '../fantasy/schedule/dto/schedule.dto';
import { FantasyWeek } from '../fantasy/schedule/fantasy-week.entity';
import { Matchup } from '../fantasy/schedule/matchup.entity';
import {
  AdminUpdateScoringDto,
  CreatePlayerFantasyStatsDto,
  CreateScoringDto,
  CreateTeamWeekPointsDto,
  UpdatePlayerFantasyStatsDto,
  UpdateTeamWeekPointsDto,
} from '../fantasy/scoring/dto/scoring.dto';
import { FantasyScoring } from '../fantasy/scoring/fantasy-scoring.entity';
import { FantasyTeamWeekPoints } from '../fantasy/scoring/fantasy-team-week-points.entity';
import { PlayerFantasyStats } from '../fantasy/scoring/player-fantasy-stats.entity';
import {
  AdminUpdateFantasyTeamDto,
  CreateFantasyTeamDto,
  CreateRosterDto,
  CreateRosterPositionDto,
  CreateRosterSlotDto,
  UpdateRosterDto,
  UpdateRosterPositionDto,
  UpdateRosterSlotDto,
} from '../fantasy/teams/dto/fantasy-team.dto';
import { FantasyTeam } from '../fantasy/teams/fantasy-team.entity';
import { RosterPosition } from '../fantasy/teams/roster-position.entity';
import { RosterSlot } from '../fantasy/teams/roster-slot.entity';
import { Roster } from '../fantasy/teams/roster.entity';
import { CreateTradeDto, CreateTradePlayerDto, UpdateTradeDto, UpdateTradePlayerDto } from '../fantasy/trades/dto/trade.dto';
import { TradePlayer } from '../fantasy/trades/trade-player.entity';
import { Trade } from '../fantasy/trades/trade.entity';
import {
  CreateGameEventDto,
  CreateGoalDto,
  CreatePlayerGameStatsDto,
  UpdateGameEventDto,
  UpdateGoalDto,
  UpdatePlayerGameStatsDto,
} from '../games/dto/game-detail.dto';
import { CreateGameDto, UpdateGameDto } from '../games/dto/game.dto';
import { GameEvent } from '../games/game-event.entity';
import { Game } from '../games/game.entity';
import { Goal } from '../games/goal.entity';
import { PlayerGameStats } from '../games/player-game-stats.entity';
import { CreatePlayerStatsDto, UpdatePlayerStatsDto } from '../players/dto/player-stats.dto';
import {
  CreatePlayerDto,
  CreatePlayerTeamHistoryDto,
  CreatePositionDto,
  UpdatePlayerDto,
  UpdatePlayerTeamHistoryDto,
  UpdatePositionDto,
} from '../players/dto/player.dto';
import { PlayerStats } from '../players/player-stats.entity';
import { PlayerTeamHistory } from '../players/player-team-history.entity';
import { Player } from '../players/player.entity';
import { Position } from '../players/position.entity';
import {
  CreateConferenceDto,
  CreateDivisionDto,
  CreateSeasonDto,
  UpdateConferenceDto,
  UpdateDivisionDto,
  UpdateSeasonDto,
} from '../teams/dto/league-structure.dto';
import { CreateTeamDto, UpdateTeamDto } from '../teams/dto/team.dto';
import { Conference } from '../teams/conference.entity';
import { Division } from '../teams/division.entity';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';

export type Direction = 'ASC' | 'DESC';
export type EntityClass = new () => ObjectLiteral;
type Prepare = (input: Record<string, unknown>, mode: 'create' | 'update') => Promise<Record<string, unknown>>;

/**
 * Configuración de un modelo en /admin/:resource.
 * Las rutas ('division.conference.name') pueden atravesar relaciones; listDisplay admite getters.
 */
export interface AdminResource {
  name: string;
  target: EntityClass;
  listDisplay: string[];
  searchFields: string[];
  listFilter: string[];
  ordering: Array<[string, Direction]>;
  readonlyFields: string[];
  // nunca se devuelven
  hiddenFields?: string[];
  // relaciones que necesitan los getters de listDisplay
  preload?: string[];
  createDto: ClassConstructor<object>;
  updateDto: ClassConstructor<object>;
  prepare?: Prepare;
}

const TIMESTAMPS = ['createdAt', 'updatedAt'];

const hashPassword: Prepare = async (input) => {
  const { password, ...rest } = input;
  if (typeof password !== 'string') return rest;
  return { ...rest, passwordHash: await bcrypt.hash(password, BCRYPT_ROUNDS) };
};

const withInviteCode: Prepare = async (input, mode) =>
  mode === 'create' && typeof input.inviteCode !== 'string' ? { ...input, inviteCode: genInviteCode() } : input;

export const ADMIN_RESOURCES: AdminResource[] = [
  {
    name: 'conferences',
    target: Conference,
    listDisplay: ['name', 'abbreviation', 'createdAt'],
    searchFields: ['name', 'abbreviation'],
    listFilter: [],
    ordering: [['name', 'ASC']],
    readonlyFields: ['createdAt'],
    createDto: CreateConferenceDto,
    updateDto: UpdateConferenceDto,
  },
  {
    name: 'divisions',
    target: Division,
    listDisplay: ['name', 'abbreviation', 'conference.name', 'createdAt'],
    searchFields: ['name', 'abbreviation', 'conference.name'],
    listFilter: ['conferenceId'],
    ordering: [['conference.name', 'ASC'], ['name', 'ASC']],
    readonlyFields: ['createdAt'],
    createDto: CreateDivisionDto,
    updateDto: UpdateDivisionDto,
  },
  {
    name: 'teams',
    target: Team,
    listDisplay: ['fullName', 'abbreviation', 'division.name', 'conference.name', 'isActive'],
    searchFields: ['name', 'city', 'abbreviation'],
    listFilter: ['division.conferenceId', 'divisionId', 'isActive'],
    ordering: [['city', 'ASC'], ['name', 'ASC']],
    readonlyFields: TIMESTAMPS,
    preload: ['division.conference'],
    createDto: CreateTeamDto,
    updateDto: UpdateTeamDto,
  },
  {
    name: 'seasons',
    target: Season,
    listDisplay: ['name', 'startDate', 'endDate', 'isCurrent', 'createdAt'],
    searchFields: ['name'],
    listFilter: ['isCurrent'],
    ordering: [['startDate', 'DESC']],
    readonlyFields: ['createdAt'],
    createDto: CreateSeasonDto,
    updateDto: UpdateSeasonDto,
  },
  {
    name: 'positions',
    target: Position,
    listDisplay: ['name', 'abbreviation', 'category'],
    searchFields: ['name', 'abbreviation'],
    listFilter: ['category'],
    ordering: [['category', 'ASC'], ['name', 'ASC']],
    readonlyFields: [],
    createDto: CreatePositionDto,
    updateDto: UpdatePositionDto,
  },
  {
    name: 'players',
    target: Player,
    listDisplay: ['fullName', 'position.abbreviation', 'jerseyNumber', 'age', 'heightDisplay', 'isActive'],
    searchFields: ['firstName', 'lastName', 'nhlId'],
    listFilter: ['position.category', 'positionId', 'isActive', 'isRookie', 'shoots'],
    ordering: [['lastName', 'ASC'], ['firstName', 'ASC']],
    readonlyFields: TIMESTAMPS,
    createDto: CreatePlayerDto,
    updateDto: UpdatePlayerDto,
  },
  {
    name: 'player-team-history',
    target: PlayerTeamHistory,
    listDisplay: ['player.fullName', 'team.abbreviation', 'season.name', 'startDate', 'endDate', 'isCurrent'],
    searchFields: ['player.firstName', 'player.lastName', 'team.name'],
    listFilter: ['teamId', 'seasonId', 'isCurrent'],
    ordering: [['startDate', 'DESC']],
    readonlyFields: [],
    createDto: CreatePlayerTeamHistoryDto,
    updateDto: UpdatePlayerTeamHistoryDto,
  },
  {
    name: 'player-stats',
    target: PlayerStats,
    listDisplay: ['player.fullName', 'team.abbreviation', 'season.name', 'gamesPlayed', 'goals', 'assists', 'points'],
    searchFields: ['player.firstName', 'player.lastName'],
    listFilter: ['seasonId', 'teamId'],
    ordering: [['season.startDate', 'DESC'], ['points', 'DESC']],
    readonlyFields: [
      ...TIMESTAMPS,
      'points',
      'powerPlayPoints',
      'shortHandedPoints',
      'shootingPercentage',
      'savePercentage',
    ],
    createDto: CreatePlayerStatsDto,
    updateDto: UpdatePlayerStatsDto,
  },
  {
    name: 'games',
    target: Game,
    listDisplay: ['label', 'status', 'homeScore', 'awayScore', 'gameType'],
    searchFields: ['homeTeam.abbreviation', 'awayTeam.abbreviation', 'venue'],
    listFilter: ['seasonId', 'status', 'gameType'],
    ordering: [['gameDate', 'DESC']],
    readonlyFields: TIMESTAMPS,
    preload: ['homeTeam', 'awayTeam'],
    createDto: CreateGameDto,
    updateDto: UpdateGameDto,
  },
  {
    name: 'game-events',
    target: GameEvent,
    listDisplay: ['game.label', 'eventType', 'period', 'timeInPeriod', 'primaryPlayer.fullName'],
    searchFields: ['primaryPlayer.lastName'],
    listFilter: ['gameId', 'eventType'],
    ordering: [['gameTimeSeconds', 'ASC']],
    readonlyFields: ['createdAt'],
    preload: ['game.homeTeam', 'game.awayTeam'],
    createDto: CreateGameEventDto,
    updateDto: UpdateGameEventDto,
  },
  {
    name: 'goals',
    target: Goal,
    listDisplay: ['game.label', 'scorer.fullName', 'team.abbreviation', 'period', 'timeInPeriod', 'goalType'],
    searchFields: ['scorer.lastName'],
    listFilter: ['gameId', 'goalType'],
    ordering: [['gameId', 'ASC'], ['gameTimeSeconds', 'ASC']],
    readonlyFields: [],
    preload: ['game.homeTeam', 'game.awayTeam'],
    createDto: CreateGoalDto,
    updateDto: UpdateGoalDto,
  },
  {
    name: 'player-game-stats',
    target: PlayerGameStats,
    listDisplay: ['player.fullName', 'game.label', 'goals', 'assists', 'points', 'timeOnIceDisplay'],
    searchFields: ['player.firstName', 'player.lastName'],
    listFilter: ['gameId', 'teamId', 'playerId'],
    ordering: [['gameId', 'DESC']],
    readonlyFields: ['createdAt', 'points'],
    preload: ['game.homeTeam', 'game.awayTeam'],
    createDto: CreatePlayerGameStatsDto,
    updateDto: UpdatePlayerGameStatsDto,
  },
  {
    name: 'users',
    target: AppUser,
    listDisplay: ['username', 'email', 'isStaff', 'isSuperuser', 'isActive', 'lastLogin'],
    searchFields: ['username', 'email'],
    listFilter: ['isStaff', 'isSuperuser', 'isActive'],
    ordering: [['username', 'ASC']],
    readonlyFields: [...TIMESTAMPS, 'lastLogin', 'passwordHash', 'refreshTokenHash'],
    hiddenFields: ['passwordHash', 'refreshTokenHash'],
    createDto: AdminCreateUserDto,
    updateDto: AdminUpdateUserDto,
    prepare: hashPassword,
  },
  {
    name: 'fantasy-leagues',
    target: FantasyLeague,
    listDisplay: ['name', 'season.name', 'commissioner.username', 'scoringSystem', 'isActive', 'isPublic'],
    searchFields: ['name', 'commissioner.username'],
    listFilter: ['seasonId', 'scoringSystem', 'isActive', 'isPublic'],
    ordering: [['createdAt', 'DESC']],
    readonlyFields: TIMESTAMPS,
    createDto: AdminCreateFantasyLeagueDto,
    updateDto: AdminUpdateFantasyLeagueDto,
    prepare: withInviteCode,
  },
  {
    name: 'fantasy-scoring',
    target: FantasyScoring,
    listDisplay: ['league.name', 'goalsPoints', 'assistsPoints', 'winsPoints'],
    searchFields: ['league.name'],
    listFilter: [],
    ordering: [['leagueId', 'ASC']],
    readonlyFields: [],
    createDto: CreateScoringDto,
    updateDto: AdminUpdateScoringDto,
  },
  {
    name: 'fantasy-teams',
    target: FantasyTeam,
    listDisplay: ['name', 'owner.username', 'league.name', 'wins', 'losses', 'ties', 'totalPoints'],
    searchFields: ['name', 'owner.username'],
    listFilter: ['leagueId'],
    ordering: [['totalPoints', 'DESC']],
    readonlyFields: TIMESTAMPS,
    createDto: CreateFantasyTeamDto,
    updateDto: AdminUpdateFantasyTeamDto,
  },
  {
    name: 'rosters',
    target: Roster,
    listDisplay: ['fantasyTeam.name', 'createdAt'],
    searchFields: ['fantasyTeam.name'],
    listFilter: [],
    ordering: [['id', 'ASC']],
    readonlyFields: TIMESTAMPS,
    createDto: CreateRosterDto,
    updateDto: UpdateRosterDto,
  },
  {
    name: 'roster-positions',
    target: RosterPosition,
    listDisplay: ['name', 'abbreviation', 'isStarting', 'maxPlayers', 'eligiblePositions'],
    searchFields: ['name', 'abbreviation'],
    listFilter: ['isStarting'],
    ordering: [['id', 'ASC']],
    readonlyFields: [],
    createDto: CreateRosterPositionDto,
    updateDto: UpdateRosterPositionDto,
  },
  {
    name: 'roster-slots',
    target: RosterSlot,
    listDisplay: ['roster.fantasyTeamId', 'position.abbreviation', 'player.fullName', 'isActive'],
    searchFields: ['player.lastName'],
    listFilter: ['leagueId', 'rosterId', 'isActive'],
    ordering: [['rosterId', 'ASC'], ['positionId', 'ASC']],
    readonlyFields: ['createdAt'],
    createDto: CreateRosterSlotDto,
    updateDto: UpdateRosterSlotDto,
  },
  {
    name: 'trades',
    target: Trade,
    listDisplay: ['fromTeam.name', 'toTeam.name', 'status', 'proposedDate'],
    searchFields: ['fromTeam.name', 'toTeam.name'],
    listFilter: ['status'],
    ordering: [['proposedDate', 'DESC']],
    readonlyFields: ['proposedDate'],
    createDto: CreateTradeDto,
    updateDto: UpdateTradeDto,
  },
  {
    name: 'trade-players',
    target: TradePlayer,
    listDisplay: ['tradeId', 'player.fullName', 'fromTeam.name', 'toTeam.name'],
    searchFields: ['player.lastName'],
    listFilter: ['tradeId'],
    ordering: [['tradeId', 'DESC']],
    readonlyFields: [],
    createDto: CreateTradePlayerDto,
    updateDto: UpdateTradePlayerDto,
  },
  {
    name: 'fantasy-weeks',
    target: FantasyWeek,
    listDisplay: ['league.name', 'weekNumber', 'startDate', 'endDate', 'isPlayoffs', 'isComplete'],
    searchFields: ['league.name'],
    listFilter: ['leagueId', 'isPlayoffs', 'isComplete'],
    ordering: [['leagueId', 'ASC'], ['weekNumber', 'ASC']],
    readonlyFields: [],
    createDto: CreateFantasyWeekDto,
    updateDto: UpdateFantasyWeekDto,
  },
  {
    name: 'matchups',
    target: Matchup,
    listDisplay: ['week.weekNumber', 'team1.name', 'team1Score', 'team2.name', 'team2Score', 'winnerTeamId'],
    searchFields: ['team1.name', 'team2.name'],
    listFilter: ['weekId', 'isComplete'],
    ordering: [['weekId', 'ASC'], ['id', 'ASC']],
    readonlyFields: [],
    createDto: CreateMatchupDto,
    updateDto: UpdateMatchupDto,
  },
  {
    name: 'player-fantasy-stats',
    target: PlayerFantasyStats,
    listDisplay: ['player.fullName', 'week.weekNumber', 'fantasyTeam.name', 'totalFantasyPoints'],
    searchFields: ['player.lastName', 'fantasyTeam.name'],
    listFilter: ['weekId', 'fantasyTeamId'],
    ordering: [['totalFantasyPoints', 'DESC']],
    readonlyFields: ['updatedAt'],
    createDto: CreatePlayerFantasyStatsDto,
    updateDto: UpdatePlayerFantasyStatsDto,
  },
  {
    name: 'fantasy-team-week-points',
    target: FantasyTeamWeekPoints,
    listDisplay: ['fantasyTeam.name', 'week.weekNumber', 'points'],
    searchFields: ['fantasyTeam.name'],
    listFilter: ['weekId', 'fantasyTeamId'],
    ordering: [['weekId', 'ASC'], ['points', 'DESC']],
    readonlyFields: ['updatedAt'],
    createDto: CreateTeamWeekPointsDto,
    updateDto: UpdateTeamWeekPointsDto,
  },
];

export function findResource(name: string): AdminResource | undefined {
  return ADMIN_RESOURCES.find((r) => r.name === name);
}
