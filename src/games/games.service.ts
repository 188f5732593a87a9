import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { GameQueryDto } from './dto/game.dto';
import { GameEvent } from './game-event.entity';
import { Game } from './game.entity';
import { computeStandings, sortStandings } from './standings.util';

const DEFAULT_PAGE_SIZE = 50;

export function toGameView(g: Game) {
  return {
    id: g.id,
    label: g.label,
    seasonId: g.seasonId,
    gameDate: g.gameDate,
    gameType: g.gameType,
    status: g.status,
    homeTeam: { id: g.homeTeamId, abbreviation: g.homeTeam?.abbreviation ?? null },
    awayTeam: { id: g.awayTeamId, abbreviation: g.awayTeam?.abbreviation ?? null },
    homeScore: g.homeScore,
    awayScore: g.awayScore,
    winnerTeamId: g.winnerTeamId,
    isOvertimeGame: g.isOvertimeGame,
    venue: g.venue,
    attendance: g.attendance,
  };
}

@Injectable()
export class GamesService {
  constructor(
    @InjectRepository(Game) private games: Repository<Game>,
    @InjectRepository(GameEvent) private events: Repository<GameEvent>,
    @InjectRepository(Season) private seasons: Repository<Season>,
    @InjectRepository(Team) private teams: Repository<Team>,
  ) {}

  async list(query: GameQueryDto) {
    const page = query.page ?? 1;
    const pageSize = Math.min(query.pageSize ?? DEFAULT_PAGE_SIZE, 100);
    const qb = this.games
      .createQueryBuilder('g')
      .innerJoinAndSelect('g.homeTeam', 'home')
      .innerJoinAndSelect('g.awayTeam', 'away')
      .orderBy('g.gameDate', 'DESC')
      .skip((page - 1) * pageSize)
      .take(pageSize);
    if (query.seasonId !== undefined) qb.andWhere('g.seasonId = :sid', { sid: query.seasonId });
    if (query.status) qb.andWhere('g.status = :status', { status: query.status });
    if (query.teamId !== undefined) {
      qb.andWhere('(g.homeTeamId = :tid OR g.awayTeamId = :tid)', { tid: query.teamId });
    }
    const [rows, total] = await qb.getManyAndCount();
    return { items: rows.map(toGameView), total, page, pageSize };
  }

  async detail(id: number) {
    const g = await this.games.findOne({
      where: { id },
      relations: {
        homeTeam: true,
        awayTeam: true,
        season: true,
        goals: { scorer: true, assist1: true, assist2: true, team: true },
        playerStats: { player: true, team: true },
      },
    });
    if (!g) throw new NotFoundException('Partido no encontrado');
    const events = await this.events.find({
      where: { gameId: id },
      relations: { primaryPlayer: true, secondaryPlayer: true, team: true },
      order: { gameTimeSeconds: 'ASC' },
    });

    return {
      ...toGameView(g),
      season: g.season.name,
      periodsPlayed: g.periodsPlayed,
      overtimePeriods: g.overtimePeriods,
      shootout: g.shootout,
      goals: [...g.goals]
        .sort((a, b) => a.gameTimeSeconds - b.gameTimeSeconds)
        .map((goal) => ({
          id: goal.id,
          period: goal.period,
          timeInPeriod: goal.timeInPeriod,
          team: goal.team.abbreviation,
          scorer: goal.scorer.fullName,
          assists: [goal.assist1, goal.assist2].flatMap((a) => (a ? [a.fullName] : [])),
          goalType: goal.goalType,
        })),
      events: events.map((e) => ({
        id: e.id,
        eventType: e.eventType,
        period: e.period,
        timeInPeriod: e.timeInPeriod,
        team: e.team.abbreviation,
        primaryPlayer: e.primaryPlayer.fullName,
        secondaryPlayer: e.secondaryPlayer?.fullName ?? null,
        details: e.eventDetails,
      })),
      playerStats: g.playerStats.map((s) => ({
        playerId: s.playerId,
        player: s.player.fullName,
        team: s.team.abbreviation,
        goals: s.goals,
        assists: s.assists,
        points: s.points,
        plusMinus: s.plusMinus,
        penaltyMinutes: s.penaltyMinutes,
        shotsOnGoal: s.shotsOnGoal,
        hits: s.hits,
        blockedShots: s.blockedShots,
        timeOnIce: s.timeOnIceDisplay,
        faceoffPercentage: s.faceoffPercentage,
        saves: s.saves,
        goalsAgainst: s.goalsAgainst,
        savePercentage: s.savePercentage,
      })),
    };
  }

  /** Clasificación de temporada regular; sin seasonId usa la temporada actual. */
  async standings(seasonId?: number) {
    const season = seasonId !== undefined
      ? await this.seasons.findOne({ where: { id: seasonId } })
      : await this.seasons.findOne({ where: { isCurrent: true } });
    if (!season) throw new NotFoundException('Temporada no encontrada');

    const games = await this.games.find({ where: { seasonId: season.id, gameType: 'regular' } });
    const teams = await this.teams.find({ where: { isActive: true } });
    const names = new Map(teams.map((t) => [t.id, t.fullName]));
    const rows = sortStandings(
      computeStandings(games, teams.map((t) => t.id)),
      (id) => names.get(id) ?? '',
    );
    return {
      season: season.name,
      rows: rows.map((r, i) => ({ rank: i + 1, team: names.get(r.teamId) ?? null, ...r })),
    };
  }
}
