// src/fantasy/scoring/scoring.service.ts
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, LessThanOrEqual, Repository } from 'typeorm';
import { AuthUser } from '../../auth/user.decorator';
import { Game } from '../../games/game.entity';
import { Goal } from '../../games/goal.entity';
import { PlayerGameStats } from '../../games/player-game-stats.entity';
import { aggregateStatLines, emptyStatLine, GameResult } from '../../games/stat-line.util';
import { Player } from '../../players/player.entity';
import { round } from '../../players/player.util';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { assertCanManageLeague } from '../leagues/league-access.util';
import { FantasyWeek } from '../schedule/fantasy-week.entity';
import { Matchup } from '../schedule/matchup.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { RosterSlot } from '../teams/roster-slot.entity';
import { FantasyScoring } from './fantasy-scoring.entity';
import { FantasyTeamWeekPoints } from './fantasy-team-week-points.entity';
import { PlayerFantasyStats } from './player-fantasy-stats.entity';
import { calculateFantasyPoints, DEFAULT_WEIGHTS, ScoringWeights, toFantasyCounters } from './scoring.util';

export interface WeekScore {
  weekId: number;
  players: number;
  teams: Array<{ teamId: number; points: number }>;
}

function utcDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

@Injectable()
export class ScoringService {
  private readonly logger = new Logger(ScoringService.name);

  constructor(
    @InjectRepository(FantasyWeek) private weeks: Repository<FantasyWeek>,
    @InjectRepository(FantasyLeague) private leagues: Repository<FantasyLeague>,
    @InjectRepository(PlayerFantasyStats) private pfs: Repository<PlayerFantasyStats>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  private async loadWeek(weekId: number): Promise<FantasyWeek> {
    const week = await this.weeks.findOne({ where: { id: weekId }, relations: { league: true } });
    if (!week) throw new NotFoundException('Semana no encontrada');
    return week;
  }

  async computeWeekAs(weekId: number, user: AuthUser) {
    const week = await this.loadWeek(weekId);
    assertCanManageLeague(week.league, user);
    return this.computeWeek(weekId);
  }

  async completeWeekAs(weekId: number, user: AuthUser) {
    const week = await this.loadWeek(weekId);
    assertCanManageLeague(week.league, user);
    return this.completeWeek(weekId);
  }

  /** Recalcula puntos de jugadores, equipos y enfrentamientos de una semana. */
  async computeWeek(weekId: number): Promise<WeekScore> {
    const week = await this.loadWeek(weekId);
    const result = await this.ds.transaction((trx) => this.scoreWeek(trx, week));
    this.logger.log(`Week ${week.weekNumber} of league ${week.leagueId}: ${result.players} players scored`);
    return result;
  }

  private async scoreWeek(trx: EntityManager, week: FantasyWeek): Promise<WeekScore> {
    const league = week.league;
    const scoring = await trx.findOne(FantasyScoring, { where: { leagueId: league.id } });
    const weights: ScoringWeights = scoring ?? DEFAULT_WEIGHTS;

    const teams = await trx.find(FantasyTeam, { where: { leagueId: league.id } });
    const slots = (await trx.find(RosterSlot, { where: { leagueId: league.id }, relations: { roster: true } })).filter(
      (s): s is RosterSlot & { playerId: number } => s.playerId !== null,
    );
    const playerIds = [...new Set(slots.map((s) => s.playerId))];

    const games = (await trx.find(Game, { where: { seasonId: league.seasonId } })).filter((g) => {
      const day = utcDay(g.gameDate);
      return g.isCompleted && day >= week.startDate && day <= week.endDate;
    });
    const gameIds = games.map((g) => g.id);
    const results = new Map<number, GameResult>(games.map((g) => [g.id, g]));

    const lines = gameIds.length && playerIds.length
      ? await trx.find(PlayerGameStats, { where: { gameId: In(gameIds), playerId: In(playerIds) } })
      : [];
    const goals = gameIds.length ? await trx.find(Goal, { where: { gameId: In(gameIds) } }) : [];
    const players = playerIds.length
      ? await trx.find(Player, { where: { id: In(playerIds) }, relations: { position: true } })
      : [];
    const goalieIds = new Set(players.filter((p) => p.position.category === 'goalie').map((p) => p.id));

    const totals = aggregateStatLines(lines, results, goals, goalieIds, (playerId) => playerId);

    // filas existentes de la semana
    const existing = await trx.find(PlayerFantasyStats, { where: { weekId: week.id } });
    const byKey = new Map(existing.map((r) => [`${r.playerId}:${r.fantasyTeamId}`, r]));
    const teamPoints = new Map<number, number>(teams.map((t) => [t.id, 0]));

    const rows: PlayerFantasyStats[] = [];
    for (const slot of slots) {
      const fantasyTeamId = slot.roster.fantasyTeamId;
      const counters = toFantasyCounters(totals.get(slot.playerId) ?? emptyStatLine());
      const points = calculateFantasyPoints(counters, weights);
      const key = `${slot.playerId}:${fantasyTeamId}`;
      const row = byKey.get(key) ?? trx.create(PlayerFantasyStats, { playerId: slot.playerId, weekId: week.id, fantasyTeamId });
      byKey.delete(key);
      Object.assign(row, counters, { totalFantasyPoints: points });
      rows.push(row);
      if (slot.isActive) teamPoints.set(fantasyTeamId, (teamPoints.get(fantasyTeamId) ?? 0) + points);
    }
    await trx.save(rows);
    // jugadores que ya no están en el roster
    if (byKey.size) await trx.remove([...byKey.values()]);

    const weekRows = await trx.find(FantasyTeamWeekPoints, { where: { weekId: week.id } });
    const saved: FantasyTeamWeekPoints[] = [];
    for (const [teamId, raw] of teamPoints) {
      const row = weekRows.find((r) => r.fantasyTeamId === teamId) ?? trx.create(FantasyTeamWeekPoints, { fantasyTeamId: teamId, weekId: week.id });
      row.points = round(raw, 2);
      saved.push(row);
    }
    await trx.save(saved);

    const matchups = await trx.find(Matchup, { where: { weekId: week.id } });
    for (const m of matchups) {
      m.team1Score = round(teamPoints.get(m.team1Id) ?? 0, 2);
      m.team2Score = round(teamPoints.get(m.team2Id) ?? 0, 2);
    }
    await trx.save(matchups);

    // total acumulado: todas las semanas del equipo
    const teamIds = teams.map((t) => t.id);
    const allWeekRows = teamIds.length ? await trx.find(FantasyTeamWeekPoints, { where: { fantasyTeamId: In(teamIds) } }) : [];
    for (const team of teams) {
      const sum = allWeekRows.filter((r) => r.fantasyTeamId === team.id).reduce((acc, r) => acc + r.points, 0);
      await trx.update(FantasyTeam, { id: team.id }, { totalPoints: round(sum, 2) });
    }

    return {
      weekId: week.id,
      players: rows.length,
      teams: saved.map((r) => ({ teamId: r.fantasyTeamId, points: r.points })),
    };
  }

  /** Calcula y cierra la semana; recalcula V/D/E de la liga con los enfrentamientos cerrados. */
  async completeWeek(weekId: number): Promise<WeekScore> {
    const week = await this.loadWeek(weekId);
    const result = await this.ds.transaction(async (trx) => {
      const score = await this.scoreWeek(trx, week);
      await trx.update(FantasyWeek, { id: week.id }, { isComplete: true });
      await trx.update(Matchup, { weekId: week.id }, { isComplete: true });
      await this.recomputeRecords(trx, week.leagueId);
      return score;
    });
    this.logger.log(`Week ${week.weekNumber} of league ${week.leagueId} completed`);
    return result;
  }

  private async recomputeRecords(trx: EntityManager, leagueId: number) {
    const teams = await trx.find(FantasyTeam, { where: { leagueId } });
    const weeks = await trx.find(FantasyWeek, { where: { leagueId } });
    const weekIds = weeks.map((w) => w.id);
    const matchups = weekIds.length ? await trx.find(Matchup, { where: { weekId: In(weekIds), isComplete: true } }) : [];

    const record = new Map(teams.map((t) => [t.id, { wins: 0, losses: 0, ties: 0 }]));
    for (const m of matchups) {
      const a = record.get(m.team1Id);
      const b = record.get(m.team2Id);
      if (!a || !b) continue;
      if (m.team1Score === m.team2Score) {
        a.ties += 1;
        b.ties += 1;
      } else if (m.team1Score > m.team2Score) {
        a.wins += 1;
        b.losses += 1;
      } else {
        b.wins += 1;
        a.losses += 1;
      }
    }
    for (const [id, r] of record) await trx.update(FantasyTeam, { id }, r);
  }

  /**
   * Semanas en curso se recalculan; las ya terminadas se cierran.
   * `today` en 'YYYY-MM-DD' (UTC).
   */
  async processDueWeeks(today: string = utcDay(new Date())) {
    const leagues = await this.leagues.find({ where: { isActive: true } });
    let computed = 0;
    let completed = 0;
    for (const league of leagues) {
      const due = await this.weeks.find({
        where: { leagueId: league.id, isComplete: false, startDate: LessThanOrEqual(today) },
        order: { weekNumber: 'ASC' },
      });
      for (const week of due) {
        if (week.endDate < today) {
          await this.completeWeek(week.id);
          completed++;
        } else {
          await this.computeWeek(week.id);
          computed++;
        }
      }
    }
    return { leagues: leagues.length, computed, completed };
  }

  async weekPlayerStats(weekId: number) {
    await this.loadWeek(weekId);
    const rows = await this.pfs.find({
      where: { weekId },
      relations: { player: true, fantasyTeam: true },
      order: { totalFantasyPoints: 'DESC', id: 'ASC' },
    });
    return rows.map((r) => ({
      playerId: r.playerId,
      player: r.player.fullName,
      fantasyTeamId: r.fantasyTeamId,
      fantasyTeam: r.fantasyTeam.name,
      gamesPlayed: r.gamesPlayed,
      goals: r.goals,
      assists: r.assists,
      wins: r.wins,
      saves: r.saves,
      totalFantasyPoints: r.totalFantasyPoints,
    }));
  }
}
