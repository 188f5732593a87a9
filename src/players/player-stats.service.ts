import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, In } from 'typeorm';
import { Game } from '../games/game.entity';
import { Goal } from '../games/goal.entity';
import { PlayerGameStats } from '../games/player-game-stats.entity';
import { aggregateStatLines, GameResult } from '../games/stat-line.util';
import { Season } from '../teams/season.entity';
import { PlayerStats } from './player-stats.entity';
import { Player } from './player.entity';
import { goalsAgainstAverage } from './player.util';

export interface RebuildResult {
  seasonId: number;
  games: number;
  rows: number;
}

@Injectable()
export class PlayerStatsService {
  private readonly logger = new Logger(PlayerStatsService.name);

  constructor(@InjectDataSource() private ds: DataSource) {}

  /** Recalcula PlayerStats de una temporada a partir de los partidos completados. */
  async rebuildSeasonStats(seasonId: number): Promise<RebuildResult> {
    return this.ds.transaction(async (trx) => {
      const season = await trx.findOne(Season, { where: { id: seasonId } });
      if (!season) throw new NotFoundException('Temporada no encontrada');

      const games = (await trx.find(Game, { where: { seasonId } })).filter((g) => g.isCompleted);
      const gameIds = games.map((g) => g.id);
      const results = new Map<number, GameResult>(games.map((g) => [g.id, g]));

      const lines = gameIds.length ? await trx.find(PlayerGameStats, { where: { gameId: In(gameIds) } }) : [];
      const goals = gameIds.length ? await trx.find(Goal, { where: { gameId: In(gameIds) } }) : [];

      const playerIds = [...new Set(lines.map((l) => l.playerId))];
      const goalies = playerIds.length
        ? await trx.find(Player, { where: { id: In(playerIds) }, relations: { position: true } })
        : [];
      const goalieIds = new Set(goalies.filter((p) => p.position.category === 'goalie').map((p) => p.id));

      const totals = aggregateStatLines(lines, results, goals, goalieIds, (p, t) => `${p}:${t}`);

      const existing = await trx.find(PlayerStats, { where: { seasonId } });
      const byKey = new Map(existing.map((s) => [`${s.playerId}:${s.teamId}`, s]));

      const rows: PlayerStats[] = [];
      for (const [key, line] of totals) {
        const [playerId, teamId] = key.split(':').map(Number);
        const row = byKey.get(key) ?? trx.create(PlayerStats, { playerId, teamId, seasonId });
        byKey.delete(key);
        Object.assign(row, {
          gamesPlayed: line.gamesPlayed,
          goals: line.goals,
          assists: line.assists,
          plusMinus: line.plusMinus,
          penaltyMinutes: line.penaltyMinutes,
          powerPlayGoals: line.powerPlayGoals,
          powerPlayAssists: line.powerPlayAssists,
          shortHandedGoals: line.shortHandedGoals,
          shortHandedAssists: line.shortHandedAssists,
          shotsOnGoal: line.shotsOnGoal,
          shootingPercentage: 0,
          savePercentage: 0,
          timeOnIceSeconds: line.timeOnIceSeconds,
          averageTimeOnIceSeconds: line.gamesPlayed ? Math.round(line.timeOnIceSeconds / line.gamesPlayed) : 0,
          wins: line.wins,
          losses: line.losses,
          overtimeLosses: line.overtimeLosses,
          shutouts: line.shutouts,
          goalsAgainst: line.goalsAgainst,
          shotsAgainst: line.shotsAgainst,
          saves: line.saves,
          goalsAgainstAverage: goalsAgainstAverage(line.goalsAgainst, line.timeOnIceSeconds),
        });
        rows.push(row);
      }
      await trx.save(rows);
      // filas sin partidos en la reconstrucción
      if (byKey.size) await trx.remove([...byKey.values()]);

      this.logger.log(`Season ${season.name}: ${rows.length} stat rows from ${games.length} games`);
      return { seasonId, games: games.length, rows: rows.length };
    });
  }
}
