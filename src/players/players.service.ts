import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { Brackets, DataSource, Repository } from 'typeorm';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import { AssignTeamDto, PlayerQueryDto } from './dto/player.dto';
import { PlayerStats } from './player-stats.entity';
import { PlayerTeamHistory } from './player-team-history.entity';
import { Player } from './player.entity';
import { Position } from './position.entity';

const DEFAULT_PAGE_SIZE = 25;

export function toPlayerView(p: Player) {
  return {
    id: p.id,
    firstName: p.firstName,
    lastName: p.lastName,
    fullName: p.fullName,
    jerseyNumber: p.jerseyNumber,
    position: p.position ? { id: p.position.id, abbreviation: p.position.abbreviation, category: p.position.category } : null,
    age: p.age,
    heightInches: p.heightInches,
    heightDisplay: p.heightDisplay,
    weightLbs: p.weightLbs,
    birthDate: p.birthDate,
    birthCity: p.birthCity,
    birthCountry: p.birthCountry,
    nationality: p.nationality,
    shoots: p.shoots,
    catches: p.catches,
    draftYear: p.draftYear,
    draftRound: p.draftRound,
    draftPick: p.draftPick,
    draftTeamId: p.draftTeamId,
    isActive: p.isActive,
    isRookie: p.isRookie,
  };
}

export function toSeasonStatsView(s: PlayerStats) {
  return {
    season: s.season?.name ?? null,
    seasonId: s.seasonId,
    team: s.team?.abbreviation ?? null,
    teamId: s.teamId,
    gamesPlayed: s.gamesPlayed,
    goals: s.goals,
    assists: s.assists,
    points: s.points,
    plusMinus: s.plusMinus,
    penaltyMinutes: s.penaltyMinutes,
    powerPlayGoals: s.powerPlayGoals,
    powerPlayAssists: s.powerPlayAssists,
    powerPlayPoints: s.powerPlayPoints,
    shortHandedGoals: s.shortHandedGoals,
    shortHandedAssists: s.shortHandedAssists,
    shortHandedPoints: s.shortHandedPoints,
    shotsOnGoal: s.shotsOnGoal,
    shootingPercentage: s.shootingPercentage,
    averageTimeOnIce: s.averageTimeOnIceDisplay,
    wins: s.wins,
    losses: s.losses,
    overtimeLosses: s.overtimeLosses,
    shutouts: s.shutouts,
    goalsAgainst: s.goalsAgainst,
    shotsAgainst: s.shotsAgainst,
    saves: s.saves,
    goalsAgainstAverage: s.goalsAgainstAverage,
    savePercentage: s.savePercentage,
  };
}

@Injectable()
export class PlayersService {
  constructor(
    @InjectRepository(Player) private players: Repository<Player>,
    @InjectRepository(Position) private positions: Repository<Position>,
    @InjectRepository(PlayerStats) private stats: Repository<PlayerStats>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  listPositions() {
    return this.positions.find({ order: { category: 'ASC', name: 'ASC' } });
  }

  async list(query: PlayerQueryDto) {
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;
    const qb = this.players
      .createQueryBuilder('p')
      .innerJoinAndSelect('p.position', 'pos')
      .orderBy('p.lastName', 'ASC')
      .addOrderBy('p.firstName', 'ASC')
      .skip((page - 1) * pageSize)
      .take(pageSize);

    if (query.search) {
      const like = `%${query.search.toLowerCase()}%`;
      qb.andWhere(
        new Brackets((w) => {
          w.where('LOWER(p.firstName) LIKE :like', { like }).orWhere('LOWER(p.lastName) LIKE :like', { like });
        }),
      );
    }
    if (query.position) qb.andWhere('pos.abbreviation = :abbr', { abbr: query.position.toUpperCase() });
    if (query.active !== undefined) qb.andWhere('p.isActive = :active', { active: query.active });
    if (query.teamId !== undefined) {
      qb.andWhere(
        'EXISTS (SELECT 1 FROM player_team_history h WHERE h.player_id = p.id AND h.team_id = :teamId AND h.is_current = :cur)',
        { teamId: query.teamId, cur: true },
      );
    }

    const [rows, total] = await qb.getManyAndCount();
    return { items: rows.map(toPlayerView), total, page, pageSize };
  }

  async getPlayer(id: number) {
    const p = await this.players.findOne({
      where: { id },
      relations: { position: true, draftTeam: true, teamHistory: { team: true, season: true } },
    });
    if (!p) throw new NotFoundException('Jugador no encontrado');
    const history = [...p.teamHistory]
      .sort((a, b) => b.startDate.localeCompare(a.startDate))
      .map((h) => ({
        id: h.id,
        team: h.team.fullName,
        teamId: h.teamId,
        season: h.season.name,
        startDate: h.startDate,
        endDate: h.endDate,
        jerseyNumber: h.jerseyNumber,
        isCurrent: h.isCurrent,
      }));
    return {
      ...toPlayerView(p),
      draftTeam: p.draftTeam?.abbreviation ?? null,
      currentTeam: history.find((h) => h.isCurrent)?.team ?? null,
      teamHistory: history,
    };
  }

  async seasonStats(playerId: number) {
    const found = await this.players.count({ where: { id: playerId } });
    if (!found) throw new NotFoundException('Jugador no encontrado');
    const rows = await this.stats.find({ where: { playerId }, relations: { season: true, team: true } });
    return rows
      .sort((a, b) => b.season.startDate.localeCompare(a.season.startDate) || b.points - a.points)
      .map(toSeasonStatsView);
  }

  /**
   * Cierra la estancia actual del jugador y abre una nueva como actual.
   * Si ya existe fila para (jugador, equipo, temporada) se reabre.
   */
  async assignTeam(playerId: number, dto: AssignTeamDto) {
    return this.ds.transaction(async (trx) => {
      const player = await trx.findOne(Player, { where: { id: playerId } });
      if (!player) throw new NotFoundException('Jugador no encontrado');
      const team = await trx.findOne(Team, { where: { id: dto.teamId } });
      if (!team) throw new BadRequestException('Equipo no existe');
      const season = await trx.findOne(Season, { where: { id: dto.seasonId } });
      if (!season) throw new BadRequestException('Temporada no existe');

      const current = await trx.find(PlayerTeamHistory, { where: { playerId, isCurrent: true } });
      for (const h of current) {
        if (h.startDate > dto.startDate) {
          throw new BadRequestException('La nueva estancia no puede empezar antes que la actual');
        }
        h.isCurrent = false;
        h.endDate = dto.startDate;
      }
      await trx.save(current);

      let stint = await trx.findOne(PlayerTeamHistory, {
        where: { playerId, teamId: dto.teamId, seasonId: dto.seasonId },
      });
      if (!stint) stint = trx.create(PlayerTeamHistory, { playerId, teamId: dto.teamId, seasonId: dto.seasonId });
      stint.startDate = dto.startDate;
      stint.endDate = null;
      stint.jerseyNumber = dto.jerseyNumber ?? player.jerseyNumber;
      stint.isCurrent = true;
      return trx.save(stint);
    });
  }
}
