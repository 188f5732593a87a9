import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { PlayerTeamHistory } from '../players/player-team-history.entity';
import { Conference } from './conference.entity';
import { TeamQueryDto } from './dto/team.dto';
import { Season } from './season.entity';
import { Team } from './team.entity';

/** Vista serializable de Team (incluye derivados). */
export function toTeamView(t: Team) {
  return {
    id: t.id,
    name: t.name,
    city: t.city,
    fullName: t.fullName,
    abbreviation: t.abbreviation,
    division: t.division ? { id: t.division.id, name: t.division.name, abbreviation: t.division.abbreviation } : null,
    conference: t.conference ? { id: t.conference.id, name: t.conference.name, abbreviation: t.conference.abbreviation } : null,
    foundedYear: t.foundedYear,
    arenaName: t.arenaName,
    arenaCapacity: t.arenaCapacity,
    primaryColor: t.primaryColor,
    secondaryColor: t.secondaryColor,
    logoUrl: t.logoUrl,
    isActive: t.isActive,
  };
}

@Injectable()
export class TeamsService {
  constructor(
    @InjectRepository(Conference) private conferences: Repository<Conference>,
    @InjectRepository(Team) private teams: Repository<Team>,
    @InjectRepository(Season) private seasons: Repository<Season>,
    @InjectRepository(PlayerTeamHistory) private history: Repository<PlayerTeamHistory>,
  ) {}

  async listConferences() {
    const rows = await this.conferences.find({
      relations: { divisions: true },
      order: { name: 'ASC', divisions: { name: 'ASC' } },
    });
    return rows.map((c) => ({
      id: c.id,
      name: c.name,
      abbreviation: c.abbreviation,
      divisions: c.divisions.map((d) => ({ id: d.id, name: d.name, abbreviation: d.abbreviation })),
    }));
  }

  async listTeams(query: TeamQueryDto) {
    const qb = this.teams
      .createQueryBuilder('t')
      .innerJoinAndSelect('t.division', 'd')
      .innerJoinAndSelect('d.conference', 'c')
      .orderBy('t.city', 'ASC')
      .addOrderBy('t.name', 'ASC');
    if (query.conferenceId !== undefined) qb.andWhere('c.id = :cid', { cid: query.conferenceId });
    if (query.divisionId !== undefined) qb.andWhere('d.id = :did', { did: query.divisionId });
    if (query.active !== undefined) qb.andWhere('t.isActive = :active', { active: query.active });
    if (query.name) qb.andWhere('t.name = :name', { name: query.name });
    if (query.q) {
      const like = `%${query.q.toLowerCase()}%`;
      qb.andWhere(
        new Brackets((w) => {
          w.where('LOWER(t.name) LIKE :like', { like })
            .orWhere('LOWER(t.city) LIKE :like', { like })
            .orWhere('LOWER(t.abbreviation) LIKE :like', { like });
        }),
      );
    }
    const rows = await qb.getMany();
    return rows.map(toTeamView);
  }

  async getTeam(id: number) {
    const team = await this.teams.findOne({
      where: { id },
      relations: { division: { conference: true } },
    });
    if (!team) throw new NotFoundException('Equipo no encontrado');
    return toTeamView(team);
  }

  /** Jugadores con estancia actual en el equipo (opcionalmente de una temporada). */
  async currentRoster(teamId: number, seasonId?: number) {
    await this.getTeam(teamId);
    const rows = await this.history.find({
      where: { teamId, isCurrent: true, ...(seasonId !== undefined ? { seasonId } : {}) },
      relations: { player: { position: true }, season: true },
    });
    return rows
      .sort((a, b) => a.player.lastName.localeCompare(b.player.lastName) || a.player.firstName.localeCompare(b.player.firstName))
      .map((h) => ({
        playerId: h.player.id,
        fullName: h.player.fullName,
        position: h.player.position.abbreviation,
        jerseyNumber: h.jerseyNumber ?? h.player.jerseyNumber,
        season: h.season.name,
        since: h.startDate,
      }));
  }

  listSeasons() {
    return this.seasons.find({ order: { startDate: 'DESC' } });
  }

  async currentSeason() {
    const season = await this.seasons.findOne({ where: { isCurrent: true } });
    if (!season) throw new NotFoundException('No hay temporada actual');
    return season;
  }
}
