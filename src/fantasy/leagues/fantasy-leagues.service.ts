// src/fantasy/leagues/fantasy-leagues.service.ts
import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { Brackets, DataSource, EntityManager, Repository } from 'typeorm';
import { AuthUser } from '../../auth/user.decorator';
import { Player } from '../../players/player.entity';
import { toPlayerView } from '../../players/players.service';
import { Season } from '../../teams/season.entity';
import { UpdateScoringDto } from '../scoring/dto/scoring.dto';
import { FantasyScoring } from '../scoring/fantasy-scoring.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { Roster } from '../teams/roster.entity';
import {
  CreateFantasyLeagueDto,
  FreeAgentQueryDto,
  JoinLeagueDto,
  UpdateFantasyLeagueDto,
} from './dto/fantasy-league.dto';
import { FantasyLeague } from './fantasy-league.entity';
import { assertCanManageLeague, canManageLeague, genInviteCode } from './league-access.util';

const DEFAULT_PAGE_SIZE = 25;

export function toLeagueView(l: FantasyLeague, teamCount: number, withInviteCode = false) {
  return {
    id: l.id,
    name: l.name,
    description: l.description,
    seasonId: l.seasonId,
    season: l.season?.name ?? null,
    commissionerId: l.commissionerId,
    maxTeams: l.maxTeams,
    rosterSize: l.rosterSize,
    startingLineupSize: l.startingLineupSize,
    scoringSystem: l.scoringSystem,
    draftType: l.draftType,
    draftDate: l.draftDate,
    isDrafted: l.isDrafted,
    isActive: l.isActive,
    isPublic: l.isPublic,
    teamCount,
    isFull: teamCount >= l.maxTeams,
    inviteCode: withInviteCode ? l.inviteCode : undefined,
    createdAt: l.createdAt,
  };
}

@Injectable()
export class FantasyLeaguesService {
  private readonly logger = new Logger(FantasyLeaguesService.name);

  constructor(
    @InjectRepository(FantasyLeague) private leagues: Repository<FantasyLeague>,
    @InjectRepository(FantasyTeam) private teams: Repository<FantasyTeam>,
    @InjectRepository(FantasyScoring) private scorings: Repository<FantasyScoring>,
    @InjectRepository(Player) private players: Repository<Player>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  private async uniqueInviteCode(trx: EntityManager): Promise<string> {
    for (let attempt = 0; attempt < 10; attempt++) {
      const code = genInviteCode();
      const taken = await trx.count(FantasyLeague, { where: { inviteCode: code } });
      if (!taken) return code;
    }
    throw new ConflictException('No se pudo generar un código de invitación');
  }

  async findLeague(id: number): Promise<FantasyLeague> {
    const league = await this.leagues.findOne({ where: { id }, relations: { season: true } });
    if (!league) throw new NotFoundException('Liga no encontrada');
    return league;
  }

  async createLeague(user: AuthUser, dto: CreateFantasyLeagueDto) {
    const saved = await this.ds.transaction(async (trx) => {
      const season = dto.seasonId !== undefined
        ? await trx.findOne(Season, { where: { id: dto.seasonId } })
        : await trx.findOne(Season, { where: { isCurrent: true } });
      if (!season) throw new BadRequestException('Temporada no existe (y no hay temporada actual)');

      const startingLineupSize = dto.startingLineupSize ?? 9;
      const rosterSize = dto.rosterSize ?? 23;
      if (startingLineupSize > rosterSize) {
        throw new BadRequestException('startingLineupSize no puede superar rosterSize');
      }

      const league = trx.create(FantasyLeague, {
        name: dto.name,
        description: dto.description ?? '',
        seasonId: season.id,
        maxTeams: dto.maxTeams ?? 12,
        rosterSize,
        startingLineupSize,
        scoringSystem: dto.scoringSystem ?? 'points',
        draftType: dto.draftType ?? 'snake',
        draftDate: dto.draftDate ?? null,
        isPublic: dto.isPublic ?? false,
        commissionerId: user.userId,
        inviteCode: await this.uniqueInviteCode(trx),
      });
      const row = await trx.save(league);
      // pesos por defecto de la columna
      await trx.save(trx.create(FantasyScoring, { leagueId: row.id }));
      return row;
    });
    this.logger.log(`League ${saved.id} "${saved.name}" created by user ${user.userId}`);
    return toLeagueView(await this.findLeague(saved.id), 0, true);
  }

  async listPublic() {
    const rows = await this.leagues.find({
      where: { isPublic: true, isActive: true },
      relations: { season: true },
      order: { createdAt: 'DESC' },
    });
    const counts = await this.teamCounts();
    return rows.map((l) => toLeagueView(l, counts.get(l.id) ?? 0));
  }

  /** Ligas donde el usuario tiene equipo o es comisionado. */
  async listMine(user: AuthUser) {
    const own = await this.teams.find({ where: { ownerId: user.userId } });
    const ids = new Set(own.map((t) => t.leagueId));
    const rows = await this.leagues.find({ relations: { season: true }, order: { createdAt: 'DESC' } });
    const counts = await this.teamCounts();
    return rows
      .filter((l) => ids.has(l.id) || l.commissionerId === user.userId)
      .map((l) => toLeagueView(l, counts.get(l.id) ?? 0, l.commissionerId === user.userId));
  }

  private async teamCounts(): Promise<Map<number, number>> {
    const rows = await this.teams.find({ select: { id: true, leagueId: true } });
    const counts = new Map<number, number>();
    for (const t of rows) counts.set(t.leagueId, (counts.get(t.leagueId) ?? 0) + 1);
    return counts;
  }

  async getLeague(id: number, user: AuthUser) {
    const league = await this.findLeague(id);
    const teams = await this.teams.find({ where: { leagueId: id }, relations: { owner: true } });
    const scoring = await this.scorings.findOne({ where: { leagueId: id } });
    return {
      ...toLeagueView(league, teams.length, canManageLeague(league, user)),
      scoring,
      teams: teams.map((t) => ({ id: t.id, name: t.name, owner: t.owner.username })),
    };
  }

  async updateLeague(id: number, user: AuthUser, dto: UpdateFantasyLeagueDto) {
    const league = await this.findLeague(id);
    assertCanManageLeague(league, user);
    const teamCount = await this.teams.count({ where: { leagueId: id } });
    if (dto.maxTeams !== undefined && dto.maxTeams < teamCount) {
      throw new BadRequestException(`La liga ya tiene ${teamCount} equipos`);
    }
    const rosterSize = dto.rosterSize ?? league.rosterSize;
    const startingLineupSize = dto.startingLineupSize ?? league.startingLineupSize;
    if (startingLineupSize > rosterSize) {
      throw new BadRequestException('startingLineupSize no puede superar rosterSize');
    }
    Object.assign(league, dto);
    const saved = await this.leagues.save(league);
    return toLeagueView(saved, teamCount, true);
  }

  async updateScoring(id: number, user: AuthUser, dto: UpdateScoringDto) {
    const league = await this.findLeague(id);
    assertCanManageLeague(league, user);
    const scoring = (await this.scorings.findOne({ where: { leagueId: id } })) ?? this.scorings.create({ leagueId: id });
    Object.assign(scoring, dto);
    return this.scorings.save(scoring);
  }

  async joinLeague(id: number, user: AuthUser, dto: JoinLeagueDto) {
    return this.ds.transaction(async (trx) => {
      const league = await trx.findOne(FantasyLeague, { where: { id } });
      if (!league) throw new NotFoundException('Liga no encontrada');
      if (!league.isActive) throw new BadRequestException('La liga no está activa');
      if (!league.isPublic && dto.inviteCode?.toUpperCase() !== league.inviteCode) {
        throw new BadRequestException('Invite code inválido');
      }

      const exists = await trx.findOne(FantasyTeam, { where: { leagueId: id, ownerId: user.userId } });
      if (exists) throw new ConflictException('Ya tienes un equipo en esta liga');

      const count = await trx.count(FantasyTeam, { where: { leagueId: id } });
      if (count >= league.maxTeams) throw new BadRequestException('La liga está completa');

      const team = await trx.save(trx.create(FantasyTeam, { name: dto.teamName, ownerId: user.userId, leagueId: id }));
      await trx.save(trx.create(Roster, { fantasyTeamId: team.id }));
      this.logger.log(`User ${user.userId} joined league ${id} as "${team.name}"`);
      return { id: team.id, name: team.name, leagueId: id };
    });
  }

  async standings(id: number) {
    await this.findLeague(id);
    const teams = await this.teams.find({ where: { leagueId: id }, relations: { owner: true } });
    return teams
      .sort((a, b) => b.totalPoints - a.totalPoints || a.name.localeCompare(b.name))
      .map((t, i) => ({
        rank: i + 1,
        teamId: t.id,
        name: t.name,
        owner: t.owner.username,
        wins: t.wins,
        losses: t.losses,
        ties: t.ties,
        winPercentage: t.winPercentage,
        totalPoints: t.totalPoints,
      }));
  }

  async freeAgents(id: number, query: FreeAgentQueryDto) {
    await this.findLeague(id);
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;
    const qb = this.players
      .createQueryBuilder('p')
      .innerJoinAndSelect('p.position', 'pos')
      .where('p.isActive = :active', { active: true })
      .andWhere(
        'NOT EXISTS (SELECT 1 FROM roster_slot rs WHERE rs.player_id = p.id AND rs.league_id = :leagueId)',
        { leagueId: id },
      )
      .orderBy('p.lastName', 'ASC')
      .addOrderBy('p.firstName', 'ASC')
      .skip((page - 1) * pageSize)
      .take(pageSize);
    if (query.position) qb.andWhere('pos.abbreviation = :abbr', { abbr: query.position.toUpperCase() });
    if (query.search) {
      const like = `%${query.search.toLowerCase()}%`;
      qb.andWhere(
        new Brackets((w) => {
          w.where('LOWER(p.firstName) LIKE :like', { like }).orWhere('LOWER(p.lastName) LIKE :like', { like });
        }),
      );
    }
    const [rows, total] = await qb.getManyAndCount();
    return { items: rows.map(toPlayerView), total, page, pageSize };
  }
}
