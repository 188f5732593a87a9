// src/fantasy/teams/fantasy-teams.service.ts
import { BadRequestException, ConflictException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, IsNull, Not, Repository } from 'typeorm';
import { AuthUser, isStaff } from '../../auth/user.decorator';
import { Player } from '../../players/player.entity';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { cancelPendingTradesFor } from '../trades/trade.util';
import { AddRosterPlayerDto, MoveRosterPlayerDto, UpdateFantasyTeamDto } from './dto/fantasy-team.dto';
import { FantasyTeam } from './fantasy-team.entity';
import { RosterPosition } from './roster-position.entity';
import { RosterSlot } from './roster-slot.entity';
import { Roster } from './roster.entity';
import { pickPosition, placementError } from './roster-rules.util';

export function toSlotView(s: RosterSlot) {
  return {
    slotId: s.id,
    position: s.position.abbreviation,
    positionId: s.positionId,
    isActive: s.isActive,
    player: s.player
      ? { id: s.player.id, fullName: s.player.fullName, position: s.player.position?.abbreviation ?? null }
      : null,
  };
}

// un hueco cuyo jugador se borró (player_id null) no cuenta para los cupos
export function occupiedSlotsOf(rosterId: number): FindOptionsWhere<RosterSlot> {
  return { rosterId, playerId: Not(IsNull()) };
}

interface TeamContext {
  team: FantasyTeam;
  league: FantasyLeague;
  roster: Roster;
}

@Injectable()
export class FantasyTeamsService {
  private readonly logger = new Logger(FantasyTeamsService.name);

  constructor(
    @InjectRepository(FantasyTeam) private teams: Repository<FantasyTeam>,
    @InjectRepository(RosterSlot) private slots: Repository<RosterSlot>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  /** Equipo + liga + roster, verificando propiedad si se pide. */
  private async context(trx: EntityManager, teamId: number, user?: AuthUser): Promise<TeamContext> {
    const team = await trx.findOne(FantasyTeam, { where: { id: teamId }, relations: { league: true } });
    if (!team) throw new NotFoundException('Equipo fantasy no encontrado');
    if (user && team.ownerId !== user.userId) throw new ForbiddenException('No eres el dueño de este equipo');
    let roster = await trx.findOne(Roster, { where: { fantasyTeamId: teamId } });
    if (!roster) roster = await trx.save(trx.create(Roster, { fantasyTeamId: teamId }));
    return { team, league: team.league, roster };
  }

  async getTeam(teamId: number) {
    const team = await this.teams.findOne({ where: { id: teamId }, relations: { league: true, owner: true } });
    if (!team) throw new NotFoundException('Equipo fantasy no encontrado');
    return {
      id: team.id,
      name: team.name,
      logoUrl: team.logoUrl,
      owner: team.owner.username,
      league: { id: team.league.id, name: team.league.name },
      wins: team.wins,
      losses: team.losses,
      ties: team.ties,
      winPercentage: team.winPercentage,
      totalPoints: team.totalPoints,
      roster: await this.roster(teamId),
    };
  }

  async updateTeam(teamId: number, user: AuthUser, dto: UpdateFantasyTeamDto) {
    const team = await this.teams.findOne({ where: { id: teamId } });
    if (!team) throw new NotFoundException('Equipo fantasy no encontrado');
    if (team.ownerId !== user.userId && !isStaff(user)) throw new ForbiddenException('No eres el dueño de este equipo');
    Object.assign(team, dto);
    const saved = await this.teams.save(team);
    return { id: saved.id, name: saved.name, logoUrl: saved.logoUrl };
  }

  async roster(teamId: number) {
    const rows = await this.slots.find({
      where: { roster: { fantasyTeamId: teamId } },
      relations: { position: true, player: { position: true } },
    });
    // titulares primero, en el orden de posiciones
    return rows
      .sort((a, b) => Number(b.isActive) - Number(a.isActive) || a.positionId - b.positionId || a.id - b.id)
      .map(toSlotView);
  }

  async addPlayer(teamId: number, user: AuthUser, dto: AddRosterPlayerDto) {
    const slot = await this.ds.transaction(async (trx) => {
      const { league, roster } = await this.context(trx, teamId, user);
      const player = await trx.findOne(Player, { where: { id: dto.playerId }, relations: { position: true } });
      if (!player) throw new NotFoundException('Jugador no encontrado');
      if (!player.isActive) throw new BadRequestException('Jugador inactivo');

      const taken = await trx.findOne(RosterSlot, { where: { leagueId: league.id, playerId: player.id } });
      if (taken) throw new ConflictException('El jugador ya está en un equipo de la liga');

      const current = await trx.find(RosterSlot, { where: occupiedSlotsOf(roster.id) });
      if (current.length >= league.rosterSize) throw new BadRequestException('Roster completo');

      const positions = await trx.find(RosterPosition, { order: { id: 'ASC' } });
      const limits = { rosterSize: league.rosterSize, startingLineupSize: league.startingLineupSize };
      let target: RosterPosition | null;
      if (dto.positionId !== undefined) {
        target = positions.find((p) => p.id === dto.positionId) ?? null;
        if (!target) throw new BadRequestException('Posición de roster no existe');
        const error = placementError(target, player.position.abbreviation, current, limits);
        if (error) throw new BadRequestException(error);
      } else {
        target = pickPosition(positions, player.position.abbreviation, current, limits);
        if (!target) throw new BadRequestException('No hay posición libre para el jugador');
      }

      return trx.save(
        trx.create(RosterSlot, {
          rosterId: roster.id,
          leagueId: league.id,
          positionId: target.id,
          playerId: player.id,
          isActive: target.isStarting,
        }),
      );
    });
    this.logger.log(`Team ${teamId} added player ${dto.playerId}`);
    return this.slotView(slot.id);
  }

  async movePlayer(teamId: number, playerId: number, user: AuthUser, dto: MoveRosterPlayerDto) {
    const slotId = await this.ds.transaction(async (trx) => {
      const { league, roster } = await this.context(trx, teamId, user);
      const current = await trx.find(RosterSlot, {
        where: occupiedSlotsOf(roster.id),
        relations: { player: { position: true } },
      });
      const slot = current.find((s) => s.playerId === playerId);
      if (!slot || !slot.player) throw new NotFoundException('El jugador no está en el roster');

      const target = await trx.findOne(RosterPosition, { where: { id: dto.positionId } });
      if (!target) throw new BadRequestException('Posición de roster no existe');
      if (target.id === slot.positionId) return slot.id;

      const others = current.filter((s) => s.id !== slot.id);
      const error = placementError(target, slot.player.position.abbreviation, others, {
        rosterSize: league.rosterSize,
        startingLineupSize: league.startingLineupSize,
      });
      if (error) throw new BadRequestException(error);

      slot.positionId = target.id;
      slot.isActive = target.isStarting;
      await trx.save(RosterSlot, { id: slot.id, positionId: slot.positionId, isActive: slot.isActive });
      return slot.id;
    });
    return this.slotView(slotId);
  }

  async dropPlayer(teamId: number, playerId: number, user: AuthUser) {
    return this.ds.transaction(async (trx) => {
      const { league, roster } = await this.context(trx, teamId, user);
      const slot = await trx.findOne(RosterSlot, { where: { rosterId: roster.id, playerId } });
      if (!slot) throw new NotFoundException('El jugador no está en el roster');
      await trx.remove(slot);

      const leagueTeams = await trx.find(FantasyTeam, { where: { leagueId: league.id } });
      const cancelled = await cancelPendingTradesFor(
        trx,
        leagueTeams.map((t) => t.id),
        [playerId],
      );
      this.logger.log(`Team ${teamId} dropped player ${playerId}; cancelled trades: ${cancelled.length}`);
      return { dropped: playerId, cancelledTrades: cancelled };
    });
  }

  /** Quita un hueco por id; sirve también para los que quedaron sin jugador. */
  async dropSlot(teamId: number, slotId: number, user: AuthUser) {
    const playerId = await this.ds.transaction(async (trx) => {
      const { roster } = await this.context(trx, teamId, user);
      const slot = await trx.findOne(RosterSlot, { where: { id: slotId, rosterId: roster.id } });
      if (!slot) throw new NotFoundException('Hueco de roster no encontrado');
      if (slot.playerId === null) {
        await trx.remove(slot);
        this.logger.log(`Team ${teamId} removed empty slot ${slotId}`);
      }
      return slot.playerId;
    });
    if (playerId !== null) return this.dropPlayer(teamId, playerId, user);
    const cancelledTrades: number[] = [];
    return { dropped: null, cancelledTrades };
  }

  private async slotView(slotId: number) {
    const slot = await this.slots.findOneOrFail({
      where: { id: slotId },
      relations: { position: true, player: { position: true } },
    });
    return toSlotView(slot);
  }
}
