import { BadRequestException, ConflictException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { AuthUser, isStaff } from '../../auth/user.decorator';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { RosterPosition } from '../teams/roster-position.entity';
import { occupiedSlotsOf } from '../teams/fantasy-teams.service';
import { RosterSlot } from '../teams/roster-slot.entity';
import { Roster } from '../teams/roster.entity';
import { ProposeTradeDto, TradeQueryDto } from './dto/trade.dto';
import { TradePlayer } from './trade-player.entity';
import { Trade, TradeStatus } from './trade.entity';
import { cancelPendingTradesFor } from './trade.util';

export function toTradeView(t: Trade) {
  return {
    id: t.id,
    fromTeamId: t.fromTeamId,
    toTeamId: t.toTeamId,
    status: t.status,
    message: t.message,
    proposedDate: t.proposedDate,
    responseDate: t.responseDate,
    completionDate: t.completionDate,
    players: (t.players ?? []).map((tp) => ({
      playerId: tp.playerId,
      fullName: tp.player?.fullName ?? null,
      fromTeamId: tp.fromTeamId,
      toTeamId: tp.toTeamId,
    })),
  };
}

@Injectable()
export class TradesService {
  private readonly logger = new Logger(TradesService.name);

  constructor(
    @InjectRepository(Trade) private trades: Repository<Trade>,
    @InjectRepository(FantasyTeam) private teams: Repository<FantasyTeam>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  async propose(user: AuthUser, dto: ProposeTradeDto) {
    const id = await this.ds.transaction(async (trx) => {
      if (dto.fromTeamId === dto.toTeamId) throw new BadRequestException('Los equipos deben ser distintos');
      const [from, to] = await Promise.all([
        trx.findOne(FantasyTeam, { where: { id: dto.fromTeamId } }),
        trx.findOne(FantasyTeam, { where: { id: dto.toTeamId } }),
      ]);
      if (!from || !to) throw new NotFoundException('Equipo fantasy no encontrado');
      if (from.ownerId !== user.userId) throw new ForbiddenException('Sólo el dueño puede proponer traspasos');
      if (from.leagueId !== to.leagueId) throw new BadRequestException('Los equipos deben ser de la misma liga');

      const offered = dto.offeredPlayerIds;
      const requested = dto.requestedPlayerIds;
      if (!offered.length && !requested.length) throw new BadRequestException('El traspaso necesita al menos un jugador');
      if (offered.some((p) => requested.includes(p))) throw new BadRequestException('Jugador repetido en el traspaso');

      await this.assertOnRoster(trx, from.id, offered);
      await this.assertOnRoster(trx, to.id, requested);

      const trade = await trx.save(
        trx.create(Trade, { fromTeamId: from.id, toTeamId: to.id, message: dto.message ?? '', status: 'pending' }),
      );
      await trx.save([
        ...offered.map((playerId) => trx.create(TradePlayer, { tradeId: trade.id, playerId, fromTeamId: from.id, toTeamId: to.id })),
        ...requested.map((playerId) => trx.create(TradePlayer, { tradeId: trade.id, playerId, fromTeamId: to.id, toTeamId: from.id })),
      ]);
      return trade.id;
    });
    this.logger.log(`Trade ${id} proposed by team ${dto.fromTeamId} to team ${dto.toTeamId}`);
    return this.getTrade(id);
  }

  private async assertOnRoster(trx: EntityManager, teamId: number, playerIds: number[]) {
    if (!playerIds.length) return;
    const roster = await trx.findOne(Roster, { where: { fantasyTeamId: teamId } });
    const slots = roster ? await trx.find(RosterSlot, { where: { rosterId: roster.id, playerId: In(playerIds) } }) : [];
    const onRoster = new Set(slots.map((s) => s.playerId));
    const missing = playerIds.filter((p) => !onRoster.has(p));
    if (missing.length) {
      throw new BadRequestException(`Jugadores fuera del roster del equipo ${teamId}: ${missing.join(', ')}`);
    }
  }

  async getTrade(id: number) {
    const trade = await this.trades.findOne({ where: { id }, relations: { players: { player: true } } });
    if (!trade) throw new NotFoundException('Traspaso no encontrado');
    return toTradeView(trade);
  }

  async listForTeam(teamId: number, user: AuthUser, query: TradeQueryDto) {
    const team = await this.teams.findOne({ where: { id: teamId } });
    if (!team) throw new NotFoundException('Equipo fantasy no encontrado');
    if (team.ownerId !== user.userId && !isStaff(user)) throw new ForbiddenException('No eres el dueño de este equipo');
    const status = query.status ? { status: query.status } : {};
    const rows = await this.trades.find({
      where: [
        { fromTeamId: teamId, ...status },
        { toTeamId: teamId, ...status },
      ],
      relations: { players: { player: true } },
      order: { proposedDate: 'DESC', id: 'DESC' },
    });
    return rows.map(toTradeView);
  }

  async accept(id: number, user: AuthUser) {
    await this.ds.transaction(async (trx) => {
      const trade = await this.loadPending(trx, id);
      const to = await trx.findOneOrFail(FantasyTeam, { where: { id: trade.toTeamId } });
      if (to.ownerId !== user.userId) throw new ForbiddenException('Sólo el equipo receptor puede aceptar');
      const league = await trx.findOneOrFail(FantasyLeague, { where: { id: to.leagueId } });

      const [fromRoster, toRoster] = await Promise.all([
        trx.findOneOrFail(Roster, { where: { fantasyTeamId: trade.fromTeamId } }),
        trx.findOneOrFail(Roster, { where: { fantasyTeamId: trade.toTeamId } }),
      ]);
      const rosterOf = (teamId: number) => (teamId === trade.fromTeamId ? fromRoster : toRoster);

      const playerIds = trade.players.map((tp) => tp.playerId);
      const slots = await trx.find(RosterSlot, {
        where: { leagueId: league.id, playerId: In(playerIds) },
      });
      for (const tp of trade.players) {
        const slot = slots.find((s) => s.playerId === tp.playerId);
        if (!slot || slot.rosterId !== rosterOf(tp.fromTeamId).id) {
          throw new ConflictException(`El jugador ${tp.playerId} ya no está en el equipo de origen`);
        }
      }

      const bench = await trx.findOne(RosterPosition, { where: { isStarting: false }, order: { id: 'ASC' } });
      if (!bench) throw new BadRequestException('No hay posición de banquillo configurada');

      // tamaño resultante de cada roster y de su banquillo (los recibidos entran al banquillo)
      for (const roster of [fromRoster, toRoster]) {
        const current = await trx.find(RosterSlot, { where: occupiedSlotsOf(roster.id) });
        const incoming = trade.players.filter((tp) => rosterOf(tp.toTeamId).id === roster.id).length;
        const leaving = slots.filter((s) => s.rosterId === roster.id);
        if (current.length - leaving.length + incoming > league.rosterSize) {
          throw new BadRequestException(`El roster del equipo ${roster.fantasyTeamId} superaría ${league.rosterSize} jugadores`);
        }
        const onBench = current.filter((s) => s.positionId === bench.id).length;
        const benchLeaving = leaving.filter((s) => s.positionId === bench.id).length;
        if (onBench - benchLeaving + incoming > bench.maxPlayers) {
          throw new BadRequestException(`El banquillo del equipo ${roster.fantasyTeamId} superaría ${bench.maxPlayers} jugadores`);
        }
      }

      // primero liberar, después insertar (unicidad por liga)
      await trx.remove(slots);
      await trx.save(
        trade.players.map((tp) =>
          trx.create(RosterSlot, {
            rosterId: rosterOf(tp.toTeamId).id,
            leagueId: league.id,
            positionId: bench.id,
            playerId: tp.playerId,
            isActive: false,
          }),
        ),
      );

      const now = new Date();
      await trx.save(Trade, { id: trade.id, status: 'completed', responseDate: now, completionDate: now });

      const leagueTeams = await trx.find(FantasyTeam, { where: { leagueId: league.id } });
      await cancelPendingTradesFor(trx, leagueTeams.map((t) => t.id), playerIds, trade.id);
    });
    this.logger.log(`Trade ${id} completed`);
    return this.getTrade(id);
  }

  reject(id: number, user: AuthUser) {
    return this.respond(id, user, 'rejected');
  }

  cancel(id: number, user: AuthUser) {
    return this.respond(id, user, 'cancelled');
  }

  private async respond(id: number, user: AuthUser, status: Extract<TradeStatus, 'rejected' | 'cancelled'>) {
    await this.ds.transaction(async (trx) => {
      const trade = await this.loadPending(trx, id);
      // rechaza el receptor; cancela quien propuso
      const actorTeamId = status === 'rejected' ? trade.toTeamId : trade.fromTeamId;
      const actor = await trx.findOneOrFail(FantasyTeam, { where: { id: actorTeamId } });
      if (actor.ownerId !== user.userId) throw new ForbiddenException('No puedes modificar este traspaso');
      await trx.save(Trade, { id: trade.id, status, responseDate: new Date() });
    });
    return this.getTrade(id);
  }

  private async loadPending(trx: EntityManager, id: number): Promise<Trade> {
    const trade = await trx.findOne(Trade, { where: { id }, relations: { players: true } });
    if (!trade) throw new NotFoundException('Traspaso no encontrado');
    if (trade.status !== 'pending') throw new ConflictException(`El traspaso ya está ${trade.status}`);
    return trade;
  }
}
