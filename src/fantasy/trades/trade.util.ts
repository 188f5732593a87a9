import { EntityManager, In } from 'typeorm';
import { TradePlayer } from './trade-player.entity';
import { Trade } from './trade.entity';

/**
 * Cancela los traspasos pendientes de la liga (equipos `leagueTeamIds`) que incluyan alguno de los jugadores.
 * Devuelve los ids cancelados.
 */
export async function cancelPendingTradesFor(
  trx: EntityManager,
  leagueTeamIds: number[],
  playerIds: number[],
  exceptTradeId?: number,
): Promise<number[]> {
  if (!playerIds.length || !leagueTeamIds.length) return [];
  const links = await trx.find(TradePlayer, {
    where: { playerId: In(playerIds), fromTeamId: In(leagueTeamIds) },
  });
  const tradeIds = [...new Set(links.map((l) => l.tradeId))].filter((id) => id !== exceptTradeId);
  if (!tradeIds.length) return [];
  const pending = await trx.find(Trade, {
    where: { id: In(tradeIds), status: 'pending' },
  });
  const now = new Date();
  for (const t of pending) {
    t.status = 'cancelled';
    t.responseDate = now;
  }
  await trx.save(pending);
  return pending.map((t) => t.id);
}
