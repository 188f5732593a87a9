// Reglas de alineación fantasy (sin acceso a BD)

export interface RosterPositionRule {
  id: number;
  abbreviation: string;
  isStarting: boolean;
  maxPlayers: number;
  eligiblePositions: string[];
}

export interface OccupiedSlot {
  positionId: number;
  isActive: boolean;
}

export interface LineupLimits {
  rosterSize: number;
  startingLineupSize: number;
}

export function isEligible(target: RosterPositionRule, playerPosition: string): boolean {
  const allowed = target.eligiblePositions.filter((p) => p !== '');
  return allowed.length === 0 || allowed.includes(playerPosition);
}

/**
 * Motivo por el que el jugador no cabe en `target`, o null si cabe.
 * `slots` excluye al propio jugador cuando se trata de un movimiento.
 */
export function placementError(
  target: RosterPositionRule,
  playerPosition: string,
  slots: OccupiedSlot[],
  limits: LineupLimits,
): string | null {
  if (!isEligible(target, playerPosition)) {
    return `${playerPosition} no puede ocupar ${target.abbreviation}`;
  }
  const inTarget = slots.filter((s) => s.positionId === target.id).length;
  if (inTarget >= target.maxPlayers) return `${target.abbreviation} está completa`;
  if (target.isStarting) {
    const starters = slots.filter((s) => s.isActive).length;
    if (starters >= limits.startingLineupSize) return 'Alineación titular completa';
  }
  return null;
}

/** Primera posición titular con hueco; si no hay, la primera de banquillo. */
export function pickPosition<T extends RosterPositionRule>(
  positions: T[],
  playerPosition: string,
  slots: OccupiedSlot[],
  limits: LineupLimits,
): T | null {
  const fits = (p: T) => placementError(p, playerPosition, slots, limits) === null;
  return positions.find((p) => p.isStarting && fits(p)) ?? positions.find((p) => !p.isStarting && fits(p)) ?? null;
}
