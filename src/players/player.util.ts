// Cálculos derivados de jugador y estadísticas (sin acceso a BD)

/** Edad en años cumplidos a fecha `asOf` (UTC). birthDate en 'YYYY-MM-DD'. */
export function computeAge(birthDate: string | null, asOf: Date = new Date()): number | null {
  if (!birthDate) return null;
  const [y, m, d] = birthDate.split('-').map(Number);
  if (!y || !m || !d) return null;
  const month = asOf.getUTCMonth() + 1;
  const day = asOf.getUTCDate();
  const beforeBirthday = month < m || (month === m && day < d);
  return asOf.getUTCFullYear() - y - (beforeBirthday ? 1 : 0);
}

/** 74 -> 6'2" */
export function heightDisplay(heightInches: number | null): string | null {
  if (!heightInches) return null;
  const feet = Math.floor(heightInches / 12);
  const inches = heightInches % 12;
  return `${feet}'${inches}"`;
}

/** Segundos -> 'M:SS' (minutos sin límite: 1265 -> '21:05'). */
export function formatSeconds(totalSeconds: number): string {
  if (!totalSeconds) return '0:00';
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

export function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

// tope de la columna numeric(5,2)
export const MAX_GOALS_AGAINST_AVERAGE = 999.99;

/** Goles en contra por 60 minutos; con muy poco TOI se recorta al máximo de la columna. */
export function goalsAgainstAverage(goalsAgainst: number, timeOnIceSeconds: number): number {
  if (!timeOnIceSeconds) return 0;
  return Math.min(round((goalsAgainst * 3600) / timeOnIceSeconds, 2), MAX_GOALS_AGAINST_AVERAGE);
}

export interface SeasonTotals {
  goals: number;
  assists: number;
  points: number;
  powerPlayGoals: number;
  powerPlayAssists: number;
  powerPlayPoints: number;
  shortHandedGoals: number;
  shortHandedAssists: number;
  shortHandedPoints: number;
  shotsOnGoal: number;
  shootingPercentage: number;
  shotsAgainst: number;
  saves: number;
  savePercentage: number;
}

/**
 * Totales que se recalculan en cada guardado de PlayerStats.
 * Porcentajes sólo se tocan si hay denominador.
 */
export function applyDerivedTotals<T extends SeasonTotals>(s: T): T {
  // entidades recién creadas pueden traer contadores sin asignar (default de BD)
  const n = (v: number | undefined) => v ?? 0;
  s.points = n(s.goals) + n(s.assists);
  s.powerPlayPoints = n(s.powerPlayGoals) + n(s.powerPlayAssists);
  s.shortHandedPoints = n(s.shortHandedGoals) + n(s.shortHandedAssists);
  if (n(s.shotsOnGoal) > 0) s.shootingPercentage = round((n(s.goals) / s.shotsOnGoal) * 100, 2);
  if (n(s.shotsAgainst) > 0) s.savePercentage = round(n(s.saves) / s.shotsAgainst, 3);
  return s;
}
