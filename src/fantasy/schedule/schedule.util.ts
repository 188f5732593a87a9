// Calendario de liga: semanas de 7 días y emparejamientos round-robin

export interface WeekPlan {
  weekNumber: number;
  startDate: string;
  endDate: string;
  isPlayoffs: boolean;
}

export type Pairing = [number, number];

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDay(day: string): number {
  return Date.parse(`${day}T00:00:00Z`);
}

function formatDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Semanas inclusivas [start, start+6] hasta endDate; la última se recorta. */
export function buildWeeks(startDate: string, endDate: string, playoffWeeks = 0): WeekPlan[] {
  const end = parseDay(endDate);
  const weeks: WeekPlan[] = [];
  for (let start = parseDay(startDate); start <= end; start += 7 * DAY_MS) {
    weeks.push({
      weekNumber: weeks.length + 1,
      startDate: formatDay(start),
      endDate: formatDay(Math.min(start + 6 * DAY_MS, end)),
      isPlayoffs: false,
    });
  }
  const firstPlayoff = Math.max(0, weeks.length - playoffWeeks);
  for (let i = firstPlayoff; i < weeks.length; i++) weeks[i].isPlayoffs = true;
  return weeks;
}

/**
 * Método del círculo: el primero queda fijo y el resto rota.
 * Con número impar se añade un hueco (descanso) que no genera emparejamiento.
 */
export function roundRobin(teamIds: number[]): Pairing[][] {
  const arr: Array<number | null> = [...teamIds].sort((a, b) => a - b);
  if (arr.length < 2) return [];
  if (arr.length % 2 === 1) arr.push(null);
  const n = arr.length;
  const rounds: Pairing[][] = [];
  let current = arr;
  for (let r = 0; r < n - 1; r++) {
    const pairs: Pairing[] = [];
    for (let i = 0; i < n / 2; i++) {
      const a = current[i];
      const b = current[n - 1 - i];
      if (a !== null && b !== null) pairs.push([a, b]);
    }
    rounds.push(pairs);
    current = [current[0], current[n - 1], ...current.slice(1, n - 1)];
  }
  return rounds;
}
