import { COMPLETED_STATUSES } from './game.entity';
import { GameResult } from './stat-line.util';

export interface StandingRow {
  teamId: number;
  gamesPlayed: number;
  wins: number;
  losses: number;
  overtimeLosses: number;
  points: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifferential: number;
}

function emptyRow(teamId: number): StandingRow {
  return { teamId, gamesPlayed: 0, wins: 0, losses: 0, overtimeLosses: 0, points: 0, goalsFor: 0, goalsAgainst: 0, goalDifferential: 0 };
}

/**
 * Clasificación: 2 puntos por victoria, 1 por derrota en prórroga/shootout.
 * Los partidos sin ganador o no finalizados no cuentan.
 */
export function computeStandings(games: GameResult[], teamIds: number[] = []): StandingRow[] {
  const rows = new Map<number, StandingRow>();
  const row = (id: number) => {
    let r = rows.get(id);
    if (!r) {
      r = emptyRow(id);
      rows.set(id, r);
    }
    return r;
  };
  teamIds.forEach(row);

  for (const g of games) {
    if (!COMPLETED_STATUSES.includes(g.status) || g.homeScore === g.awayScore) continue;
    const home = row(g.homeTeamId);
    const away = row(g.awayTeamId);
    home.gamesPlayed += 1;
    away.gamesPlayed += 1;
    home.goalsFor += g.homeScore;
    home.goalsAgainst += g.awayScore;
    away.goalsFor += g.awayScore;
    away.goalsAgainst += g.homeScore;

    const [winner, loser] = g.homeScore > g.awayScore ? [home, away] : [away, home];
    winner.wins += 1;
    winner.points += 2;
    if (g.status === 'final') {
      loser.losses += 1;
    } else {
      loser.overtimeLosses += 1;
      loser.points += 1;
    }
  }

  for (const r of rows.values()) r.goalDifferential = r.goalsFor - r.goalsAgainst;
  return [...rows.values()];
}

export function sortStandings<T extends StandingRow>(rows: T[], nameOf: (teamId: number) => string): T[] {
  return [...rows].sort(
    (a, b) =>
      b.points - a.points ||
      b.wins - a.wins ||
      b.goalDifferential - a.goalDifferential ||
      nameOf(a.teamId).localeCompare(nameOf(b.teamId)),
  );
}
