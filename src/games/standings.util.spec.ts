import { computeStandings, sortStandings } from './standings.util';
import { GameResult } from './stat-line.util';

const game = (id: number, home: number, away: number, homeScore: number, awayScore: number, status: GameResult['status'] = 'final'): GameResult => ({
  id,
  homeTeamId: home,
  awayTeamId: away,
  homeScore,
  awayScore,
  status,
});

describe('computeStandings', () => {
  it('2 puntos por victoria y 1 por derrota en prórroga', () => {
    const rows = computeStandings(
      [game(1, 1, 2, 3, 1), game(2, 2, 1, 2, 1, 'overtime'), game(3, 3, 1, 0, 4, 'shootout')],
      [1, 2, 3, 4],
    );
    const byTeam = new Map(rows.map((r) => [r.teamId, r]));
    expect(byTeam.get(1)).toEqual({
      teamId: 1,
      gamesPlayed: 3,
      wins: 2,
      losses: 0,
      overtimeLosses: 1,
      points: 5,
      goalsFor: 8,
      goalsAgainst: 3,
      goalDifferential: 5,
    });
    expect(byTeam.get(2)).toMatchObject({ wins: 1, losses: 1, overtimeLosses: 0, points: 2, goalDifferential: -1 });
    expect(byTeam.get(3)).toMatchObject({ gamesPlayed: 1, losses: 0, overtimeLosses: 1, points: 1 });
    expect(byTeam.get(4)).toMatchObject({ gamesPlayed: 0, points: 0 });
  });

  it('ignora partidos no finalizados o empatados', () => {
    const rows = computeStandings([game(1, 1, 2, 2, 2), game(2, 1, 2, 0, 3, 'scheduled'), game(3, 1, 2, 5, 0, 'postponed')]);
    expect(rows).toEqual([]);
  });

  it('desempata por victorias, diferencia y nombre', () => {
    const base = { gamesPlayed: 0, losses: 0, overtimeLosses: 0, goalsFor: 0, goalsAgainst: 0 };
    const rows = [
      { ...base, teamId: 1, points: 4, wins: 1, goalDifferential: 0 },
      { ...base, teamId: 2, points: 4, wins: 2, goalDifferential: -3 },
      { ...base, teamId: 3, points: 6, wins: 3, goalDifferential: 1 },
      { ...base, teamId: 4, points: 4, wins: 1, goalDifferential: 0 },
    ];
    const names: Record<number, string> = { 1: 'Zeta', 2: 'Beta', 3: 'Gamma', 4: 'Alfa' };
    expect(sortStandings(rows, (id) => names[id]).map((r) => r.teamId)).toEqual([3, 2, 4, 1]);
  });
});
