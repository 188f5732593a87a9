import { aggregateStatLines, GameLine, GameResult, goalieDecision, GoalCredit } from './stat-line.util';

const line = (over: Partial<GameLine>): GameLine => ({
  playerId: 1,
  gameId: 1,
  teamId: 10,
  played: true,
  starter: false,
  goals: 0,
  assists: 0,
  plusMinus: 0,
  penaltyMinutes: 0,
  shotsOnGoal: 0,
  hits: 0,
  blockedShots: 0,
  timeOnIceSeconds: 0,
  saves: 0,
  goalsAgainst: 0,
  shotsAgainst: 0,
  ...over,
});

const results = new Map<number, GameResult>([
  [1, { id: 1, homeTeamId: 10, awayTeamId: 20, homeScore: 2, awayScore: 0, status: 'final' }],
  [2, { id: 2, homeTeamId: 20, awayTeamId: 10, homeScore: 3, awayScore: 2, status: 'overtime' }],
]);

describe('goalieDecision', () => {
  it('victoria, derrota y derrota en prórroga sólo para el titular', () => {
    const g1 = results.get(1);
    const g2 = results.get(2);
    if (!g1 || !g2) throw new Error('fixture');
    expect(goalieDecision({ teamId: 10, starter: true, played: true }, g1)).toBe('win');
    expect(goalieDecision({ teamId: 20, starter: true, played: true }, g1)).toBe('loss');
    expect(goalieDecision({ teamId: 10, starter: true, played: true }, g2)).toBe('overtime_loss');
    expect(goalieDecision({ teamId: 10, starter: false, played: true }, g1)).toBeNull();
    expect(goalieDecision({ teamId: 10, starter: true, played: true }, { ...g1, status: 'scheduled' })).toBeNull();
  });
});

describe('aggregateStatLines', () => {
  it('suma líneas, decisiones de portero y desglose PP/SH', () => {
    const lines = [
      line({ playerId: 1, gameId: 1, goals: 1, assists: 1, shotsOnGoal: 4, timeOnIceSeconds: 1000 }),
      line({ playerId: 1, gameId: 2, goals: 1, shotsOnGoal: 2, timeOnIceSeconds: 1100 }),
      line({ playerId: 2, gameId: 1, assists: 1 }),
      line({ playerId: 9, gameId: 1, starter: true, saves: 25, shotsAgainst: 25 }),
      line({ playerId: 9, gameId: 2, starter: true, saves: 30, goalsAgainst: 3, shotsAgainst: 33 }),
      // partido fuera del conjunto
      line({ playerId: 1, gameId: 3, goals: 5 }),
      line({ playerId: 3, gameId: 1, played: false, goals: 1 }),
    ];
    const goals: GoalCredit[] = [
      { gameId: 1, teamId: 10, scorerId: 1, assist1Id: 2, assist2Id: null, goalType: 'power_play' },
      { gameId: 2, teamId: 10, scorerId: 1, assist1Id: null, assist2Id: null, goalType: 'short_handed' },
      { gameId: 2, teamId: 10, scorerId: 7, assist1Id: 1, assist2Id: null, goalType: 'even_strength' },
    ];
    const totals = aggregateStatLines(lines, results, goals, new Set([9]), (playerId) => playerId);

    expect(totals.get(1)).toMatchObject({
      gamesPlayed: 2,
      goals: 2,
      assists: 1,
      shotsOnGoal: 6,
      timeOnIceSeconds: 2100,
      powerPlayGoals: 1,
      shortHandedGoals: 1,
      powerPlayAssists: 0,
    });
    expect(totals.get(2)).toMatchObject({ gamesPlayed: 1, assists: 1, powerPlayAssists: 1 });
    expect(totals.get(9)).toMatchObject({
      gamesPlayed: 2,
      wins: 1,
      shutouts: 1,
      overtimeLosses: 1,
      losses: 0,
      saves: 55,
      shotsAgainst: 58,
      goalsAgainst: 3,
    });
    expect(totals.get(3)).toMatchObject({ gamesPlayed: 0, goals: 0 });
    expect(totals.has(7)).toBe(false);
  });

  it('agrupa por jugador y equipo cuando la clave lo pide', () => {
    const lines = [line({ playerId: 1, gameId: 1, teamId: 10, goals: 1 }), line({ playerId: 1, gameId: 2, teamId: 20, goals: 2 })];
    const totals = aggregateStatLines(lines, results, [], new Set(), (p, t) => `${p}:${t}`);
    expect([...totals.entries()].map(([k, v]) => [k, v.goals])).toEqual([
      ['1:10', 1],
      ['1:20', 2],
    ]);
  });
});
