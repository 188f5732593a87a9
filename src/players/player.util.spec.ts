import {
  applyDerivedTotals,
  computeAge,
  formatSeconds,
  goalsAgainstAverage,
  heightDisplay,
  MAX_GOALS_AGAINST_AVERAGE,
  SeasonTotals,
} from './player.util';

describe('player.util', () => {
  it('edad en años cumplidos', () => {
    const asOf = new Date('2025-03-15T12:00:00Z');
    expect(computeAge('2000-03-15', asOf)).toBe(25);
    expect(computeAge('2000-03-16', asOf)).toBe(24);
    expect(computeAge('1999-12-31', asOf)).toBe(25);
    expect(computeAge(null, asOf)).toBeNull();
    expect(computeAge('no-es-fecha', asOf)).toBeNull();
  });

  it('GAA por 60 minutos, recortado con muy poco tiempo en hielo', () => {
    expect(goalsAgainstAverage(3, 3600)).toBe(3);
    expect(goalsAgainstAverage(5, 7200)).toBe(2.5);
    expect(goalsAgainstAverage(2, 0)).toBe(0);
    // 1 gol en 30 s = 120; 1 gol en 1 s = 3600 -> tope
    expect(goalsAgainstAverage(1, 30)).toBe(120);
    expect(goalsAgainstAverage(1, 1)).toBe(MAX_GOALS_AGAINST_AVERAGE);
  });

  it('altura en pies y pulgadas', () => {
    expect(heightDisplay(74)).toBe(`6'2"`);
    expect(heightDisplay(72)).toBe(`6'0"`);
    expect(heightDisplay(null)).toBeNull();
    expect(heightDisplay(0)).toBeNull();
  });

  it('segundos a M:SS', () => {
    expect(formatSeconds(1265)).toBe('21:05');
    expect(formatSeconds(59)).toBe('0:59');
    expect(formatSeconds(0)).toBe('0:00');
    expect(formatSeconds(3661)).toBe('61:01');
  });

  it('totales derivados', () => {
    const totals: SeasonTotals = {
      goals: 3,
      assists: 4,
      points: 0,
      powerPlayGoals: 1,
      powerPlayAssists: 2,
      powerPlayPoints: 0,
      shortHandedGoals: 0,
      shortHandedAssists: 1,
      shortHandedPoints: 0,
      shotsOnGoal: 12,
      shootingPercentage: 0,
      shotsAgainst: 0,
      saves: 0,
      savePercentage: 0.5,
    };
    expect(applyDerivedTotals(totals)).toMatchObject({
      points: 7,
      powerPlayPoints: 3,
      shortHandedPoints: 1,
      shootingPercentage: 25,
      // sin tiros en contra no se toca
      savePercentage: 0.5,
    });
  });
});
