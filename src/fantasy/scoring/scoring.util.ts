import { StatLine } from '../../games/stat-line.util';
import { round } from '../../players/player.util';

/** Contadores que puntúan en fantasy (una semana de un jugador). */
export interface FantasyCounters {
  gamesPlayed: number;
  goals: number;
  assists: number;
  plusMinus: number;
  penaltyMinutes: number;
  powerPlayGoals: number;
  powerPlayAssists: number;
  shortHandedGoals: number;
  shortHandedAssists: number;
  shotsOnGoal: number;
  hits: number;
  blockedShots: number;
  wins: number;
  losses: number;
  goalsAgainst: number;
  saves: number;
  shutouts: number;
}

export interface ScoringWeights {
  goalsPoints: number;
  assistsPoints: number;
  plusMinusPoints: number;
  penaltyMinutesPoints: number;
  powerPlayGoalsPoints: number;
  powerPlayAssistsPoints: number;
  shortHandedGoalsPoints: number;
  shortHandedAssistsPoints: number;
  shotsOnGoalPoints: number;
  hitsPoints: number;
  blockedShotsPoints: number;
  winsPoints: number;
  lossesPoints: number;
  goalsAgainstPoints: number;
  savesPoints: number;
  shutoutsPoints: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  goalsPoints: 6,
  assistsPoints: 4,
  plusMinusPoints: 1,
  penaltyMinutesPoints: 0.5,
  powerPlayGoalsPoints: 1,
  powerPlayAssistsPoints: 0.5,
  shortHandedGoalsPoints: 2,
  shortHandedAssistsPoints: 1,
  shotsOnGoalPoints: 0.4,
  hitsPoints: 0.6,
  blockedShotsPoints: 1,
  winsPoints: 4,
  lossesPoints: -1,
  goalsAgainstPoints: -1,
  savesPoints: 0.6,
  shutoutsPoints: 5,
};

const WEIGHTED: Array<[keyof FantasyCounters, keyof ScoringWeights]> = [
  ['goals', 'goalsPoints'],
  ['assists', 'assistsPoints'],
  ['plusMinus', 'plusMinusPoints'],
  ['penaltyMinutes', 'penaltyMinutesPoints'],
  ['powerPlayGoals', 'powerPlayGoalsPoints'],
  ['powerPlayAssists', 'powerPlayAssistsPoints'],
  ['shortHandedGoals', 'shortHandedGoalsPoints'],
  ['shortHandedAssists', 'shortHandedAssistsPoints'],
  ['shotsOnGoal', 'shotsOnGoalPoints'],
  ['hits', 'hitsPoints'],
  ['blockedShots', 'blockedShotsPoints'],
  ['wins', 'winsPoints'],
  ['losses', 'lossesPoints'],
  ['goalsAgainst', 'goalsAgainstPoints'],
  ['saves', 'savesPoints'],
  ['shutouts', 'shutoutsPoints'],
];

/** Σ contador × peso, redondeado a 2 decimales. */
export function calculateFantasyPoints(counters: FantasyCounters, weights: ScoringWeights): number {
  let total = 0;
  for (const [counter, weight] of WEIGHTED) total += counters[counter] * weights[weight];
  return round(total, 2);
}

// En fantasy toda derrota cuenta igual (regulación o prórroga)
export function toFantasyCounters(line: StatLine): FantasyCounters {
  return {
    gamesPlayed: line.gamesPlayed,
    goals: line.goals,
    assists: line.assists,
    plusMinus: line.plusMinus,
    penaltyMinutes: line.penaltyMinutes,
    powerPlayGoals: line.powerPlayGoals,
    powerPlayAssists: line.powerPlayAssists,
    shortHandedGoals: line.shortHandedGoals,
    shortHandedAssists: line.shortHandedAssists,
    shotsOnGoal: line.shotsOnGoal,
    hits: line.hits,
    blockedShots: line.blockedShots,
    wins: line.wins,
    losses: line.losses + line.overtimeLosses,
    goalsAgainst: line.goalsAgainst,
    saves: line.saves,
    shutouts: line.shutouts,
  };
}
