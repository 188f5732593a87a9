import { COMPLETED_STATUSES, GameStatus } from './game.entity';
import { GoalType } from './goal.entity';

/** Totales de un jugador sobre un conjunto de partidos. */
export interface StatLine {
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
  timeOnIceSeconds: number;
  wins: number;
  losses: number;
  overtimeLosses: number;
  shutouts: number;
  goalsAgainst: number;
  shotsAgainst: number;
  saves: number;
}

export interface GameResult {
  id: number;
  homeTeamId: number;
  awayTeamId: number;
  homeScore: number;
  awayScore: number;
  status: GameStatus;
}

export interface GameLine {
  playerId: number;
  gameId: number;
  teamId: number;
  played: boolean;
  starter: boolean;
  goals: number;
  assists: number;
  plusMinus: number;
  penaltyMinutes: number;
  shotsOnGoal: number;
  hits: number;
  blockedShots: number;
  timeOnIceSeconds: number;
  saves: number;
  goalsAgainst: number;
  shotsAgainst: number;
}

export interface GoalCredit {
  gameId: number;
  teamId: number;
  scorerId: number;
  assist1Id: number | null;
  assist2Id: number | null;
  goalType: GoalType;
}

export type GoalieDecision = 'win' | 'loss' | 'overtime_loss' | null;

export function emptyStatLine(): StatLine {
  return {
    gamesPlayed: 0,
    goals: 0,
    assists: 0,
    plusMinus: 0,
    penaltyMinutes: 0,
    powerPlayGoals: 0,
    powerPlayAssists: 0,
    shortHandedGoals: 0,
    shortHandedAssists: 0,
    shotsOnGoal: 0,
    hits: 0,
    blockedShots: 0,
    timeOnIceSeconds: 0,
    wins: 0,
    losses: 0,
    overtimeLosses: 0,
    shutouts: 0,
    goalsAgainst: 0,
    shotsAgainst: 0,
    saves: 0,
  };
}

/**
 * Decisión del portero titular. Derrota en prórroga/shootout cuenta aparte.
 * Sin decisión si no fue titular, no jugó o el partido no tiene ganador.
 */
export function goalieDecision(line: Pick<GameLine, 'teamId' | 'starter' | 'played'>, game: GameResult): GoalieDecision {
  if (!line.starter || !line.played) return null;
  if (!COMPLETED_STATUSES.includes(game.status) || game.homeScore === game.awayScore) return null;
  const winner = game.homeScore > game.awayScore ? game.homeTeamId : game.awayTeamId;
  if (line.teamId === winner) return 'win';
  return game.status === 'final' ? 'loss' : 'overtime_loss';
}

export function addGameLine(target: StatLine, line: GameLine, game: GameResult, isGoalie: boolean): void {
  if (!line.played) return;
  target.gamesPlayed += 1;
  target.goals += line.goals;
  target.assists += line.assists;
  target.plusMinus += line.plusMinus;
  target.penaltyMinutes += line.penaltyMinutes;
  target.shotsOnGoal += line.shotsOnGoal;
  target.hits += line.hits;
  target.blockedShots += line.blockedShots;
  target.timeOnIceSeconds += line.timeOnIceSeconds;
  target.saves += line.saves;
  target.goalsAgainst += line.goalsAgainst;
  target.shotsAgainst += line.shotsAgainst;

  if (!isGoalie) return;
  const decision = goalieDecision(line, game);
  if (decision === 'win') {
    target.wins += 1;
    if (line.goalsAgainst === 0) target.shutouts += 1;
  } else if (decision === 'loss') {
    target.losses += 1;
  } else if (decision === 'overtime_loss') {
    target.overtimeLosses += 1;
  }
}

/**
 * Agrega líneas de partido por clave (jugador, o jugador+equipo).
 * Sólo cuentan partidos presentes en `games`; los goles aportan el desglose PP/SH
 * a claves que ya tengan línea.
 */
export function aggregateStatLines<K>(
  lines: GameLine[],
  games: Map<number, GameResult>,
  goals: GoalCredit[],
  goalieIds: Set<number>,
  keyOf: (playerId: number, teamId: number) => K,
): Map<K, StatLine> {
  const out = new Map<K, StatLine>();
  for (const line of lines) {
    const game = games.get(line.gameId);
    if (!game) continue;
    const key = keyOf(line.playerId, line.teamId);
    let acc = out.get(key);
    if (!acc) {
      acc = emptyStatLine();
      out.set(key, acc);
    }
    addGameLine(acc, line, game, goalieIds.has(line.playerId));
  }

  for (const goal of goals) {
    if (!games.has(goal.gameId)) continue;
    if (goal.goalType !== 'power_play' && goal.goalType !== 'short_handed') continue;
    const pp = goal.goalType === 'power_play';
    const scorer = out.get(keyOf(goal.scorerId, goal.teamId));
    if (scorer) {
      if (pp) scorer.powerPlayGoals += 1;
      else scorer.shortHandedGoals += 1;
    }
    for (const assistId of [goal.assist1Id, goal.assist2Id]) {
      if (assistId === null) continue;
      const helper = out.get(keyOf(assistId, goal.teamId));
      if (!helper) continue;
      if (pp) helper.powerPlayAssists += 1;
      else helper.shortHandedAssists += 1;
    }
  }
  return out;
}
