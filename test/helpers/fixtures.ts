// test/helpers/fixtures.ts
import { INestApplication } from '@nestjs/common';
import { DataSource, DeepPartial } from 'typeorm';
import { Game } from '../../src/games/game.entity';
import { Goal } from '../../src/games/goal.entity';
import { PlayerGameStats } from '../../src/games/player-game-stats.entity';
import { PlayerTeamHistory } from '../../src/players/player-team-history.entity';
import { Player } from '../../src/players/player.entity';
import { Position } from '../../src/players/position.entity';
import { SeedService } from '../../src/seed/seed.service';
import { Season } from '../../src/teams/season.entity';
import { Team } from '../../src/teams/team.entity';

/** Datos de referencia completos (32 equipos, temporada 2024-25 actual, posiciones). */
export async function seedReference(app: INestApplication) {
  await app.get(SeedService).populateInitialData();
}

export async function teamByAbbr(ds: DataSource, abbreviation: string): Promise<Team> {
  return ds.getRepository(Team).findOneOrFail({ where: { abbreviation } });
}

export async function currentSeason(ds: DataSource): Promise<Season> {
  return ds.getRepository(Season).findOneOrFail({ where: { isCurrent: true } });
}

/** Jugador con posición (abreviatura) y, opcionalmente, equipo actual en la temporada actual. */
export async function createPlayer(
  ds: DataSource,
  firstName: string,
  lastName: string,
  positionAbbr: string,
  teamAbbr?: string,
  extra: DeepPartial<Player> = {},
): Promise<Player> {
  const position = await ds.getRepository(Position).findOneOrFail({ where: { abbreviation: positionAbbr } });
  const repo = ds.getRepository(Player);
  const player = await repo.save(repo.create({ firstName, lastName, positionId: position.id, ...extra }));
  if (teamAbbr) {
    const team = await teamByAbbr(ds, teamAbbr);
    const season = await currentSeason(ds);
    await ds.getRepository(PlayerTeamHistory).save({
      playerId: player.id,
      teamId: team.id,
      seasonId: season.id,
      startDate: season.startDate,
      isCurrent: true,
    });
  }
  return player;
}

export async function createGame(
  ds: DataSource,
  homeAbbr: string,
  awayAbbr: string,
  isoDate: string,
  extra: DeepPartial<Game> = {},
): Promise<Game> {
  const home = await teamByAbbr(ds, homeAbbr);
  const away = await teamByAbbr(ds, awayAbbr);
  const season = await currentSeason(ds);
  const repo = ds.getRepository(Game);
  return repo.save(
    repo.create({
      homeTeamId: home.id,
      awayTeamId: away.id,
      seasonId: season.id,
      gameDate: new Date(isoDate),
      status: 'final',
      ...extra,
    }),
  );
}

export async function addLine(
  ds: DataSource,
  game: Game,
  player: Player,
  teamId: number,
  line: DeepPartial<PlayerGameStats> = {},
): Promise<PlayerGameStats> {
  const repo = ds.getRepository(PlayerGameStats);
  return repo.save(repo.create({ gameId: game.id, playerId: player.id, teamId, ...line }));
}

export async function addGoal(ds: DataSource, game: Game, goal: DeepPartial<Goal>): Promise<Goal> {
  const repo = ds.getRepository(Goal);
  return repo.save(repo.create({ gameId: game.id, period: 1, timeInPeriod: '10:00', gameTimeSeconds: 600, ...goal }));
}
