// test/games/players-games.e2e-spec.ts
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { Game } from '../../src/games/game.entity';
import { Player } from '../../src/players/player.entity';
import { Season } from '../../src/teams/season.entity';
import { Team } from '../../src/teams/team.entity';
import { bearer, createTestApp, registerUser, staffToken } from '../helpers/app';
import { addGoal, addLine, createGame, createPlayer, currentSeason, seedReference, teamByAbbr } from '../helpers/fixtures';

describe('Players & Games E2E', () => {
  let app: INestApplication;
  let ds: DataSource;
  let admin: string;
  let season: Season;
  let edm: Team;
  let cgy: Team;
  let skater: Player;
  let edmGoalie: Player;
  let cgyGoalie: Player;
  let opener: Game;

  beforeAll(async () => {
    ({ app, ds } = await createTestApp());
    await seedReference(app);
    admin = await staffToken(app);
    season = await currentSeason(ds);
    edm = await teamByAbbr(ds, 'EDM');
    cgy = await teamByAbbr(ds, 'CGY');

    skater = await createPlayer(ds, 'Casey', 'Skater', 'C', 'EDM', { heightInches: 73, birthDate: '2000-01-15' });
    edmGoalie = await createPlayer(ds, 'Stu', 'Keeper', 'G', 'EDM');
    cgyGoalie = await createPlayer(ds, 'Dan', 'Blocker', 'G', 'CGY');

    // EDM 3-1 CGY en tiempo regular
    opener = await createGame(ds, 'EDM', 'CGY', '2024-10-10T00:00:00Z', { homeScore: 3, awayScore: 1 });
    await addLine(ds, opener, skater, edm.id, { goals: 2, assists: 1, shotsOnGoal: 5, timeOnIceSeconds: 1200, plusMinus: 2 });
    await addLine(ds, opener, edmGoalie, edm.id, { starter: true, saves: 29, shotsAgainst: 30, goalsAgainst: 1, timeOnIceSeconds: 3600 });
    await addLine(ds, opener, cgyGoalie, cgy.id, { starter: true, saves: 17, shotsAgainst: 20, goalsAgainst: 3, timeOnIceSeconds: 3600 });
    await addGoal(ds, opener, { scorerId: skater.id, teamId: edm.id, goalType: 'power_play' });

    // CGY 2-3 EDM en prórroga
    const second = await createGame(ds, 'CGY', 'EDM', '2024-10-12T00:00:00Z', { homeScore: 2, awayScore: 3, status: 'overtime' });
    await addLine(ds, second, skater, edm.id, { assists: 1, shotsOnGoal: 3, timeOnIceSeconds: 1000 });
    await addLine(ds, second, edmGoalie, edm.id, { starter: true, saves: 25, shotsAgainst: 27, goalsAgainst: 2, timeOnIceSeconds: 3900 });
    await addLine(ds, second, cgyGoalie, cgy.id, { starter: true, saves: 20, shotsAgainst: 23, goalsAgainst: 3, timeOnIceSeconds: 3880 });

    // pendiente: no cuenta
    await createGame(ds, 'VAN', 'EDM', '2024-10-20T02:00:00Z', { status: 'scheduled' });
  });

  afterAll(async () => {
    await app.close();
  });

  it('lista jugadores con derivados y filtros', async () => {
    const res = await request(app.getHttpServer()).get('/players').query({ teamId: edm.id }).expect(200);
    expect(res.body.total).toBe(2);
    expect(res.body.items.map((p: { fullName: string }) => p.fullName)).toEqual(['Stu Keeper', 'Casey Skater']);
    expect(res.body.items[1].heightDisplay).toBe(`6'1"`);

    const goalies = await request(app.getHttpServer()).get('/players').query({ position: 'g' }).expect(200);
    expect(goalies.body.items.map((p: { lastName: string }) => p.lastName)).toEqual(['Blocker', 'Keeper']);
  });

  it('lista partidos por fecha descendente y filtra por estado', async () => {
    const res = await request(app.getHttpServer()).get('/games').query({ teamId: edm.id }).expect(200);
    expect(res.body.total).toBe(3);
    expect(res.body.items.map((g: { label: string }) => g.label)).toEqual([
      'EDM @ VAN - 2024-10-20',
      'EDM @ CGY - 2024-10-12',
      'CGY @ EDM - 2024-10-10',
    ]);
    const finals = await request(app.getHttpServer()).get('/games').query({ status: 'final' }).expect(200);
    expect(finals.body.items).toHaveLength(1);
    expect(finals.body.items[0].winnerTeamId).toBe(edm.id);
  });

  it('detalle de partido con goles y estadísticas', async () => {
    const res = await request(app.getHttpServer()).get(`/games/${opener.id}`).expect(200);
    expect(res.body.goals).toEqual([
      { id: expect.any(Number), period: 1, timeInPeriod: '10:00', team: 'EDM', scorer: 'Casey Skater', assists: [], goalType: 'power_play' },
    ]);
    const line = res.body.playerStats.find((s: { playerId: number }) => s.playerId === skater.id);
    expect(line).toMatchObject({ goals: 2, assists: 1, points: 3, timeOnIce: '20:00' });
  });

  it('clasificación: 2 puntos por victoria y 1 por derrota en prórroga', async () => {
    const res = await request(app.getHttpServer()).get('/games/standings').expect(200);
    expect(res.body.season).toBe('2024-25');
    expect(res.body.rows[0]).toMatchObject({ rank: 1, team: 'Edmonton Oilers', wins: 2, points: 4, goalDifferential: 3 });
    expect(res.body.rows[1]).toMatchObject({ rank: 2, team: 'Calgary Flames', losses: 1, overtimeLosses: 1, points: 1 });
    expect(res.body.rows[2]).toMatchObject({ rank: 3, team: 'Anaheim Ducks', points: 0 });
  });

  it('reconstruir estadísticas exige staff', async () => {
    const user = await registerUser(app, 'fan');
    await request(app.getHttpServer()).post('/players/stats/rebuild').send({ seasonId: season.id }).expect(401);
    await request(app.getHttpServer())
      .post('/players/stats/rebuild')
      .set(bearer(user))
      .send({ seasonId: season.id })
      .expect(403);
  });

  it('reconstruye estadísticas de temporada desde los partidos', async () => {
    const res = await request(app.getHttpServer())
      .post('/players/stats/rebuild')
      .set(bearer(admin))
      .send({ seasonId: season.id })
      .expect(200);
    expect(res.body).toEqual({ seasonId: season.id, games: 2, rows: 3 });

    const skaterStats = await request(app.getHttpServer()).get(`/players/${skater.id}/stats`).expect(200);
    expect(skaterStats.body).toHaveLength(1);
    expect(skaterStats.body[0]).toMatchObject({
      season: '2024-25',
      team: 'EDM',
      gamesPlayed: 2,
      goals: 2,
      assists: 2,
      points: 4,
      powerPlayGoals: 1,
      powerPlayPoints: 1,
      shotsOnGoal: 8,
      shootingPercentage: 25,
      averageTimeOnIce: '18:20',
    });

    const edmG = await request(app.getHttpServer()).get(`/players/${edmGoalie.id}/stats`).expect(200);
    expect(edmG.body[0]).toMatchObject({ wins: 2, losses: 0, saves: 54, shotsAgainst: 57, savePercentage: 0.947, goalsAgainstAverage: 1.44 });

    const cgyG = await request(app.getHttpServer()).get(`/players/${cgyGoalie.id}/stats`).expect(200);
    expect(cgyG.body[0]).toMatchObject({ wins: 0, losses: 1, overtimeLosses: 1, savePercentage: 0.86, goalsAgainstAverage: 2.89 });
  });

  it('traspaso: cierra la estancia actual y abre otra', async () => {
    await request(app.getHttpServer())
      .post(`/players/${skater.id}/team-history`)
      .set(bearer(admin))
      .send({ teamId: cgy.id, seasonId: season.id, startDate: '2024-12-01', jerseyNumber: 19 })
      .expect(201);

    const res = await request(app.getHttpServer()).get(`/players/${skater.id}`).expect(200);
    expect(res.body.currentTeam).toBe('Calgary Flames');
    expect(res.body.teamHistory).toEqual([
      expect.objectContaining({ team: 'Calgary Flames', startDate: '2024-12-01', endDate: null, jerseyNumber: 19, isCurrent: true }),
      expect.objectContaining({ team: 'Edmonton Oilers', startDate: '2024-10-04', endDate: '2024-12-01', isCurrent: false }),
    ]);

    await request(app.getHttpServer())
      .post(`/players/${skater.id}/team-history`)
      .set(bearer(admin))
      .send({ teamId: edm.id, seasonId: season.id, startDate: '2024-11-01' })
      .expect(400);
  });
});
