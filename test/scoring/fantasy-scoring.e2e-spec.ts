// test/scoring/fantasy-scoring.e2e-spec.ts
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { ScoringService } from '../../src/fantasy/scoring/scoring.service';
import { RosterPosition } from '../../src/fantasy/teams/roster-position.entity';
import { bearer, createTestApp, registerUser } from '../helpers/app';
import { addGoal, addLine, createGame, createPlayer, seedReference, teamByAbbr } from '../helpers/fixtures';

describe('Fantasy: calendario y puntuación (E2E)', () => {
  let app: INestApplication;
  let ds: DataSource;
  let ana: string;
  let beto: string;
  let leagueId: number;
  let anaTeam: number;
  let betoTeam: number;
  let week1: number;
  let week3: number;

  const server = () => app.getHttpServer();
  const byTeam = (rows: Array<{ teamId: number; points: number }>) =>
    [...rows].sort((a, b) => a.teamId - b.teamId).map((r) => [r.teamId, r.points]);

  beforeAll(async () => {
    ({ app, ds } = await createTestApp());
    await seedReference(app);
    ana = await registerUser(app, 'ana');
    beto = await registerUser(app, 'beto');

    const league = await request(server())
      .post('/fantasy/leagues')
      .set(bearer(ana))
      .send({ name: 'Liga H2H', maxTeams: 4, scoringSystem: 'head_to_head', isPublic: true })
      .expect(201);
    leagueId = league.body.id;
    anaTeam = (await request(server()).post(`/fantasy/leagues/${leagueId}/join`).set(bearer(ana)).send({ teamName: 'Ana Stars' }).expect(201)).body.id;
    betoTeam = (await request(server()).post(`/fantasy/leagues/${leagueId}/join`).set(bearer(beto)).send({ teamName: 'Beto Blades' }).expect(201)).body.id;

    const sam = await createPlayer(ds, 'Sam', 'Shooter', 'C', 'EDM');
    const ben = await createPlayer(ds, 'Ben', 'Bench', 'C', 'EDM');
    const gary = await createPlayer(ds, 'Gary', 'Glove', 'G', 'CGY');
    const bench = await ds.getRepository(RosterPosition).findOneOrFail({ where: { abbreviation: 'BN' } });

    await request(server()).post(`/fantasy/teams/${anaTeam}/roster`).set(bearer(ana)).send({ playerId: sam.id }).expect(201);
    await request(server()).post(`/fantasy/teams/${anaTeam}/roster`).set(bearer(ana)).send({ playerId: ben.id, positionId: bench.id }).expect(201);
    await request(server()).post(`/fantasy/teams/${betoTeam}/roster`).set(bearer(beto)).send({ playerId: gary.id }).expect(201);

    // semana 1: EDM 4 - 2 CGY
    const edm = await teamByAbbr(ds, 'EDM');
    const cgy = await teamByAbbr(ds, 'CGY');
    const game = await createGame(ds, 'EDM', 'CGY', '2024-10-08T23:00:00Z', { homeScore: 4, awayScore: 2 });
    await addLine(ds, game, sam, edm.id, { goals: 2, assists: 1, plusMinus: 2, penaltyMinutes: 2, shotsOnGoal: 5, hits: 3, blockedShots: 1 });
    await addLine(ds, game, ben, edm.id, { goals: 1, shotsOnGoal: 1 });
    await addLine(ds, game, gary, cgy.id, { starter: true, saves: 30, goalsAgainst: 4, shotsAgainst: 34 });
    await addGoal(ds, game, { teamId: edm.id, scorerId: sam.id, goalType: 'power_play' });
    // semana 2: CGY 1 - 3 EDM
    const later = await createGame(ds, 'CGY', 'EDM', '2024-10-12T02:00:00Z', { homeScore: 1, awayScore: 3 });
    await addLine(ds, later, sam, edm.id, { goals: 3 });
  });

  afterAll(async () => {
    await app.close();
  });

  it('genera semanas de 7 días con playoffs al final y emparejamientos', async () => {
    await request(server()).post(`/fantasy/leagues/${leagueId}/schedule`).set(bearer(beto)).send({}).expect(403);
    const res = await request(server())
      .post(`/fantasy/leagues/${leagueId}/schedule`)
      .set(bearer(ana))
      .send({ playoffWeeks: 2 })
      .expect(201);
    expect(res.body).toEqual({ weeks: 29, matchups: 27 });
    await request(server()).post(`/fantasy/leagues/${leagueId}/schedule`).set(bearer(ana)).send({}).expect(409);

    const weeks = await request(server()).get(`/fantasy/leagues/${leagueId}/weeks`).set(bearer(beto)).expect(200);
    expect(weeks.body).toHaveLength(29);
    expect(weeks.body[0]).toMatchObject({ weekNumber: 1, startDate: '2024-10-04', endDate: '2024-10-10', isPlayoffs: false });
    expect(weeks.body[27]).toMatchObject({ weekNumber: 28, startDate: '2025-04-11', isPlayoffs: true });
    expect(weeks.body[28]).toMatchObject({ weekNumber: 29, startDate: '2025-04-18', endDate: '2025-04-18', isPlayoffs: true });
    week1 = weeks.body[0].id;
    week3 = weeks.body[2].id;
  });

  it('calcula puntos de la semana: sólo titulares suman al equipo', async () => {
    await request(server()).post(`/fantasy/weeks/${week1}/compute`).set(bearer(beto)).expect(403);
    const res = await request(server()).post(`/fantasy/weeks/${week1}/compute`).set(bearer(ana)).expect(200);
    expect(res.body.weekId).toBe(week1);
    expect(res.body.players).toBe(3);
    expect(byTeam(res.body.teams)).toEqual([
      [anaTeam, 24.8],
      [betoTeam, 13],
    ]);

    const stats = await request(server()).get(`/fantasy/weeks/${week1}/player-stats`).set(bearer(beto)).expect(200);
    expect(stats.body.map((r: { player: string; totalFantasyPoints: number }) => [r.player, r.totalFantasyPoints])).toEqual([
      ['Sam Shooter', 24.8],
      ['Gary Glove', 13],
      ['Ben Bench', 6.4],
    ]);
  });

  it('recalcular es idempotente', async () => {
    const again = await request(server()).post(`/fantasy/weeks/${week1}/compute`).set(bearer(ana)).expect(200);
    expect(byTeam(again.body.teams)).toEqual([
      [anaTeam, 24.8],
      [betoTeam, 13],
    ]);
    const team = await request(server()).get(`/fantasy/teams/${anaTeam}`).set(bearer(ana)).expect(200);
    expect(team.body.totalPoints).toBe(24.8);
  });

  it('cerrar la semana fija el enfrentamiento y el récord', async () => {
    await request(server()).post(`/fantasy/weeks/${week1}/complete`).set(bearer(ana)).expect(200);
    const detail = await request(server()).get(`/fantasy/weeks/${week1}`).set(bearer(beto)).expect(200);
    expect(detail.body.isComplete).toBe(true);
    expect(detail.body.matchups).toEqual([
      {
        id: expect.any(Number),
        team1: { id: anaTeam, name: 'Ana Stars', score: 24.8 },
        team2: { id: betoTeam, name: 'Beto Blades', score: 13 },
        isComplete: true,
        winnerTeamId: anaTeam,
      },
    ]);
    expect(detail.body.teamPoints).toEqual([
      { teamId: anaTeam, name: 'Ana Stars', points: 24.8 },
      { teamId: betoTeam, name: 'Beto Blades', points: 13 },
    ]);

    const standings = await request(server()).get(`/fantasy/leagues/${leagueId}/standings`).set(bearer(beto)).expect(200);
    expect(standings.body.map((r: { name: string; wins: number; losses: number; totalPoints: number }) => [r.name, r.wins, r.losses, r.totalPoints])).toEqual([
      ['Ana Stars', 1, 0, 24.8],
      ['Beto Blades', 0, 1, 13],
    ]);
  });

  it('processDueWeeks cierra semanas pasadas y recalcula la semana en curso', async () => {
    const result = await app.get(ScoringService).processDueWeeks('2024-10-20');
    expect(result).toEqual({ leagues: 1, computed: 1, completed: 1 });

    // semana 2: 18 puntos de Sam contra 0; la semana 3 sólo se recalcula
    const standings = await request(server()).get(`/fantasy/leagues/${leagueId}/standings`).set(bearer(beto)).expect(200);
    expect(standings.body.map((r: { name: string; wins: number; losses: number; totalPoints: number }) => [r.name, r.wins, r.losses, r.totalPoints])).toEqual([
      ['Ana Stars', 2, 0, 42.8],
      ['Beto Blades', 0, 2, 13],
    ]);
  });

  it('empate a puntos: ambos equipos suman un empate', async () => {
    // semana 3 sin partidos: 0 - 0
    await request(server()).post(`/fantasy/weeks/${week3}/complete`).set(bearer(ana)).expect(200);
    const detail = await request(server()).get(`/fantasy/weeks/${week3}`).set(bearer(beto)).expect(200);
    expect(detail.body.matchups).toEqual([
      {
        id: expect.any(Number),
        team1: { id: anaTeam, name: 'Ana Stars', score: 0 },
        team2: { id: betoTeam, name: 'Beto Blades', score: 0 },
        isComplete: true,
        winnerTeamId: null,
      },
    ]);

    const standings = await request(server()).get(`/fantasy/leagues/${leagueId}/standings`).set(bearer(beto)).expect(200);
    expect(
      standings.body.map((r: { name: string; wins: number; losses: number; ties: number; winPercentage: number }) => [
        r.name,
        r.wins,
        r.losses,
        r.ties,
        r.winPercentage,
      ]),
    ).toEqual([
      ['Ana Stars', 2, 0, 1, 0.833],
      ['Beto Blades', 0, 2, 1, 0.167],
    ]);
  });

  it('ligas por puntos generan semanas sin emparejamientos', async () => {
    const league = await request(server()).post('/fantasy/leagues').set(bearer(ana)).send({ name: 'Liga Puntos' }).expect(201);
    const res = await request(server()).post(`/fantasy/leagues/${league.body.id}/schedule`).set(bearer(ana)).send({}).expect(201);
    expect(res.body).toEqual({ weeks: 29, matchups: 0 });
  });
});
