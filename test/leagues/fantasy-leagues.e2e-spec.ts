// test/leagues/fantasy-leagues.e2e-spec.ts
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { RosterPosition } from '../../src/fantasy/teams/roster-position.entity';
import { Player } from '../../src/players/player.entity';
import { bearer, createTestApp, registerUser } from '../helpers/app';
import { createPlayer, seedReference } from '../helpers/fixtures';

describe('Fantasy: ligas, rosters y traspasos (E2E)', () => {
  let app: INestApplication;
  let ds: DataSource;
  const tokens: Record<string, string> = {};
  const teamIds: Record<string, number> = {};
  let leagueId: number;
  let inviteCode: string;
  let pos: Record<string, number>;
  let cam: Player;
  let cole: Player;
  let chris: Player;
  let lee: Player;
  let gus: Player;

  const server = () => app.getHttpServer();
  const addToRoster = (owner: string, body: { playerId: number; positionId?: number }) =>
    request(server()).post(`/fantasy/teams/${teamIds[owner]}/roster`).set(bearer(tokens[owner])).send(body);

  beforeAll(async () => {
    ({ app, ds } = await createTestApp());
    await seedReference(app);
    for (const name of ['ana', 'beto', 'carla', 'dani', 'eva']) tokens[name] = await registerUser(app, name);

    const positions = await ds.getRepository(RosterPosition).find();
    pos = Object.fromEntries(positions.map((p) => [p.abbreviation, p.id]));

    cam = await createPlayer(ds, 'Cam', 'Center', 'C', 'EDM');
    cole = await createPlayer(ds, 'Cole', 'Centro', 'C');
    chris = await createPlayer(ds, 'Chris', 'Third', 'C');
    lee = await createPlayer(ds, 'Lee', 'Wing', 'LW');
    gus = await createPlayer(ds, 'Gus', 'Goalie', 'G');
  });

  afterAll(async () => {
    await app.close();
  });

  describe('ligas', () => {
    it('crea una liga privada en la temporada actual con su código', async () => {
      const res = await request(server())
        .post('/fantasy/leagues')
        .set(bearer(tokens.ana))
        .send({ name: 'Liga Test', maxTeams: 4 })
        .expect(201);
      expect(res.body).toMatchObject({
        name: 'Liga Test',
        season: '2024-25',
        maxTeams: 4,
        rosterSize: 23,
        startingLineupSize: 9,
        scoringSystem: 'points',
        isPublic: false,
        teamCount: 0,
        isFull: false,
      });
      expect(res.body.inviteCode).toMatch(/^[A-HJ-NP-Z2-9]{6}$/);
      leagueId = res.body.id;
      inviteCode = res.body.inviteCode;
    });

    it('valida startingLineupSize frente a rosterSize', async () => {
      const res = await request(server())
        .post('/fantasy/leagues')
        .set(bearer(tokens.ana))
        .send({ name: 'Liga Rara', rosterSize: 5, startingLineupSize: 6 })
        .expect(400);
      expect(res.body.message).toBe('startingLineupSize no puede superar rosterSize');
    });

    it('unirse exige el código en ligas privadas', async () => {
      await request(server())
        .post(`/fantasy/leagues/${leagueId}/join`)
        .set(bearer(tokens.beto))
        .send({ teamName: 'Beto Blades' })
        .expect(400);

      const names: Record<string, string> = { ana: 'Ana Stars', beto: 'Beto Blades', carla: 'Carla Crew', dani: 'Dani Dogs' };
      for (const [owner, teamName] of Object.entries(names)) {
        const res = await request(server())
          .post(`/fantasy/leagues/${leagueId}/join`)
          .set(bearer(tokens[owner]))
          .send({ teamName, inviteCode: inviteCode.toLowerCase() })
          .expect(201);
        expect(res.body).toEqual({ id: expect.any(Number), name: teamName, leagueId });
        teamIds[owner] = res.body.id;
      }
    });

    it('rechaza un segundo equipo del mismo usuario y la liga completa', async () => {
      await request(server())
        .post(`/fantasy/leagues/${leagueId}/join`)
        .set(bearer(tokens.beto))
        .send({ teamName: 'Otro', inviteCode })
        .expect(409);
      const full = await request(server())
        .post(`/fantasy/leagues/${leagueId}/join`)
        .set(bearer(tokens.eva))
        .send({ teamName: 'Eva Eagles', inviteCode })
        .expect(400);
      expect(full.body.message).toBe('La liga está completa');
    });

    it('detalle: el código sólo lo ve el comisionado', async () => {
      const asMember = await request(server()).get(`/fantasy/leagues/${leagueId}`).set(bearer(tokens.beto)).expect(200);
      expect(asMember.body.inviteCode).toBeUndefined();
      expect(asMember.body.teamCount).toBe(4);
      expect(asMember.body.isFull).toBe(true);
      expect(asMember.body.scoring).toMatchObject({ leagueId });

      const asOwner = await request(server()).get(`/fantasy/leagues/${leagueId}`).set(bearer(tokens.ana)).expect(200);
      expect(asOwner.body.inviteCode).toBe(inviteCode);
    });

    it('listados: públicas y propias', async () => {
      const pub = await request(server()).get('/fantasy/leagues').set(bearer(tokens.eva)).expect(200);
      expect(pub.body).toEqual([]);
      const mine = await request(server()).get('/fantasy/leagues/mine').set(bearer(tokens.carla)).expect(200);
      expect(mine.body.map((l: { id: number }) => l.id)).toEqual([leagueId]);
      const none = await request(server()).get('/fantasy/leagues/mine').set(bearer(tokens.eva)).expect(200);
      expect(none.body).toEqual([]);
    });

    it('sólo el comisionado edita la liga', async () => {
      await request(server()).patch(`/fantasy/leagues/${leagueId}`).set(bearer(tokens.beto)).send({ isPublic: true }).expect(403);
      const res = await request(server())
        .patch(`/fantasy/leagues/${leagueId}`)
        .set(bearer(tokens.ana))
        .send({ description: 'Liga de prueba' })
        .expect(200);
      expect(res.body.description).toBe('Liga de prueba');
      const shrink = await request(server()).patch(`/fantasy/leagues/${leagueId}`).set(bearer(tokens.ana)).send({ maxTeams: 3 });
      expect(shrink.status).toBe(400);
    });

    it('clasificación inicial ordenada por nombre con cero puntos', async () => {
      const res = await request(server()).get(`/fantasy/leagues/${leagueId}/standings`).set(bearer(tokens.dani)).expect(200);
      expect(res.body.map((r: { rank: number; name: string }) => [r.rank, r.name])).toEqual([
        [1, 'Ana Stars'],
        [2, 'Beto Blades'],
        [3, 'Carla Crew'],
        [4, 'Dani Dogs'],
      ]);
    });
  });

  describe('rosters', () => {
    it('coloca en la primera posición titular libre y después en banquillo', async () => {
      const first = await addToRoster('ana', { playerId: cam.id }).expect(201);
      expect(first.body).toMatchObject({ position: 'C', isActive: true, player: { id: cam.id, fullName: 'Cam Center', position: 'C' } });
      await addToRoster('ana', { playerId: cole.id }).expect(201);
      const third = await addToRoster('ana', { playerId: chris.id }).expect(201);
      expect(third.body).toMatchObject({ position: 'BN', isActive: false });
    });

    it('valida elegibilidad y unicidad por liga', async () => {
      const wrong = await addToRoster('ana', { playerId: gus.id, positionId: pos.C }).expect(400);
      expect(wrong.body.message).toBe('G no puede ocupar C');
      await addToRoster('beto', { playerId: cam.id }).expect(409);
      await request(server())
        .post(`/fantasy/teams/${teamIds.ana}/roster`)
        .set(bearer(tokens.beto))
        .send({ playerId: gus.id })
        .expect(403);
    });

    it('mueve entre titulares y banquillo respetando el cupo', async () => {
      const full = await request(server())
        .patch(`/fantasy/teams/${teamIds.ana}/roster/${chris.id}`)
        .set(bearer(tokens.ana))
        .send({ positionId: pos.C })
        .expect(400);
      expect(full.body.message).toBe('C está completa');

      const benched = await request(server())
        .patch(`/fantasy/teams/${teamIds.ana}/roster/${cam.id}`)
        .set(bearer(tokens.ana))
        .send({ positionId: pos.BN })
        .expect(200);
      expect(benched.body).toMatchObject({ position: 'BN', isActive: false });

      await request(server())
        .patch(`/fantasy/teams/${teamIds.ana}/roster/${chris.id}`)
        .set(bearer(tokens.ana))
        .send({ positionId: pos.C })
        .expect(200);

      const roster = await request(server()).get(`/fantasy/teams/${teamIds.ana}/roster`).set(bearer(tokens.ana)).expect(200);
      expect(roster.body.map((s: { position: string; player: { fullName: string } }) => [s.position, s.player.fullName])).toEqual([
        ['C', 'Cole Centro'],
        ['C', 'Chris Third'],
        ['BN', 'Cam Center'],
      ]);
    });

    it('agentes libres excluye jugadores con equipo en la liga', async () => {
      const centers = await request(server())
        .get(`/fantasy/leagues/${leagueId}/free-agents`)
        .query({ position: 'c' })
        .set(bearer(tokens.beto))
        .expect(200);
      expect(centers.body).toMatchObject({ items: [], total: 0, page: 1, pageSize: 25 });

      const search = await request(server())
        .get(`/fantasy/leagues/${leagueId}/free-agents`)
        .query({ search: 'gus' })
        .set(bearer(tokens.beto))
        .expect(200);
      expect(search.body.items.map((p: { fullName: string }) => p.fullName)).toEqual(['Gus Goalie']);
    });
  });

  describe('traspasos', () => {
    const playersOf = (body: { players: { playerId: number; fromTeamId: number; toTeamId: number }[] }) =>
      [...body.players].sort((a, b) => a.playerId - b.playerId).map((p) => [p.playerId, p.fromTeamId, p.toTeamId]);

    beforeAll(async () => {
      await addToRoster('beto', { playerId: lee.id }).expect(201);
      await addToRoster('beto', { playerId: gus.id }).expect(201);
    });

    it('propone y acepta: los jugadores cambian de roster al banquillo', async () => {
      const proposed = await request(server())
        .post('/fantasy/trades')
        .set(bearer(tokens.ana))
        .send({ fromTeamId: teamIds.ana, toTeamId: teamIds.beto, offeredPlayerIds: [chris.id], requestedPlayerIds: [lee.id] })
        .expect(201);
      expect(proposed.body.status).toBe('pending');
      expect(playersOf(proposed.body)).toEqual([
        [chris.id, teamIds.ana, teamIds.beto],
        [lee.id, teamIds.beto, teamIds.ana],
      ]);

      // sólo el receptor acepta
      await request(server()).post(`/fantasy/trades/${proposed.body.id}/accept`).set(bearer(tokens.ana)).expect(403);
      const accepted = await request(server())
        .post(`/fantasy/trades/${proposed.body.id}/accept`)
        .set(bearer(tokens.beto))
        .expect(200);
      expect(accepted.body.status).toBe('completed');
      expect(accepted.body.completionDate).not.toBeNull();

      const anaRoster = await request(server()).get(`/fantasy/teams/${teamIds.ana}/roster`).set(bearer(tokens.ana)).expect(200);
      const lees = anaRoster.body.filter((s: { player: { id: number } }) => s.player.id === lee.id);
      expect(lees).toHaveLength(1);
      expect(lees[0]).toMatchObject({ position: 'BN', isActive: false });

      const again = await request(server()).post(`/fantasy/trades/${proposed.body.id}/accept`).set(bearer(tokens.beto)).expect(409);
      expect(again.body.message).toBe('El traspaso ya está completed');
    });

    it('rechaza jugadores que no están en el roster', async () => {
      const res = await request(server())
        .post('/fantasy/trades')
        .set(bearer(tokens.ana))
        .send({ fromTeamId: teamIds.ana, toTeamId: teamIds.beto, offeredPlayerIds: [gus.id], requestedPlayerIds: [] })
        .expect(400);
      expect(res.body.message).toBe(`Jugadores fuera del roster del equipo ${teamIds.ana}: ${gus.id}`);
    });

    it('rechazo por el receptor y cancelación por quien propone', async () => {
      const propose = () =>
        request(server())
          .post('/fantasy/trades')
          .set(bearer(tokens.ana))
          .send({ fromTeamId: teamIds.ana, toTeamId: teamIds.beto, offeredPlayerIds: [cole.id], requestedPlayerIds: [] })
          .expect(201);

      const t1 = await propose();
      await request(server()).post(`/fantasy/trades/${t1.body.id}/reject`).set(bearer(tokens.ana)).expect(403);
      const rejected = await request(server()).post(`/fantasy/trades/${t1.body.id}/reject`).set(bearer(tokens.beto)).expect(200);
      expect(rejected.body.status).toBe('rejected');

      const t2 = await propose();
      const cancelled = await request(server()).post(`/fantasy/trades/${t2.body.id}/cancel`).set(bearer(tokens.ana)).expect(200);
      expect(cancelled.body.status).toBe('cancelled');

      const pending = await request(server())
        .get(`/fantasy/teams/${teamIds.ana}/trades`)
        .query({ status: 'pending' })
        .set(bearer(tokens.ana))
        .expect(200);
      expect(pending.body).toEqual([]);
      await request(server()).get(`/fantasy/teams/${teamIds.ana}/trades`).set(bearer(tokens.carla)).expect(403);
    });

    it('soltar un jugador cancela los traspasos pendientes que lo incluyen', async () => {
      const proposed = await request(server())
        .post('/fantasy/trades')
        .set(bearer(tokens.ana))
        .send({ fromTeamId: teamIds.ana, toTeamId: teamIds.beto, offeredPlayerIds: [cole.id], requestedPlayerIds: [gus.id] })
        .expect(201);

      const dropped = await request(server())
        .delete(`/fantasy/teams/${teamIds.beto}/roster/${gus.id}`)
        .set(bearer(tokens.beto))
        .expect(200);
      expect(dropped.body).toEqual({ dropped: gus.id, cancelledTrades: [proposed.body.id] });

      const trade = await request(server()).get(`/fantasy/trades/${proposed.body.id}`).set(bearer(tokens.ana)).expect(200);
      expect(trade.body.status).toBe('cancelled');
    });
  });

  describe('límites de roster', () => {
    let shortLeague: number;
    let shortCode: string;
    const short: Record<string, number> = {};
    const players: Record<string, Player> = {};

    const addShort = (owner: string, playerId: number) =>
      request(server()).post(`/fantasy/teams/${short[owner]}/roster`).set(bearer(tokens[owner])).send({ playerId });
    const proposeShort = (offered: number[], requested: number[]) =>
      request(server())
        .post('/fantasy/trades')
        .set(bearer(tokens.dani))
        .send({ fromTeamId: short.dani, toTeamId: short.carla, offeredPlayerIds: offered, requestedPlayerIds: requested })
        .expect(201);

    beforeAll(async () => {
      const created = await request(server())
        .post('/fantasy/leagues')
        .set(bearer(tokens.carla))
        .send({ name: 'Liga Corta', maxTeams: 4, rosterSize: 3, startingLineupSize: 1 })
        .expect(201);
      shortLeague = created.body.id;
      shortCode = created.body.inviteCode;
      for (const owner of ['carla', 'dani']) {
        const res = await request(server())
          .post(`/fantasy/leagues/${shortLeague}/join`)
          .set(bearer(tokens[owner]))
          .send({ teamName: `${owner} corto`, inviteCode: shortCode })
          .expect(201);
        short[owner] = res.body.id;
      }
      for (const name of ['Alba', 'Bruno', 'Ciro', 'Dario', 'Elio', 'Fede']) {
        players[name] = await createPlayer(ds, name, 'Corto', 'C');
      }
    });

    it('rechaza altas con el roster completo o con jugadores inactivos', async () => {
      const first = await addShort('carla', players.Alba.id).expect(201);
      expect(first.body).toMatchObject({ position: 'C', isActive: true });
      const second = await addShort('carla', players.Bruno.id).expect(201);
      expect(second.body).toMatchObject({ position: 'BN', isActive: false });
      await addShort('carla', players.Ciro.id).expect(201);

      const full = await addShort('carla', players.Dario.id).expect(400);
      expect(full.body.message).toBe('Roster completo');

      const retired = await createPlayer(ds, 'Ivo', 'Retirado', 'C', undefined, { isActive: false });
      const inactive = await addShort('dani', retired.id).expect(400);
      expect(inactive.body.message).toBe('Jugador inactivo');

      const ok = await addShort('dani', players.Dario.id).expect(201);
      expect(ok.body).toMatchObject({ position: 'C', isActive: true });
    });

    it('aceptar un traspaso que desborda el roster devuelve 400', async () => {
      const trade = await proposeShort([players.Dario.id], []);
      const res = await request(server()).post(`/fantasy/trades/${trade.body.id}/accept`).set(bearer(tokens.carla)).expect(400);
      expect(res.body.message).toBe(`El roster del equipo ${short.carla} superaría 3 jugadores`);
      await request(server()).post(`/fantasy/trades/${trade.body.id}/cancel`).set(bearer(tokens.dani)).expect(200);
    });

    it('aceptar un traspaso que desborda el banquillo devuelve 400', async () => {
      const trade = await proposeShort([players.Dario.id], [players.Bruno.id, players.Ciro.id]);
      const positions = ds.getRepository(RosterPosition);
      await positions.update({ abbreviation: 'BN' }, { maxPlayers: 1 });
      try {
        const res = await request(server()).post(`/fantasy/trades/${trade.body.id}/accept`).set(bearer(tokens.carla)).expect(400);
        expect(res.body.message).toBe(`El banquillo del equipo ${short.dani} superaría 1 jugadores`);
      } finally {
        await positions.update({ abbreviation: 'BN' }, { maxPlayers: 14 });
      }
      const done = await request(server()).post(`/fantasy/trades/${trade.body.id}/accept`).set(bearer(tokens.carla)).expect(200);
      expect(done.body.status).toBe('completed');
    });

    it('un hueco sin jugador no ocupa cupo y se puede quitar', async () => {
      // carla: Alba en C y Dario en BN
      await ds.getRepository(Player).delete(players.Alba.id);
      await addShort('carla', players.Elio.id).expect(201);
      await addShort('carla', players.Fede.id).expect(201);

      const roster = await request(server()).get(`/fantasy/teams/${short.carla}/roster`).set(bearer(tokens.carla)).expect(200);
      expect(roster.body).toHaveLength(4);
      const empty = roster.body.find((s: { player: unknown }) => s.player === null);
      expect(empty).toMatchObject({ position: 'C' });

      const res = await request(server())
        .delete(`/fantasy/teams/${short.carla}/roster/slots/${empty.slotId}`)
        .set(bearer(tokens.carla))
        .expect(200);
      expect(res.body).toEqual({ dropped: null, cancelledTrades: [] });

      const after = await request(server()).get(`/fantasy/teams/${short.carla}/roster`).set(bearer(tokens.carla)).expect(200);
      expect(after.body.map((s: { player: { id: number } }) => s.player.id).sort((a: number, b: number) => a - b)).toEqual(
        [players.Dario.id, players.Elio.id, players.Fede.id].sort((a, b) => a - b),
      );
    });

    it('no se puede entrar en una liga inactiva', async () => {
      await request(server())
        .patch(`/fantasy/leagues/${shortLeague}`)
        .set(bearer(tokens.carla))
        .send({ isActive: false })
        .expect(200);
      const res = await request(server())
        .post(`/fantasy/leagues/${shortLeague}/join`)
        .set(bearer(tokens.eva))
        .send({ teamName: 'Eva Corto', inviteCode: shortCode })
        .expect(400);
      expect(res.body.message).toBe('La liga no está activa');
    });
  });
});
