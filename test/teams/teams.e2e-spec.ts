// test/teams/teams.e2e-spec.ts
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { RosterPosition } from '../../src/fantasy/teams/roster-position.entity';
import { SeedService } from '../../src/seed/seed.service';
import { Season } from '../../src/teams/season.entity';
import { createPlayer, seedReference, teamByAbbr } from '../helpers/fixtures';
import { createTestApp } from '../helpers/app';

describe('Teams E2E', () => {
  let app: INestApplication;
  let ds: DataSource;

  beforeAll(async () => {
    ({ app, ds } = await createTestApp());
    await seedReference(app);
  });

  afterAll(async () => {
    await app.close();
  });

  it('populate_initial_data es idempotente', async () => {
    const again = await app.get(SeedService).populateInitialData();
    expect(again).toEqual({ conferences: 0, divisions: 0, seasons: 0, teams: 0, positions: 0, rosterPositions: 0 });
    const res = await request(app.getHttpServer()).get('/teams').expect(200);
    expect(res.body).toHaveLength(32);
  });

  it('posiciones de alineación por defecto: 9 titulares y 14 de banquillo', async () => {
    const rows = await ds.getRepository(RosterPosition).find({ order: { id: 'ASC' } });
    const caps = Object.fromEntries(rows.map((r) => [r.abbreviation, r.maxPlayers]));
    expect(caps).toEqual({ C: 2, LW: 2, RW: 2, D: 2, G: 1, BN: 14 });
    expect(rows.filter((r) => !r.isStarting).map((r) => r.abbreviation)).toEqual(['BN']);
  });

  it('lista conferencias con sus divisiones', async () => {
    const res = await request(app.getHttpServer()).get('/conferences').expect(200);
    expect(res.body.map((c: { abbreviation: string }) => c.abbreviation)).toEqual(['EC', 'WC']);
    expect(res.body[0].divisions.map((d: { abbreviation: string }) => d.abbreviation)).toEqual(['ATL', 'MET']);
  });

  it('ordena por ciudad y nombre y filtra por búsqueda', async () => {
    const all = await request(app.getHttpServer()).get('/teams').expect(200);
    expect(all.body[0].fullName).toBe('Anaheim Ducks');
    expect(all.body[0].conference.abbreviation).toBe('WC');

    const ny = await request(app.getHttpServer()).get('/teams').query({ q: 'new york' }).expect(200);
    expect(ny.body.map((t: { abbreviation: string }) => t.abbreviation)).toEqual(['NYI', 'NYR']);

    const bos = await request(app.getHttpServer()).get('/teams').query({ name: 'Bruins' }).expect(200);
    expect(bos.body).toHaveLength(1);
    expect(bos.body[0].division.name).toBe('Atlantic Division');
  });

  it('filtra por división', async () => {
    const divisions = await request(app.getHttpServer()).get('/conferences').expect(200);
    const atlantic = divisions.body[0].divisions[0];
    const res = await request(app.getHttpServer()).get('/teams').query({ divisionId: atlantic.id }).expect(200);
    expect(res.body).toHaveLength(8);
  });

  it('temporada actual y 404 para equipo inexistente', async () => {
    const current = await request(app.getHttpServer()).get('/seasons/current').expect(200);
    expect(current.body.name).toBe('2024-25');
    expect(current.body.startDate).toBe('2024-10-04');
    await request(app.getHttpServer()).get('/teams/9999').expect(404);
  });

  it('sólo una temporada puede ser la actual', async () => {
    const repo = ds.getRepository(Season);
    await repo.save(repo.create({ name: '2025-26', startDate: '2025-10-07', endDate: '2026-04-16', isCurrent: true }));
    const current = await repo.find({ where: { isCurrent: true } });
    expect(current.map((s) => s.name)).toEqual(['2025-26']);

    const old = await repo.findOneByOrFail({ name: '2024-25' });
    old.isCurrent = true;
    await repo.save(old);
    const res = await request(app.getHttpServer()).get('/seasons/current').expect(200);
    expect(res.body.name).toBe('2024-25');
  });

  it('roster actual del equipo', async () => {
    const tor = await teamByAbbr(ds, 'TOR');
    await createPlayer(ds, 'Alex', 'Zeta', 'C', 'TOR', { jerseyNumber: 91 });
    await createPlayer(ds, 'Ben', 'Alpha', 'G', 'TOR');
    const res = await request(app.getHttpServer()).get(`/teams/${tor.id}/roster`).expect(200);
    expect(res.body.map((r: { fullName: string }) => r.fullName)).toEqual(['Ben Alpha', 'Alex Zeta']);
    expect(res.body[1]).toMatchObject({ position: 'C', jerseyNumber: 91, season: '2024-25', since: '2024-10-04' });
  });
});
