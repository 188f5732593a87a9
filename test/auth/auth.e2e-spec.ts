// test/auth/auth.e2e-spec.ts
import { ConflictException, INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AuthService } from '../../src/auth/auth.service';
import { bearer, createTestApp, TEST_PASSWORD } from '../helpers/app';

describe('Auth E2E', () => {
  let app: INestApplication;

  beforeAll(async () => {
    ({ app } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it('registra, loguea y devuelve el perfil', async () => {
    const server = app.getHttpServer();
    const reg = await request(server)
      .post('/auth/register')
      .send({ username: 'juan', email: 'Juan@Example.com', password: TEST_PASSWORD })
      .expect(201);
    expect(reg.body.access_token).toBeTruthy();
    expect(reg.body.payload).toEqual({ sub: expect.any(Number), username: 'juan', role: 'user' });

    const login = await request(server).post('/auth/login').send({ username: 'juan', password: TEST_PASSWORD }).expect(200);
    const me = await request(server).get('/auth/me').set(bearer(login.body.access_token)).expect(200);
    expect(me.body).toMatchObject({ username: 'juan', email: 'juan@example.com', isStaff: false, role: 'user', teams: [] });
  });

  it('rechaza credenciales inválidas y usuarios duplicados', async () => {
    const server = app.getHttpServer();
    await request(server).post('/auth/login').send({ username: 'juan', password: 'wrong-password' }).expect(401);
    await request(server).post('/auth/register').send({ username: 'juan', password: TEST_PASSWORD }).expect(400);
    const short = await request(server).post('/auth/register').send({ username: 'ana', password: 'short' }).expect(400);
    expect(short.body.code).toBe('BAD_REQUEST');
  });

  it('ignora staff en el registro salvo ALLOW_REGISTER_ADMIN=true', async () => {
    const res = await request(app.getHttpServer())
      .post('/auth/register')
      .send({ username: 'sneaky', password: TEST_PASSWORD, staff: true })
      .expect(201);
    expect(res.body.payload.role).toBe('user');
  });

  it('rota el refresh token y no lo acepta como access token', async () => {
    const server = app.getHttpServer();
    const login = await request(server).post('/auth/login').send({ username: 'juan', password: TEST_PASSWORD }).expect(200);
    const refreshToken: string = login.body.refresh_token;
    await request(server).get('/auth/me').set(bearer(refreshToken)).expect(401);
    const refreshed = await request(server).post('/auth/refresh').send({ refreshToken }).expect(200);
    expect(refreshed.body.payload.username).toBe('juan');
    // el anterior queda revocado tras la rotación
    await request(server).post('/auth/refresh').send({ refreshToken }).expect(401);
    await request(server).post('/auth/refresh').send({ refreshToken: 'not-a-token' }).expect(401);
  });

  it('cambio de contraseña invalida el refresh anterior', async () => {
    const server = app.getHttpServer();
    const login = await request(server).post('/auth/login').send({ username: 'juan', password: TEST_PASSWORD }).expect(200);
    await request(server)
      .put('/auth/me')
      .set(bearer(login.body.access_token))
      .send({ password: 'another-password' })
      .expect(200);
    await request(server).post('/auth/refresh').send({ refreshToken: login.body.refresh_token }).expect(401);
    await request(server).post('/auth/login').send({ username: 'juan', password: 'another-password' }).expect(200);
  });

  it('createsuperuser crea staff y falla si el usuario existe', async () => {
    const auth = app.get(AuthService);
    const su = await auth.createSuperuser({ username: 'root', email: 'Root@Example.com', password: TEST_PASSWORD });
    expect(su).toMatchObject({ username: 'root', email: 'root@example.com', isStaff: true, isSuperuser: true, role: 'admin' });
    await expect(auth.createSuperuser({ username: 'root', password: TEST_PASSWORD })).rejects.toBeInstanceOf(ConflictException);
  });

  it('rutas públicas: landing y health', async () => {
    const home = await request(app.getHttpServer()).get('/').expect(200);
    expect(home.headers['content-type']).toContain('text/html');
    expect(home.text).toContain('<title>Fantasy Hockey</title>');
    const health = await request(app.getHttpServer()).get('/health').expect(200);
    expect(health.body).toMatchObject({ status: 'ok', database: 'up' });
  });
});
