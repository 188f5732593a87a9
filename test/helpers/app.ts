// test/helpers/app.ts
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { configureApp } from '../../src/app.setup';
import { AuthService } from '../../src/auth/auth.service';
import { TestAppModule } from '../test-app.module';

export const TEST_PASSWORD = 'test-password';

export interface TestContext {
  app: INestApplication;
  ds: DataSource;
}

export async function createTestApp(): Promise<TestContext> {
  const mod = await Test.createTestingModule({ imports: [TestAppModule] }).compile();
  const app = mod.createNestApplication();
  configureApp(app);
  await app.init();
  return { app, ds: app.get(DataSource) };
}

/** Registra un usuario normal y devuelve su access token. */
export async function registerUser(app: INestApplication, username: string): Promise<string> {
  const res = await request(app.getHttpServer())
    .post('/auth/register')
    .send({ username, email: `${username}@example.com`, password: TEST_PASSWORD })
    .expect(201);
  return res.body.access_token;
}

/** Superusuario (staff) vía el mismo servicio que usa `createsuperuser`. */
export async function staffToken(app: INestApplication, username = 'admin'): Promise<string> {
  await app.get(AuthService).createSuperuser({ username, email: `${username}@example.com`, password: TEST_PASSWORD });
  const res = await request(app.getHttpServer())
    .post('/auth/login')
    .send({ username, password: TEST_PASSWORD })
    .expect(200);
  return res.body.access_token;
}

export const bearer = (token: string) => ({ Authorization: `Bearer ${token}` });
