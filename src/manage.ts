import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { AuthService } from './auth/auth.service';
import { ManageCommand, parseManageArgs, USAGE, UsageError } from './cli/manage-args';
import { ManageModule } from './cli/manage.module';
import { migrationFileName, renderMigration } from './cli/migration-template';
import { loadEnv } from './config/load-env';
import { SeedService } from './seed/seed.service';
import { startServer } from './server';

const logger = new Logger('Manage');

async function migrate(): Promise<void> {
  const { AppDataSource } = await import('./database/data-source');
  await AppDataSource.initialize();
  try {
    const applied = await AppDataSource.runMigrations({ transaction: 'each' });
    if (!applied.length) logger.log('No migrations to apply.');
    for (const m of applied) logger.log(`Applying ${m.name}... OK`);
  } finally {
    await AppDataSource.destroy();
  }
}

async function makeMigrations(name: string): Promise<void> {
  const { AppDataSource } = await import('./database/data-source');
  await AppDataSource.initialize();
  try {
    const sql = await AppDataSource.driver.createSchemaBuilder().log();
    if (!sql.upQueries.length) {
      logger.log('No changes detected');
      return;
    }
    const timestamp = Date.now();
    const dir = join(__dirname, 'migrations');
    mkdirSync(dir, { recursive: true });
    const file = join(dir, migrationFileName(name, timestamp));
    writeFileSync(file, renderMigration(name, timestamp, sql.upQueries, sql.downQueries));
    logger.log(`Migration ${file} generated (${sql.upQueries.length} statements)`);
  } finally {
    await AppDataSource.destroy();
  }
}

async function withContext(run: (ctx: INestApplicationContext) => Promise<void>): Promise<void> {
  const ctx = await NestFactory.createApplicationContext(ManageModule, { logger: ['log', 'warn', 'error'] });
  try {
    await run(ctx);
  } finally {
    await ctx.close();
  }
}

async function run(cmd: ManageCommand): Promise<void> {
  switch (cmd.name) {
    case 'migrate':
      return migrate();
    case 'makemigrations':
      return makeMigrations(cmd.migrationName);
    case 'populate_initial_data':
      return withContext(async (ctx) => {
        const summary = await ctx.get(SeedService).populateInitialData();
        logger.log(`Seed: ${JSON.stringify(summary)}`);
      });
    case 'createsuperuser':
      return withContext(async (ctx) => {
        const user = await ctx.get(AuthService).createSuperuser(cmd);
        logger.log(`Superuser created successfully: ${user.username}`);
      });
    case 'runserver':
      return startServer(cmd.port);
  }
}

async function main(): Promise<void> {
  loadEnv();
  let cmd: ManageCommand;
  try {
    cmd = parseManageArgs(process.argv.slice(2));
  } catch (e) {
    if (e instanceof UsageError) {
      logger.error(e.message);
      process.stderr.write(`${USAGE}\n`);
      process.exitCode = 2;
      return;
    }
    throw e;
  }
  await run(cmd);
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err), err instanceof Error ? err.stack : undefined);
  process.exit(1);
});
