import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp, setupSwagger } from './app.setup';
import { envFlag, envNumber } from './config/env.util';

export async function startServer(port: number = envNumber('PORT', 3000)): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  configureApp(app);
  const swaggerEnabled = envFlag('ENABLE_SWAGGER', true);
  if (swaggerEnabled) setupSwagger(app);
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`API listening on http://localhost:${port}`);
  if (swaggerEnabled) logger.log(`Swagger UI: http://localhost:${port}/docs`);
  logger.log(
    `Flags -> CORS:${envFlag('ENABLE_CORS', false)} HELMET:${envFlag('ENABLE_HELMET', false)} SCHEDULER:${envFlag('ENABLE_FANTASY_SCHEDULER', true)}`,
  );
}
