import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { GlobalHttpExceptionFilter } from './common/http-exception.filter';
import { envFlag } from './config/env.util';

/** Pipes, filtros y middlewares comunes a servidor y e2e. */
export function configureApp(app: INestApplication): void {
  // Seguridad base (opt-in por ENV para no romper flujos locales)
  if (envFlag('ENABLE_CORS', false)) {
    const corsOrigin = process.env.CORS_ORIGIN || '*';
    app.enableCors({ origin: corsOrigin === '*' ? true : corsOrigin.split(','), credentials: true });
  }
  if (envFlag('ENABLE_HELMET', false)) {
    app.use(helmet());
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new GlobalHttpExceptionFilter());
}

export function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Fantasy Hockey API')
    .setDescription('Equipos, jugadores, partidos y ligas fantasy. Usa Authorize con Bearer JWT (access token).')
    .setVersion('1.0')
    .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }, 'bearer')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: { persistAuthorization: true },
  });
}
