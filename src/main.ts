import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { startServer } from './server';

startServer().catch((err: unknown) => {
  new Logger('Bootstrap').error('No se pudo arrancar la API', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
