import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

/** Carga .env.local y luego .env (el primero gana) para procesos fuera de Nest. */
export function loadEnv(cwd: string = process.cwd()): void {
  for (const file of ['.env.local', '.env']) {
    const path = resolve(cwd, file);
    if (existsSync(path)) config({ path });
  }
}
