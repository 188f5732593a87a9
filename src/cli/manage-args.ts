// src/cli/manage-args.ts
export type ManageCommand =
  | { name: 'migrate' }
  | { name: 'makemigrations'; migrationName: string }
  | { name: 'populate_initial_data' }
  | { name: 'createsuperuser'; username: string; email?: string; password: string }
  | { name: 'runserver'; port?: number };

export const USAGE = [
  'Uso: npm run manage -- <comando>',
  '  migrate',
  '  makemigrations <Nombre>',
  '  populate_initial_data',
  '  createsuperuser --username <u> [--email <e>] [--password <p>]   (o SUPERUSER_PASSWORD)',
  '  runserver [--port <n>]',
].join('\n');

export class UsageError extends Error {}

const parseArg = (args: string[], flag: string): string | undefined => {
  const i = args.indexOf(flag);
  if (i === -1) return undefined;
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) throw new UsageError(`Falta el valor de ${flag}`);
  return value;
};

/** argv sin node ni script: ['createsuperuser', '--username', 'admin', ...]. */
export function parseManageArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ManageCommand {
  const [command, ...args] = argv;
  switch (command) {
    case 'migrate':
    case 'populate_initial_data':
      return { name: command };
    case 'makemigrations': {
      const migrationName = args[0];
      if (!migrationName || !/^[A-Za-z][A-Za-z0-9]*$/.test(migrationName)) {
        throw new UsageError('makemigrations requiere un nombre alfanumérico (p.ej. AddGameVenue)');
      }
      return { name: command, migrationName };
    }
    case 'createsuperuser': {
      const username = parseArg(args, '--username');
      if (!username) throw new UsageError('createsuperuser requiere --username');
      const password = parseArg(args, '--password') ?? env.SUPERUSER_PASSWORD;
      if (!password || password.length < 8) {
        throw new UsageError('La contraseña (--password o SUPERUSER_PASSWORD) debe tener al menos 8 caracteres');
      }
      return { name: command, username, email: parseArg(args, '--email'), password };
    }
    case 'runserver': {
      const raw = parseArg(args, '--port') ?? args.find((a) => /^\d+$/.test(a));
      if (raw === undefined) return { name: command };
      const port = Number(raw);
      if (!Number.isInteger(port) || port < 1 || port > 65535) throw new UsageError(`Puerto inválido: ${raw}`);
      return { name: command, port };
    }
    default:
      throw new UsageError(command ? `Comando desconocido: ${command}` : 'Falta el comando');
  }
}
