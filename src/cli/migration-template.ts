// forma de las queries de SchemaBuilder.log()
export interface SqlStatement {
  query: string;
  parameters?: unknown[];
}

function toStatement(q: SqlStatement): string {
  const sql = q.query.replace(/\\/g, '\\\\').replace(/`/g, '\\`').replace(/\$\{/g, '\\${');
  return q.parameters?.length
    ? `        await queryRunner.query(\`${sql}\`, ${JSON.stringify(q.parameters)});`
    : `        await queryRunner.query(\`${sql}\`);`;
}

/** Fuente de una migración TypeORM a partir de las queries del schema builder. */
export function renderMigration(name: string, timestamp: number, up: SqlStatement[], down: SqlStatement[]): string {
  const className = `${name}${timestamp}`;
  return `import { MigrationInterface, QueryRunner } from 'typeorm';

export class ${className} implements MigrationInterface {
    name = '${className}';

    public async up(queryRunner: QueryRunner): Promise<void> {
${up.map(toStatement).join('\n')}
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
${[...down].reverse().map(toStatement).join('\n')}
    }
}
`;
}

export function migrationFileName(name: string, timestamp: number): string {
  return `${timestamp}-${name}.ts`;
}
