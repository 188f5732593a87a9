// test/database/migrations.e2e-spec.ts
import { DataSource, QueryRunner } from 'typeorm';
import { ENTITIES, SUBSCRIBERS } from '../../src/database/entities';
import { ReadableNamingStrategy } from '../../src/database/naming.strategy';
import { InitialSchema1730000000000 } from '../../src/migrations/1730000000000-InitialSchema';
import { SeasonCurrentIndex1730000000001 } from '../../src/migrations/1730000000001-SeasonCurrentIndex';

describe('Migraciones frente a las entidades (E2E)', () => {
  let ds: DataSource;
  let runner: QueryRunner;
  const up: string[] = [];
  const down: string[] = [];

  // SQL que emite una migración, sin ejecutarlo
  async function record(step: (qr: QueryRunner) => Promise<void>): Promise<string[]> {
    const spy = jest.spyOn(runner, 'query').mockResolvedValue(undefined);
    try {
      await step(runner);
      return spy.mock.calls.map((call) => call[0]);
    } finally {
      spy.mockRestore();
    }
  }

  beforeAll(async () => {
    ds = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      synchronize: true,
      entities: ENTITIES,
      subscribers: SUBSCRIBERS,
      namingStrategy: new ReadableNamingStrategy(),
    });
    await ds.initialize();
    runner = ds.createQueryRunner();
    const initial = new InitialSchema1730000000000();
    const indexes = new SeasonCurrentIndex1730000000001();
    up.push(...(await record((qr) => initial.up(qr))), ...(await record((qr) => indexes.up(qr))));
    down.push(...(await record((qr) => indexes.down(qr))), ...(await record((qr) => initial.down(qr))));
  });

  afterAll(async () => {
    await runner.release();
    await ds.destroy();
  });

  const createTable = (table: string) => up.find((sql) => sql.startsWith(`CREATE TABLE "${table}" (`));

  it('crea cada tabla con todas sus columnas y constraints', () => {
    for (const meta of ds.entityMetadatas) {
      const sql = createTable(meta.tableName);
      expect(sql).toBeDefined();
      const ddl = sql ?? '';
      for (const column of meta.columns) {
        expect(ddl).toContain(`"${column.databaseName}" `);
      }
      expect(ddl).toContain(`CONSTRAINT "pk_${meta.tableName}" PRIMARY KEY`);
      for (const unique of meta.uniques) {
        expect(ddl).toContain(`CONSTRAINT "${unique.name}" UNIQUE`);
      }
      for (const fk of meta.foreignKeys) {
        expect(ddl).toContain(`CONSTRAINT "${fk.name}" FOREIGN KEY`);
      }
    }
    expect(up.filter((sql) => sql.startsWith('CREATE TABLE'))).toHaveLength(ds.entityMetadatas.length);
  });

  it('los índices declarados en las entidades están en las migraciones', () => {
    const declared = ds.entityMetadatas.flatMap((meta) => meta.indices.map((index) => index.name)).sort();
    expect(declared).toEqual([
      'idx_game_season_date',
      'idx_player_game_stats_game',
      'idx_roster_slot_roster',
      'ux_season_single_current',
    ]);
    for (const name of declared) {
      expect(up.some((sql) => sql.includes(`INDEX`) && sql.includes(`"${name}"`))).toBe(true);
    }
  });

  it('las tablas hijas se crean después que sus padres y se borran antes', () => {
    const created = up.filter((sql) => sql.startsWith('CREATE TABLE')).map((sql) => sql.split('"')[1]);
    for (const meta of ds.entityMetadatas) {
      for (const fk of meta.foreignKeys) {
        expect(created.indexOf(fk.referencedTablePath)).toBeLessThan(created.indexOf(meta.tableName));
      }
    }
    const dropped = down.filter((sql) => sql.startsWith('DROP TABLE')).map((sql) => sql.split('"')[1]);
    expect(dropped).toEqual([...created].reverse());
  });

  it('el índice de temporada actual se aplica sobre un esquema ya sincronizado', async () => {
    await new SeasonCurrentIndex1730000000001().up(runner);
    const rows: Array<{ name: string }> = await runner.query(
      `SELECT name FROM sqlite_master WHERE type = 'index' AND name = 'ux_season_single_current'`,
    );
    expect(rows).toEqual([{ name: 'ux_season_single_current' }]);
  });
});
