import { migrationFileName, renderMigration } from './migration-template';

describe('renderMigration', () => {
  it('genera la clase con up en orden y down invertido', () => {
    const source = renderMigration(
      'AddVenue',
      1730000000123,
      [{ query: 'ALTER TABLE "game" ADD "venue" varchar' }, { query: 'CREATE INDEX "idx_venue" ON "game" ("venue")' }],
      [{ query: 'ALTER TABLE "game" DROP COLUMN "venue"' }, { query: 'DROP INDEX "idx_venue"' }],
    );
    expect(source).toContain('export class AddVenue1730000000123 implements MigrationInterface {');
    expect(source).toContain("name = 'AddVenue1730000000123';");
    const down = source.slice(source.indexOf('public async down'));
    expect(down.indexOf('DROP INDEX')).toBeLessThan(down.indexOf('DROP COLUMN'));
    const up = source.slice(source.indexOf('public async up'), source.indexOf('public async down'));
    expect(up.indexOf('ADD "venue"')).toBeLessThan(up.indexOf('CREATE INDEX'));
  });

  it('escapa el SQL dentro del template literal y conserva parámetros', () => {
    const source = renderMigration('Esc', 1, [{ query: 'SELECT `x`, \'${y}\', \'a\\b\'', parameters: ['v'] }], []);
    expect(source).toContain('await queryRunner.query(`SELECT \\`x\\`, \'\\${y}\', \'a\\\\b\'`, ["v"]);');
  });

  it('nombre de fichero', () => {
    expect(migrationFileName('AddVenue', 42)).toBe('42-AddVenue.ts');
  });
});
