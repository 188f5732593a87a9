import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Como mucho una temporada con is_current = true (índice parcial)
 * e índices de lectura para calendario y scoring. Declarados también en las entidades.
 */
export class SeasonCurrentIndex1730000000001 implements MigrationInterface {
  name = 'SeasonCurrentIndex1730000000001';

  public async up(qr: QueryRunner): Promise<void> {
    await qr.query(`CREATE UNIQUE INDEX IF NOT EXISTS "ux_season_single_current" ON "season" ("is_current") WHERE "is_current" = true`);
    await qr.query(`CREATE INDEX IF NOT EXISTS "idx_game_season_date" ON "game" ("season_id", "game_date")`);
    await qr.query(`CREATE INDEX IF NOT EXISTS "idx_player_game_stats_game" ON "player_game_stats" ("game_id")`);
  }

  public async down(qr: QueryRunner): Promise<void> {
    await qr.query(`DROP INDEX IF EXISTS "idx_player_game_stats_game"`);
    await qr.query(`DROP INDEX IF EXISTS "idx_game_season_date"`);
    await qr.query(`DROP INDEX IF EXISTS "ux_season_single_current"`);
  }
}
