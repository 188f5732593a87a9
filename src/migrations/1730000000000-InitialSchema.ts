import { MigrationInterface, QueryRunner } from 'typeorm';

const W = (col: string, value: number) => `"${col}" numeric(5,2) NOT NULL DEFAULT ${value}`;

// orden de creación: padres antes que hijos (FK en línea)
export const INITIAL_TABLES: Array<[string, string[]]> = [
  ['conference', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(50) NOT NULL',
    '"abbreviation" character varying(10) NOT NULL',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_conference_name" UNIQUE ("name")',
    'CONSTRAINT "uq_conference_abbreviation" UNIQUE ("abbreviation")',
    'CONSTRAINT "pk_conference" PRIMARY KEY ("id")',
  ]],
  ['division', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(50) NOT NULL',
    '"abbreviation" character varying(10) NOT NULL',
    '"conference_id" integer NOT NULL',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_division_name" UNIQUE ("name")',
    'CONSTRAINT "uq_division_abbreviation" UNIQUE ("abbreviation")',
    'CONSTRAINT "pk_division" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_division_conference_id" FOREIGN KEY ("conference_id") REFERENCES "conference"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['team', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(100) NOT NULL',
    '"city" character varying(100) NOT NULL',
    '"abbreviation" character varying(10) NOT NULL',
    '"division_id" integer NOT NULL',
    '"founded_year" integer',
    `"arena_name" character varying(200) NOT NULL DEFAULT ''`,
    '"arena_capacity" integer',
    `"primary_color" character varying(7) NOT NULL DEFAULT ''`,
    `"secondary_color" character varying(7) NOT NULL DEFAULT ''`,
    `"logo_url" character varying(200) NOT NULL DEFAULT ''`,
    '"is_active" boolean NOT NULL DEFAULT true',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_team_abbreviation" UNIQUE ("abbreviation")',
    'CONSTRAINT "uq_team_city_name" UNIQUE ("city", "name")',
    'CONSTRAINT "pk_team" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_team_division_id" FOREIGN KEY ("division_id") REFERENCES "division"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['season', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(20) NOT NULL',
    '"start_date" date NOT NULL',
    '"end_date" date NOT NULL',
    '"playoffs_start_date" date',
    '"is_current" boolean NOT NULL DEFAULT false',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_season_name" UNIQUE ("name")',
    'CONSTRAINT "pk_season" PRIMARY KEY ("id")',
  ]],
  ['position', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(50) NOT NULL',
    '"abbreviation" character varying(5) NOT NULL',
    '"category" character varying(20) NOT NULL',
    'CONSTRAINT "uq_position_name" UNIQUE ("name")',
    'CONSTRAINT "uq_position_abbreviation" UNIQUE ("abbreviation")',
    'CONSTRAINT "pk_position" PRIMARY KEY ("id")',
  ]],
  ['player', [
    '"id" SERIAL NOT NULL',
    '"first_name" character varying(100) NOT NULL',
    '"last_name" character varying(100) NOT NULL',
    '"jersey_number" integer',
    '"height_inches" integer',
    '"weight_lbs" integer',
    '"birth_date" date',
    `"birth_city" character varying(100) NOT NULL DEFAULT ''`,
    `"birth_country" character varying(100) NOT NULL DEFAULT ''`,
    `"nationality" character varying(100) NOT NULL DEFAULT ''`,
    '"position_id" integer NOT NULL',
    `"shoots" character varying(5) NOT NULL DEFAULT ''`,
    `"catches" character varying(5) NOT NULL DEFAULT ''`,
    '"draft_year" integer',
    '"draft_round" integer',
    '"draft_pick" integer',
    '"draft_team_id" integer',
    '"is_active" boolean NOT NULL DEFAULT true',
    '"is_rookie" boolean NOT NULL DEFAULT false',
    '"nhl_id" character varying(50)',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_player_nhl_id" UNIQUE ("nhl_id")',
    'CONSTRAINT "pk_player" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_player_position_id" FOREIGN KEY ("position_id") REFERENCES "position"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_draft_team_id" FOREIGN KEY ("draft_team_id") REFERENCES "team"("id") ON DELETE SET NULL ON UPDATE NO ACTION',
  ]],
  ['player_team_history', [
    '"id" SERIAL NOT NULL',
    '"player_id" integer NOT NULL',
    '"team_id" integer NOT NULL',
    '"season_id" integer NOT NULL',
    '"start_date" date NOT NULL',
    '"end_date" date',
    '"jersey_number" integer',
    '"is_current" boolean NOT NULL DEFAULT false',
    'CONSTRAINT "uq_player_team_season" UNIQUE ("player_id", "team_id", "season_id")',
    'CONSTRAINT "pk_player_team_history" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_player_team_history_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_team_history_team_id" FOREIGN KEY ("team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_team_history_season_id" FOREIGN KEY ("season_id") REFERENCES "season"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['player_stats', [
    '"id" SERIAL NOT NULL',
    '"player_id" integer NOT NULL',
    '"team_id" integer NOT NULL',
    '"season_id" integer NOT NULL',
    '"games_played" integer NOT NULL DEFAULT 0',
    '"goals" integer NOT NULL DEFAULT 0',
    '"assists" integer NOT NULL DEFAULT 0',
    '"points" integer NOT NULL DEFAULT 0',
    '"plus_minus" integer NOT NULL DEFAULT 0',
    '"penalty_minutes" integer NOT NULL DEFAULT 0',
    '"power_play_goals" integer NOT NULL DEFAULT 0',
    '"power_play_assists" integer NOT NULL DEFAULT 0',
    '"power_play_points" integer NOT NULL DEFAULT 0',
    '"short_handed_goals" integer NOT NULL DEFAULT 0',
    '"short_handed_assists" integer NOT NULL DEFAULT 0',
    '"short_handed_points" integer NOT NULL DEFAULT 0',
    '"shots_on_goal" integer NOT NULL DEFAULT 0',
    '"shooting_percentage" numeric(5,2) NOT NULL DEFAULT 0',
    '"time_on_ice_seconds" integer NOT NULL DEFAULT 0',
    '"average_time_on_ice_seconds" integer NOT NULL DEFAULT 0',
    '"wins" integer NOT NULL DEFAULT 0',
    '"losses" integer NOT NULL DEFAULT 0',
    '"overtime_losses" integer NOT NULL DEFAULT 0',
    '"shutouts" integer NOT NULL DEFAULT 0',
    '"goals_against" integer NOT NULL DEFAULT 0',
    '"shots_against" integer NOT NULL DEFAULT 0',
    '"saves" integer NOT NULL DEFAULT 0',
    '"goals_against_average" numeric(5,2) NOT NULL DEFAULT 0',
    '"save_percentage" numeric(5,3) NOT NULL DEFAULT 0',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_player_stats_player_team_season" UNIQUE ("player_id", "team_id", "season_id")',
    'CONSTRAINT "pk_player_stats" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_player_stats_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_stats_team_id" FOREIGN KEY ("team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_stats_season_id" FOREIGN KEY ("season_id") REFERENCES "season"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['game', [
    '"id" SERIAL NOT NULL',
    '"home_team_id" integer NOT NULL',
    '"away_team_id" integer NOT NULL',
    '"season_id" integer NOT NULL',
    '"game_date" TIMESTAMP NOT NULL',
    `"game_type" character varying(20) NOT NULL DEFAULT 'regular'`,
    '"home_score" integer NOT NULL DEFAULT 0',
    '"away_score" integer NOT NULL DEFAULT 0',
    `"status" character varying(20) NOT NULL DEFAULT 'scheduled'`,
    '"periods_played" integer NOT NULL DEFAULT 0',
    '"overtime_periods" integer NOT NULL DEFAULT 0',
    '"shootout" boolean NOT NULL DEFAULT false',
    '"attendance" integer',
    `"venue" character varying(200) NOT NULL DEFAULT ''`,
    '"nhl_game_id" character varying(50)',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_game_nhl_game_id" UNIQUE ("nhl_game_id")',
    'CONSTRAINT "uq_game_home_away_date" UNIQUE ("home_team_id", "away_team_id", "game_date")',
    'CONSTRAINT "pk_game" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_game_home_team_id" FOREIGN KEY ("home_team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_game_away_team_id" FOREIGN KEY ("away_team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_game_season_id" FOREIGN KEY ("season_id") REFERENCES "season"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['game_event', [
    '"id" SERIAL NOT NULL',
    '"game_id" integer NOT NULL',
    '"event_type" character varying(20) NOT NULL',
    '"period" integer NOT NULL',
    '"time_in_period" character varying(10) NOT NULL',
    '"game_time_seconds" integer NOT NULL',
    '"primary_player_id" integer NOT NULL',
    '"secondary_player_id" integer',
    '"team_id" integer NOT NULL',
    `"event_details" text NOT NULL DEFAULT '{}'`,
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "pk_game_event" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_game_event_game_id" FOREIGN KEY ("game_id") REFERENCES "game"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_game_event_primary_player_id" FOREIGN KEY ("primary_player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_game_event_secondary_player_id" FOREIGN KEY ("secondary_player_id") REFERENCES "player"("id") ON DELETE SET NULL ON UPDATE NO ACTION',
    'CONSTRAINT "fk_game_event_team_id" FOREIGN KEY ("team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['goal', [
    '"id" SERIAL NOT NULL',
    '"game_id" integer NOT NULL',
    '"scorer_id" integer NOT NULL',
    '"assist1_id" integer',
    '"assist2_id" integer',
    '"team_id" integer NOT NULL',
    '"period" integer NOT NULL',
    '"time_in_period" character varying(10) NOT NULL',
    '"game_time_seconds" integer NOT NULL',
    `"goal_type" character varying(20) NOT NULL DEFAULT 'even_strength'`,
    '"home_players_on_ice" integer NOT NULL DEFAULT 6',
    '"away_players_on_ice" integer NOT NULL DEFAULT 6',
    'CONSTRAINT "pk_goal" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_goal_game_id" FOREIGN KEY ("game_id") REFERENCES "game"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_goal_scorer_id" FOREIGN KEY ("scorer_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_goal_assist1_id" FOREIGN KEY ("assist1_id") REFERENCES "player"("id") ON DELETE SET NULL ON UPDATE NO ACTION',
    'CONSTRAINT "fk_goal_assist2_id" FOREIGN KEY ("assist2_id") REFERENCES "player"("id") ON DELETE SET NULL ON UPDATE NO ACTION',
    'CONSTRAINT "fk_goal_team_id" FOREIGN KEY ("team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['player_game_stats', [
    '"id" SERIAL NOT NULL',
    '"player_id" integer NOT NULL',
    '"game_id" integer NOT NULL',
    '"team_id" integer NOT NULL',
    '"played" boolean NOT NULL DEFAULT true',
    '"starter" boolean NOT NULL DEFAULT false',
    '"goals" integer NOT NULL DEFAULT 0',
    '"assists" integer NOT NULL DEFAULT 0',
    '"points" integer NOT NULL DEFAULT 0',
    '"plus_minus" integer NOT NULL DEFAULT 0',
    '"penalty_minutes" integer NOT NULL DEFAULT 0',
    '"shots_on_goal" integer NOT NULL DEFAULT 0',
    '"shots_missed" integer NOT NULL DEFAULT 0',
    '"shots_blocked" integer NOT NULL DEFAULT 0',
    '"time_on_ice_seconds" integer NOT NULL DEFAULT 0',
    '"hits" integer NOT NULL DEFAULT 0',
    '"blocked_shots" integer NOT NULL DEFAULT 0',
    '"faceoff_wins" integer NOT NULL DEFAULT 0',
    '"faceoff_attempts" integer NOT NULL DEFAULT 0',
    '"saves" integer NOT NULL DEFAULT 0',
    '"goals_against" integer NOT NULL DEFAULT 0',
    '"shots_against" integer NOT NULL DEFAULT 0',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_player_game_stats_player_game" UNIQUE ("player_id", "game_id")',
    'CONSTRAINT "pk_player_game_stats" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_player_game_stats_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_game_stats_game_id" FOREIGN KEY ("game_id") REFERENCES "game"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_game_stats_team_id" FOREIGN KEY ("team_id") REFERENCES "team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['app_user', [
    '"id" SERIAL NOT NULL',
    '"username" character varying(150) NOT NULL',
    `"email" character varying(254) NOT NULL DEFAULT ''`,
    '"password_hash" character varying(200) NOT NULL',
    '"is_staff" boolean NOT NULL DEFAULT false',
    '"is_superuser" boolean NOT NULL DEFAULT false',
    '"is_active" boolean NOT NULL DEFAULT true',
    '"refresh_token_hash" character varying(200)',
    '"last_login" TIMESTAMP',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_app_user_username" UNIQUE ("username")',
    'CONSTRAINT "pk_app_user" PRIMARY KEY ("id")',
  ]],
  ['fantasy_league', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(100) NOT NULL',
    `"description" text NOT NULL DEFAULT ''`,
    '"season_id" integer NOT NULL',
    '"max_teams" integer NOT NULL DEFAULT 12',
    '"roster_size" integer NOT NULL DEFAULT 23',
    '"starting_lineup_size" integer NOT NULL DEFAULT 9',
    `"scoring_system" character varying(20) NOT NULL DEFAULT 'points'`,
    `"draft_type" character varying(20) NOT NULL DEFAULT 'snake'`,
    '"draft_date" TIMESTAMP',
    '"is_drafted" boolean NOT NULL DEFAULT false',
    '"is_active" boolean NOT NULL DEFAULT true',
    '"is_public" boolean NOT NULL DEFAULT false',
    '"invite_code" character varying(12) NOT NULL',
    '"commissioner_id" integer NOT NULL',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_fantasy_league_invite_code" UNIQUE ("invite_code")',
    'CONSTRAINT "pk_fantasy_league" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_fantasy_league_season_id" FOREIGN KEY ("season_id") REFERENCES "season"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_fantasy_league_commissioner_id" FOREIGN KEY ("commissioner_id") REFERENCES "app_user"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['fantasy_scoring', [
    '"id" SERIAL NOT NULL',
    '"league_id" integer NOT NULL',
    W('goals_points', 6),
    W('assists_points', 4),
    W('plus_minus_points', 1),
    W('penalty_minutes_points', 0.5),
    W('power_play_goals_points', 1),
    W('power_play_assists_points', 0.5),
    W('short_handed_goals_points', 2),
    W('short_handed_assists_points', 1),
    W('shots_on_goal_points', 0.4),
    W('hits_points', 0.6),
    W('blocked_shots_points', 1),
    W('wins_points', 4),
    W('losses_points', -1),
    W('goals_against_points', -1),
    W('saves_points', 0.6),
    W('shutouts_points', 5),
    'CONSTRAINT "rel_fantasy_scoring_league_id" UNIQUE ("league_id")',
    'CONSTRAINT "pk_fantasy_scoring" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_fantasy_scoring_league_id" FOREIGN KEY ("league_id") REFERENCES "fantasy_league"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['fantasy_team', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(100) NOT NULL',
    '"owner_id" integer NOT NULL',
    '"league_id" integer NOT NULL',
    `"logo_url" character varying(200) NOT NULL DEFAULT ''`,
    '"wins" integer NOT NULL DEFAULT 0',
    '"losses" integer NOT NULL DEFAULT 0',
    '"ties" integer NOT NULL DEFAULT 0',
    '"total_points" numeric(10,2) NOT NULL DEFAULT 0',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_fantasy_team_owner_league" UNIQUE ("owner_id", "league_id")',
    'CONSTRAINT "pk_fantasy_team" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_fantasy_team_owner_id" FOREIGN KEY ("owner_id") REFERENCES "app_user"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_fantasy_team_league_id" FOREIGN KEY ("league_id") REFERENCES "fantasy_league"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['roster', [
    '"id" SERIAL NOT NULL',
    '"fantasy_team_id" integer NOT NULL',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "rel_roster_fantasy_team_id" UNIQUE ("fantasy_team_id")',
    'CONSTRAINT "pk_roster" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_roster_fantasy_team_id" FOREIGN KEY ("fantasy_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['roster_position', [
    '"id" SERIAL NOT NULL',
    '"name" character varying(50) NOT NULL',
    '"abbreviation" character varying(10) NOT NULL',
    '"is_starting" boolean NOT NULL DEFAULT true',
    '"max_players" integer NOT NULL DEFAULT 1',
    `"eligible_positions" text NOT NULL DEFAULT ''`,
    'CONSTRAINT "uq_roster_position_abbreviation" UNIQUE ("abbreviation")',
    'CONSTRAINT "pk_roster_position" PRIMARY KEY ("id")',
  ]],
  ['roster_slot', [
    '"id" SERIAL NOT NULL',
    '"roster_id" integer NOT NULL',
    '"league_id" integer NOT NULL',
    '"position_id" integer NOT NULL',
    '"player_id" integer',
    '"is_active" boolean NOT NULL DEFAULT true',
    '"created_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_roster_slot_roster_position_player" UNIQUE ("roster_id", "position_id", "player_id")',
    'CONSTRAINT "uq_roster_slot_league_player" UNIQUE ("league_id", "player_id")',
    'CONSTRAINT "pk_roster_slot" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_roster_slot_roster_id" FOREIGN KEY ("roster_id") REFERENCES "roster"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_roster_slot_league_id" FOREIGN KEY ("league_id") REFERENCES "fantasy_league"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_roster_slot_position_id" FOREIGN KEY ("position_id") REFERENCES "roster_position"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_roster_slot_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE SET NULL ON UPDATE NO ACTION',
  ]],
  ['trade', [
    '"id" SERIAL NOT NULL',
    '"from_team_id" integer NOT NULL',
    '"to_team_id" integer NOT NULL',
    `"status" character varying(20) NOT NULL DEFAULT 'pending'`,
    '"proposed_date" TIMESTAMP NOT NULL DEFAULT now()',
    '"response_date" TIMESTAMP',
    '"completion_date" TIMESTAMP',
    `"message" text NOT NULL DEFAULT ''`,
    'CONSTRAINT "pk_trade" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_trade_from_team_id" FOREIGN KEY ("from_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_trade_to_team_id" FOREIGN KEY ("to_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['trade_player', [
    '"id" SERIAL NOT NULL',
    '"trade_id" integer NOT NULL',
    '"player_id" integer NOT NULL',
    '"from_team_id" integer NOT NULL',
    '"to_team_id" integer NOT NULL',
    'CONSTRAINT "pk_trade_player" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_trade_player_trade_id" FOREIGN KEY ("trade_id") REFERENCES "trade"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_trade_player_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_trade_player_from_team_id" FOREIGN KEY ("from_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_trade_player_to_team_id" FOREIGN KEY ("to_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['fantasy_week', [
    '"id" SERIAL NOT NULL',
    '"league_id" integer NOT NULL',
    '"week_number" integer NOT NULL',
    '"start_date" date NOT NULL',
    '"end_date" date NOT NULL',
    '"is_playoffs" boolean NOT NULL DEFAULT false',
    '"is_complete" boolean NOT NULL DEFAULT false',
    'CONSTRAINT "uq_fantasy_week_league_number" UNIQUE ("league_id", "week_number")',
    'CONSTRAINT "pk_fantasy_week" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_fantasy_week_league_id" FOREIGN KEY ("league_id") REFERENCES "fantasy_league"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['matchup', [
    '"id" SERIAL NOT NULL',
    '"week_id" integer NOT NULL',
    '"team1_id" integer NOT NULL',
    '"team2_id" integer NOT NULL',
    '"team1_score" numeric(10,2) NOT NULL DEFAULT 0',
    '"team2_score" numeric(10,2) NOT NULL DEFAULT 0',
    '"is_complete" boolean NOT NULL DEFAULT false',
    'CONSTRAINT "uq_matchup_week_teams" UNIQUE ("week_id", "team1_id", "team2_id")',
    'CONSTRAINT "pk_matchup" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_matchup_week_id" FOREIGN KEY ("week_id") REFERENCES "fantasy_week"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_matchup_team1_id" FOREIGN KEY ("team1_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_matchup_team2_id" FOREIGN KEY ("team2_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['player_fantasy_stats', [
    '"id" SERIAL NOT NULL',
    '"player_id" integer NOT NULL',
    '"week_id" integer NOT NULL',
    '"fantasy_team_id" integer NOT NULL',
    '"games_played" integer NOT NULL DEFAULT 0',
    '"goals" integer NOT NULL DEFAULT 0',
    '"assists" integer NOT NULL DEFAULT 0',
    '"plus_minus" integer NOT NULL DEFAULT 0',
    '"penalty_minutes" integer NOT NULL DEFAULT 0',
    '"power_play_goals" integer NOT NULL DEFAULT 0',
    '"power_play_assists" integer NOT NULL DEFAULT 0',
    '"short_handed_goals" integer NOT NULL DEFAULT 0',
    '"short_handed_assists" integer NOT NULL DEFAULT 0',
    '"shots_on_goal" integer NOT NULL DEFAULT 0',
    '"hits" integer NOT NULL DEFAULT 0',
    '"blocked_shots" integer NOT NULL DEFAULT 0',
    '"wins" integer NOT NULL DEFAULT 0',
    '"losses" integer NOT NULL DEFAULT 0',
    '"goals_against" integer NOT NULL DEFAULT 0',
    '"saves" integer NOT NULL DEFAULT 0',
    '"shutouts" integer NOT NULL DEFAULT 0',
    '"total_fantasy_points" numeric(8,2) NOT NULL DEFAULT 0',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_player_fantasy_stats_player_week_team" UNIQUE ("player_id", "week_id", "fantasy_team_id")',
    'CONSTRAINT "pk_player_fantasy_stats" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_player_fantasy_stats_player_id" FOREIGN KEY ("player_id") REFERENCES "player"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_fantasy_stats_week_id" FOREIGN KEY ("week_id") REFERENCES "fantasy_week"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_player_fantasy_stats_fantasy_team_id" FOREIGN KEY ("fantasy_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
  ['fantasy_team_week_points', [
    '"id" SERIAL NOT NULL',
    '"fantasy_team_id" integer NOT NULL',
    '"week_id" integer NOT NULL',
    '"points" numeric(10,2) NOT NULL DEFAULT 0',
    '"updated_at" TIMESTAMP NOT NULL DEFAULT now()',
    'CONSTRAINT "uq_team_week_points" UNIQUE ("fantasy_team_id", "week_id")',
    'CONSTRAINT "pk_fantasy_team_week_points" PRIMARY KEY ("id")',
    'CONSTRAINT "fk_fantasy_team_week_points_fantasy_team_id" FOREIGN KEY ("fantasy_team_id") REFERENCES "fantasy_team"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
    'CONSTRAINT "fk_fantasy_team_week_points_week_id" FOREIGN KEY ("week_id") REFERENCES "fantasy_week"("id") ON DELETE CASCADE ON UPDATE NO ACTION',
  ]],
];

/**
 * Esquema inicial (postgres). Los nombres de constraints siguen ReadableNamingStrategy;
 * los cambios posteriores van en migraciones nuevas generadas con makemigrations.
 */
export class InitialSchema1730000000000 implements MigrationInterface {
  name = 'InitialSchema1730000000000';

  public async up(qr: QueryRunner): Promise<void> {
    for (const [table, defs] of INITIAL_TABLES) {
      await qr.query(`CREATE TABLE "${table}" (${defs.join(', ')})`);
    }
    await qr.query(`CREATE INDEX "idx_roster_slot_roster" ON "roster_slot" ("roster_id") `);
  }

  public async down(qr: QueryRunner): Promise<void> {
    await qr.query(`DROP INDEX "idx_roster_slot_roster"`);
    for (const [table] of [...INITIAL_TABLES].reverse()) {
      await qr.query(`DROP TABLE "${table}"`);
    }
  }
}
