import { AdminModule } from './admin/admin.module';
import { AuthModule } from './auth/auth.module';
import { FantasyLeaguesModule } from './fantasy/leagues/fantasy-leagues.module';
import { FantasyScoringModule } from './fantasy/scoring/fantasy-scoring.module';
import { FantasyTeamsModule } from './fantasy/teams/fantasy-teams.module';
import { FantasyTradesModule } from './fantasy/trades/fantasy-trades.module';
import { GamesModule } from './games/games.module';
import { PlayersModule } from './players/players.module';
import { SeedModule } from './seed/seed.module';
import { TeamsModule } from './teams/teams.module';

// Módulos de dominio; AppModule y el módulo de e2e sólo difieren en BD, throttler y cron
export const FEATURE_MODULES = [
  AuthModule,
  TeamsModule,
  PlayersModule,
  GamesModule,
  FantasyLeaguesModule,
  FantasyTeamsModule,
  FantasyTradesModule,
  FantasyScoringModule,
  AdminModule,
  SeedModule,
];

