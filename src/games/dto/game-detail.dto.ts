import { PartialType } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsInt, IsObject, IsOptional, Matches, Max, Min } from 'class-validator';
import { GAME_EVENT_TYPES, GameEventType } from '../game-event.entity';
import { GOAL_TYPES, GoalType } from '../goal.entity';

const CLOCK = /^\d{1,2}:\d{2}$/;

export class CreateGameEventDto {
  @IsInt() gameId!: number;
  @IsIn(GAME_EVENT_TYPES) eventType!: GameEventType;
  @IsInt() @Min(1) period!: number;
  @Matches(CLOCK, { message: 'timeInPeriod debe tener formato MM:SS' }) timeInPeriod!: string;
  @IsInt() @Min(0) gameTimeSeconds!: number;
  @IsInt() primaryPlayerId!: number;
  @IsOptional() @IsInt() secondaryPlayerId?: number | null;
  @IsInt() teamId!: number;
  @IsOptional() @IsObject() eventDetails?: Record<string, unknown>;
}

export class UpdateGameEventDto extends PartialType(CreateGameEventDto) {}

export class CreateGoalDto {
  @IsInt() gameId!: number;
  @IsInt() scorerId!: number;
  @IsOptional() @IsInt() assist1Id?: number | null;
  @IsOptional() @IsInt() assist2Id?: number | null;
  @IsInt() teamId!: number;
  @IsInt() @Min(1) period!: number;
  @Matches(CLOCK, { message: 'timeInPeriod debe tener formato MM:SS' }) timeInPeriod!: string;
  @IsInt() @Min(0) gameTimeSeconds!: number;
  @IsOptional() @IsIn(GOAL_TYPES) goalType?: GoalType;
  @IsOptional() @IsInt() @Min(3) @Max(6) homePlayersOnIce?: number;
  @IsOptional() @IsInt() @Min(3) @Max(6) awayPlayersOnIce?: number;
}

export class UpdateGoalDto extends PartialType(CreateGoalDto) {}

export class CreatePlayerGameStatsDto {
  @IsInt() playerId!: number;
  @IsInt() gameId!: number;
  @IsInt() teamId!: number;
  @IsOptional() @IsBoolean() played?: boolean;
  @IsOptional() @IsBoolean() starter?: boolean;
  @IsOptional() @IsInt() @Min(0) goals?: number;
  @IsOptional() @IsInt() @Min(0) assists?: number;
  @IsOptional() @IsInt() plusMinus?: number;
  @IsOptional() @IsInt() @Min(0) penaltyMinutes?: number;
  @IsOptional() @IsInt() @Min(0) shotsOnGoal?: number;
  @IsOptional() @IsInt() @Min(0) shotsMissed?: number;
  @IsOptional() @IsInt() @Min(0) shotsBlocked?: number;
  @IsOptional() @IsInt() @Min(0) timeOnIceSeconds?: number;
  @IsOptional() @IsInt() @Min(0) hits?: number;
  @IsOptional() @IsInt() @Min(0) blockedShots?: number;
  @IsOptional() @IsInt() @Min(0) faceoffWins?: number;
  @IsOptional() @IsInt() @Min(0) faceoffAttempts?: number;
  @IsOptional() @IsInt() @Min(0) saves?: number;
  @IsOptional() @IsInt() @Min(0) goalsAgainst?: number;
  @IsOptional() @IsInt() @Min(0) shotsAgainst?: number;
}

export class UpdatePlayerGameStatsDto extends PartialType(CreatePlayerGameStatsDto) {}
