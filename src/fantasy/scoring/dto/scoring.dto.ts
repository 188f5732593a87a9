import { PartialType } from '@nestjs/swagger';
import { IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';

const weight = () => IsNumber({ maxDecimalPlaces: 2 });

export class UpdateScoringDto {
  @IsOptional() @weight() @Min(-99) @Max(99) goalsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) assistsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) plusMinusPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) penaltyMinutesPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) powerPlayGoalsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) powerPlayAssistsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) shortHandedGoalsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) shortHandedAssistsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) shotsOnGoalPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) hitsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) blockedShotsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) winsPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) lossesPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) goalsAgainstPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) savesPoints?: number;
  @IsOptional() @weight() @Min(-99) @Max(99) shutoutsPoints?: number;
}

export class CreateScoringDto extends UpdateScoringDto {
  @IsInt() leagueId!: number;
}

export class AdminUpdateScoringDto extends PartialType(CreateScoringDto) {}

export class CreatePlayerFantasyStatsDto {
  @IsInt() playerId!: number;
  @IsInt() weekId!: number;
  @IsInt() fantasyTeamId!: number;
  @IsOptional() @IsInt() @Min(0) gamesPlayed?: number;
  @IsOptional() @IsInt() @Min(0) goals?: number;
  @IsOptional() @IsInt() @Min(0) assists?: number;
  @IsOptional() @IsInt() plusMinus?: number;
  @IsOptional() @IsInt() @Min(0) penaltyMinutes?: number;
  @IsOptional() @IsInt() @Min(0) powerPlayGoals?: number;
  @IsOptional() @IsInt() @Min(0) powerPlayAssists?: number;
  @IsOptional() @IsInt() @Min(0) shortHandedGoals?: number;
  @IsOptional() @IsInt() @Min(0) shortHandedAssists?: number;
  @IsOptional() @IsInt() @Min(0) shotsOnGoal?: number;
  @IsOptional() @IsInt() @Min(0) hits?: number;
  @IsOptional() @IsInt() @Min(0) blockedShots?: number;
  @IsOptional() @IsInt() @Min(0) wins?: number;
  @IsOptional() @IsInt() @Min(0) losses?: number;
  @IsOptional() @IsInt() @Min(0) goalsAgainst?: number;
  @IsOptional() @IsInt() @Min(0) saves?: number;
  @IsOptional() @IsInt() @Min(0) shutouts?: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) totalFantasyPoints?: number;
}

export class UpdatePlayerFantasyStatsDto extends PartialType(CreatePlayerFantasyStatsDto) {}

export class CreateTeamWeekPointsDto {
  @IsInt() fantasyTeamId!: number;
  @IsInt() weekId!: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) points?: number;
}

export class UpdateTeamWeekPointsDto extends PartialType(CreateTeamWeekPointsDto) {}
