import { PartialType } from '@nestjs/swagger';
import { IsInt, IsNumber, IsOptional, Min } from 'class-validator';

/** Alta manual de estadísticas de temporada (admin). Los totales se recalculan al guardar. */
export class CreatePlayerStatsDto {
  @IsInt() playerId!: number;
  @IsInt() teamId!: number;
  @IsInt() seasonId!: number;

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
  @IsOptional() @IsInt() @Min(0) timeOnIceSeconds?: number;
  @IsOptional() @IsInt() @Min(0) averageTimeOnIceSeconds?: number;
  @IsOptional() @IsInt() @Min(0) wins?: number;
  @IsOptional() @IsInt() @Min(0) losses?: number;
  @IsOptional() @IsInt() @Min(0) overtimeLosses?: number;
  @IsOptional() @IsInt() @Min(0) shutouts?: number;
  @IsOptional() @IsInt() @Min(0) goalsAgainst?: number;
  @IsOptional() @IsInt() @Min(0) shotsAgainst?: number;
  @IsOptional() @IsInt() @Min(0) saves?: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) @Min(0) goalsAgainstAverage?: number;
}

export class UpdatePlayerStatsDto extends PartialType(CreatePlayerStatsDto) {}
