import { PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsDate, IsIn, IsInt, IsOptional, IsString, Length, Min } from 'class-validator';
import { GAME_STATUSES, GAME_TYPES, GameStatus, GameType } from '../game.entity';

export class CreateGameDto {
  @IsInt() homeTeamId!: number;
  @IsInt() awayTeamId!: number;
  @IsInt() seasonId!: number;
  @Type(() => Date) @IsDate() gameDate!: Date;
  @IsOptional() @IsIn(GAME_TYPES) gameType?: GameType;
  @IsOptional() @IsInt() @Min(0) homeScore?: number;
  @IsOptional() @IsInt() @Min(0) awayScore?: number;
  @IsOptional() @IsIn(GAME_STATUSES) status?: GameStatus;
  @IsOptional() @IsInt() @Min(0) periodsPlayed?: number;
  @IsOptional() @IsInt() @Min(0) overtimePeriods?: number;
  @IsOptional() @IsBoolean() shootout?: boolean;
  @IsOptional() @IsInt() @Min(0) attendance?: number | null;
  @IsOptional() @IsString() @Length(0, 200) venue?: string;
  @IsOptional() @IsString() @Length(1, 50) nhlGameId?: string | null;
}

export class UpdateGameDto extends PartialType(CreateGameDto) {}

export class GameQueryDto {
  @IsOptional() @Type(() => Number) @IsInt() seasonId?: number;
  // local o visitante
  @IsOptional() @Type(() => Number) @IsInt() teamId?: number;
  @IsOptional() @IsIn(GAME_STATUSES) status?: GameStatus;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) page?: number;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) pageSize?: number;
}

export class StandingsQueryDto {
  @IsOptional() @Type(() => Number) @IsInt() seasonId?: number;
}
