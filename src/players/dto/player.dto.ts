import { PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Length, Max, Min } from 'class-validator';
import { IsIsoDate, ToBoolean } from '../../common/validation';
import { POSITION_CATEGORIES, PositionCategory } from '../position.entity';
import { Handedness } from '../player.entity';

const HANDEDNESS: Handedness[] = ['L', 'R', ''];

export class CreatePositionDto {
  @IsString() @Length(1, 50) name!: string;
  @IsString() @Length(1, 5) abbreviation!: string;
  @IsIn(POSITION_CATEGORIES) category!: PositionCategory;
}

export class UpdatePositionDto extends PartialType(CreatePositionDto) {}

export class CreatePlayerDto {
  @IsString() @Length(1, 100) firstName!: string;
  @IsString() @Length(1, 100) lastName!: string;
  @IsOptional() @IsInt() @Min(1) @Max(99) jerseyNumber?: number | null;
  @IsOptional() @IsInt() @Min(48) @Max(96) heightInches?: number | null;
  @IsOptional() @IsInt() @Min(100) @Max(400) weightLbs?: number | null;
  @IsOptional() @IsIsoDate() birthDate?: string | null;
  @IsOptional() @IsString() @Length(0, 100) birthCity?: string;
  @IsOptional() @IsString() @Length(0, 100) birthCountry?: string;
  @IsOptional() @IsString() @Length(0, 100) nationality?: string;
  @IsInt() positionId!: number;
  @IsOptional() @IsIn(HANDEDNESS) shoots?: Handedness;
  @IsOptional() @IsIn(HANDEDNESS) catches?: Handedness;
  @IsOptional() @IsInt() @Min(1900) @Max(2100) draftYear?: number | null;
  @IsOptional() @IsInt() @Min(1) draftRound?: number | null;
  @IsOptional() @IsInt() @Min(1) draftPick?: number | null;
  @IsOptional() @IsInt() draftTeamId?: number | null;
  @IsOptional() @IsBoolean() isActive?: boolean;
  @IsOptional() @IsBoolean() isRookie?: boolean;
  @IsOptional() @IsString() @Length(1, 50) nhlId?: string | null;
}

export class UpdatePlayerDto extends PartialType(CreatePlayerDto) {}

export class PlayerQueryDto {
  // nombre o apellido
  @IsOptional() @IsString() search?: string;
  // abreviatura de posición (C, LW, D...)
  @IsOptional() @IsString() position?: string;
  @IsOptional() @Type(() => Number) @IsInt() teamId?: number;
  @IsOptional() @ToBoolean() @IsBoolean() active?: boolean;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) page?: number;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(100) pageSize?: number;
}

export class AssignTeamDto {
  @IsInt() teamId!: number;
  @IsInt() seasonId!: number;
  @IsIsoDate() startDate!: string;
  @IsOptional() @IsInt() @Min(1) @Max(99) jerseyNumber?: number;
}

export class CreatePlayerTeamHistoryDto {
  @IsInt() playerId!: number;
  @IsInt() teamId!: number;
  @IsInt() seasonId!: number;
  @IsIsoDate() startDate!: string;
  @IsOptional() @IsIsoDate() endDate?: string | null;
  @IsOptional() @IsInt() @Min(1) @Max(99) jerseyNumber?: number | null;
  @IsOptional() @IsBoolean() isCurrent?: boolean;
}

export class UpdatePlayerTeamHistoryDto extends PartialType(CreatePlayerTeamHistoryDto) {}

export class RebuildStatsDto {
  @IsInt() seasonId!: number;
}
