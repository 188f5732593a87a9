import { PartialType } from '@nestjs/swagger';
import { IsArray, IsBoolean, IsInt, IsNumber, IsOptional, IsString, Length, Min, ValidateIf, IsUrl } from 'class-validator';

export class UpdateFantasyTeamDto {
  @IsOptional() @IsString() @Length(3, 100) name?: string;
  @IsOptional() @ValidateIf((_o, v) => v !== '') @IsUrl({ require_tld: false }) logoUrl?: string;
}

export class AddRosterPlayerDto {
  @IsInt() playerId!: number;
  // sin posición: primera titular libre o banquillo
  @IsOptional() @IsInt() positionId?: number;
}

export class MoveRosterPlayerDto {
  @IsInt() positionId!: number;
}

// Admin
export class CreateFantasyTeamDto {
  @IsString() @Length(3, 100) name!: string;
  @IsInt() ownerId!: number;
  @IsInt() leagueId!: number;
  @IsOptional() @IsString() logoUrl?: string;
  @IsOptional() @IsInt() @Min(0) wins?: number;
  @IsOptional() @IsInt() @Min(0) losses?: number;
  @IsOptional() @IsInt() @Min(0) ties?: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) totalPoints?: number;
}

export class AdminUpdateFantasyTeamDto extends PartialType(CreateFantasyTeamDto) {}

export class CreateRosterPositionDto {
  @IsString() @Length(1, 50) name!: string;
  @IsString() @Length(1, 10) abbreviation!: string;
  @IsOptional() @IsBoolean() isStarting?: boolean;
  @IsOptional() @IsInt() @Min(1) maxPlayers?: number;
  @IsOptional() @IsArray() @IsString({ each: true }) eligiblePositions?: string[];
}

export class UpdateRosterPositionDto extends PartialType(CreateRosterPositionDto) {}

export class CreateRosterSlotDto {
  @IsInt() rosterId!: number;
  @IsInt() leagueId!: number;
  @IsInt() positionId!: number;
  @IsOptional() @IsInt() playerId?: number | null;
  @IsOptional() @IsBoolean() isActive?: boolean;
}

export class UpdateRosterSlotDto extends PartialType(CreateRosterSlotDto) {}

export class CreateRosterDto {
  @IsInt() fantasyTeamId!: number;
}

export class UpdateRosterDto extends PartialType(CreateRosterDto) {}
