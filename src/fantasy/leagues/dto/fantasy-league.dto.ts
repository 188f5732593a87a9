// src/fantasy/leagues/dto/fantasy-league.dto.ts
import { OmitType, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsDate, IsIn, IsInt, IsOptional, IsString, Length, Max, Min } from 'class-validator';
import { DRAFT_TYPES, DraftType, MAX_LEAGUE_TEAMS, MIN_LEAGUE_TEAMS, SCORING_SYSTEMS, ScoringSystem } from '../fantasy-league.entity';

export class CreateFantasyLeagueDto {
  @IsString() @Length(3, 100) name!: string;
  @IsOptional() @IsString() @Length(0, 2000) description?: string;
  // por defecto la temporada actual
  @IsOptional() @IsInt() seasonId?: number;
  @IsOptional() @IsInt() @Min(MIN_LEAGUE_TEAMS) @Max(MAX_LEAGUE_TEAMS) maxTeams?: number;
  @IsOptional() @IsInt() @Min(1) @Max(50) rosterSize?: number;
  @IsOptional() @IsInt() @Min(1) @Max(30) startingLineupSize?: number;
  @IsOptional() @IsIn(SCORING_SYSTEMS) scoringSystem?: ScoringSystem;
  @IsOptional() @IsIn(DRAFT_TYPES) draftType?: DraftType;
  @IsOptional() @Type(() => Date) @IsDate() draftDate?: Date | null;
  @IsOptional() @IsBoolean() isPublic?: boolean;
}

export class UpdateFantasyLeagueDto extends PartialType(OmitType(CreateFantasyLeagueDto, ['seasonId'] as const)) {
  @IsOptional() @IsBoolean() isActive?: boolean;
  @IsOptional() @IsBoolean() isDrafted?: boolean;
}

/** Alta completa desde el admin (commissioner explícito). */
export class AdminCreateFantasyLeagueDto extends CreateFantasyLeagueDto {
  @IsInt() commissionerId!: number;
  @IsOptional() @IsBoolean() isActive?: boolean;
  @IsOptional() @IsBoolean() isDrafted?: boolean;
  @IsOptional() @IsString() @Length(6, 12) inviteCode?: string;
}

export class AdminUpdateFantasyLeagueDto extends PartialType(AdminCreateFantasyLeagueDto) {}

export class JoinLeagueDto {
  @IsString() @Length(3, 100) teamName!: string;
  // obligatorio en ligas privadas
  @IsOptional() @IsString() inviteCode?: string;
}

export class FreeAgentQueryDto {
  @IsOptional() @IsString() position?: string;
  @IsOptional() @IsString() search?: string;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) page?: number;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(100) pageSize?: number;
}
