import { PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, Length, Matches, Max, Min, ValidateIf } from 'class-validator';
import { ToBoolean } from '../../common/validation';

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/;

export class CreateTeamDto {
  @IsString() @Length(1, 100) name!: string;
  @IsString() @Length(1, 100) city!: string;
  @IsString() @Length(1, 10) abbreviation!: string;
  @IsInt() divisionId!: number;

  @IsOptional() @IsInt() @Min(1800) @Max(2100) foundedYear?: number | null;
  @IsOptional() @IsString() @Length(0, 200) arenaName?: string;
  @IsOptional() @IsInt() @Min(0) arenaCapacity?: number | null;

  // vacío o #RRGGBB
  @IsOptional() @ValidateIf((_o, v) => v !== '') @Matches(HEX_COLOR, { message: 'primaryColor debe ser #RRGGBB' })
  primaryColor?: string;
  @IsOptional() @ValidateIf((_o, v) => v !== '') @Matches(HEX_COLOR, { message: 'secondaryColor debe ser #RRGGBB' })
  secondaryColor?: string;
  @IsOptional() @ValidateIf((_o, v) => v !== '') @IsUrl({ require_tld: false }, { message: 'logoUrl must be a valid URL' })
  logoUrl?: string;

  @IsOptional() @IsBoolean() isActive?: boolean;
}

export class UpdateTeamDto extends PartialType(CreateTeamDto) {}

export class TeamQueryDto {
  @IsOptional() @Type(() => Number) @IsInt() conferenceId?: number;
  @IsOptional() @Type(() => Number) @IsInt() divisionId?: number;
  @IsOptional() @ToBoolean() @IsBoolean() active?: boolean;
  // nombre exacto
  @IsOptional() @IsString() name?: string;
  // búsqueda en nombre/ciudad/abreviatura
  @IsOptional() @IsString() q?: string;
}
