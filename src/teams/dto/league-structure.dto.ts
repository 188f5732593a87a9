import { PartialType } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsOptional, IsString, Length, Matches } from 'class-validator';
import { IsIsoDate } from '../../common/validation';

export class CreateConferenceDto {
  @IsString() @Length(1, 50) name!: string;
  @IsString() @Length(1, 10) abbreviation!: string;
}
export class UpdateConferenceDto extends PartialType(CreateConferenceDto) {}

export class CreateDivisionDto {
  @IsString() @Length(1, 50) name!: string;
  @IsString() @Length(1, 10) abbreviation!: string;
  @IsInt() conferenceId!: number;
}
export class UpdateDivisionDto extends PartialType(CreateDivisionDto) {}

export class CreateSeasonDto {
  @IsString() @Length(1, 20) @Matches(/^\S+$/, { message: 'name sin espacios (p.ej. 2024-25)' }) name!: string;
  @IsIsoDate() startDate!: string;
  @IsIsoDate() endDate!: string;
  @IsOptional() @IsIsoDate() playoffsStartDate?: string | null;
  @IsOptional() @IsBoolean() isCurrent?: boolean;
}
export class UpdateSeasonDto extends PartialType(CreateSeasonDto) {}
