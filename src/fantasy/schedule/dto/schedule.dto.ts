import { PartialType } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';
import { IsIsoDate } from '../../../common/validation';

export class GenerateScheduleDto {
  // últimas N semanas marcadas como playoffs
  @IsOptional() @IsInt() @Min(0) @Max(10) playoffWeeks?: number;
}

export class CreateFantasyWeekDto {
  @IsInt() leagueId!: number;
  @IsInt() @Min(1) weekNumber!: number;
  @IsIsoDate() startDate!: string;
  @IsIsoDate() endDate!: string;
  @IsOptional() @IsBoolean() isPlayoffs?: boolean;
  @IsOptional() @IsBoolean() isComplete?: boolean;
}

export class UpdateFantasyWeekDto extends PartialType(CreateFantasyWeekDto) {}

export class CreateMatchupDto {
  @IsInt() weekId!: number;
  @IsInt() team1Id!: number;
  @IsInt() team2Id!: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) team1Score?: number;
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) team2Score?: number;
  @IsOptional() @IsBoolean() isComplete?: boolean;
}

export class UpdateMatchupDto extends PartialType(CreateMatchupDto) {}
