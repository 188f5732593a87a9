import { PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayUnique, IsArray, IsDate, IsIn, IsInt, IsOptional, IsString, Length } from 'class-validator';
import { TRADE_STATUSES, TradeStatus } from '../trade.entity';

export class ProposeTradeDto {
  @IsInt() fromTeamId!: number;
  @IsInt() toTeamId!: number;
  // jugadores que entrega fromTeam
  @IsArray() @ArrayUnique() @IsInt({ each: true }) offeredPlayerIds!: number[];
  // jugadores que pide a toTeam
  @IsArray() @ArrayUnique() @IsInt({ each: true }) requestedPlayerIds!: number[];
  @IsOptional() @IsString() @Length(0, 1000) message?: string;
}

export class TradeQueryDto {
  @IsOptional() @IsIn(TRADE_STATUSES) status?: TradeStatus;
}

// Admin
export class CreateTradeDto {
  @IsInt() fromTeamId!: number;
  @IsInt() toTeamId!: number;
  @IsOptional() @IsIn(TRADE_STATUSES) status?: TradeStatus;
  @IsOptional() @Type(() => Date) @IsDate() responseDate?: Date | null;
  @IsOptional() @Type(() => Date) @IsDate() completionDate?: Date | null;
  @IsOptional() @IsString() @Length(0, 1000) message?: string;
}

export class UpdateTradeDto extends PartialType(CreateTradeDto) {}

export class CreateTradePlayerDto {
  @IsInt() tradeId!: number;
  @IsInt() playerId!: number;
  @IsInt() fromTeamId!: number;
  @IsInt() toTeamId!: number;
}

export class UpdateTradePlayerDto extends PartialType(CreateTradePlayerDto) {}
