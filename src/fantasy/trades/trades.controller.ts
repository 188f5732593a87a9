import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { User } from '../../auth/user.decorator';
import type { AuthUser } from '../../auth/user.decorator';
import { ProposeTradeDto, TradeQueryDto } from './dto/trade.dto';
import { TradesService } from './trades.service';

@ApiTags('Fantasy trades')
@ApiBearerAuth('bearer')
@Controller('fantasy')
export class TradesController {
  constructor(private readonly svc: TradesService) {}

  @Post('trades')
  propose(@Body() dto: ProposeTradeDto, @User() user: AuthUser) {
    return this.svc.propose(user, dto);
  }

  @Get('trades/:id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.svc.getTrade(id);
  }

  @Get('teams/:id/trades')
  listForTeam(@Param('id', ParseIntPipe) id: number, @Query() query: TradeQueryDto, @User() user: AuthUser) {
    return this.svc.listForTeam(id, user, query);
  }

  @Post('trades/:id/accept')
  @HttpCode(HttpStatus.OK)
  accept(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.accept(id, user);
  }

  @Post('trades/:id/reject')
  @HttpCode(HttpStatus.OK)
  reject(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.reject(id, user);
  }

  @Post('trades/:id/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.cancel(id, user);
  }
}
