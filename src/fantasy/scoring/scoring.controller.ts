// src/fantasy/scoring/scoring.controller.ts
import { Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { User } from '../../auth/user.decorator';
import type { AuthUser } from '../../auth/user.decorator';
import { ScoringService } from './scoring.service';

@ApiTags('Fantasy scoring')
@ApiBearerAuth('bearer')
@Controller('fantasy/weeks')
export class ScoringController {
  constructor(private readonly svc: ScoringService) {}

  // Comisionado o staff
  @Post(':id/compute')
  @HttpCode(HttpStatus.OK)
  compute(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.computeWeekAs(id, user);
  }

  @Post(':id/complete')
  @HttpCode(HttpStatus.OK)
  complete(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.completeWeekAs(id, user);
  }

  @Get(':id/player-stats')
  playerStats(@Param('id', ParseIntPipe) id: number) {
    return this.svc.weekPlayerStats(id);
  }
}
