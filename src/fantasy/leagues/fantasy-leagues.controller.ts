// src/fantasy/leagues/fantasy-leagues.controller.ts
import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { User } from '../../auth/user.decorator';
import type { AuthUser } from '../../auth/user.decorator';
import { UpdateScoringDto } from '../scoring/dto/scoring.dto';
import { CreateFantasyLeagueDto, FreeAgentQueryDto, JoinLeagueDto, UpdateFantasyLeagueDto } from './dto/fantasy-league.dto';
import { FantasyLeaguesService } from './fantasy-leagues.service';

@ApiTags('Fantasy leagues')
@ApiBearerAuth('bearer')
@Controller('fantasy/leagues')
export class FantasyLeaguesController {
  constructor(private readonly svc: FantasyLeaguesService) {}

  @Post()
  create(@Body() dto: CreateFantasyLeagueDto, @User() user: AuthUser) {
    return this.svc.createLeague(user, dto);
  }

  // Ligas públicas activas
  @Get()
  listPublic() {
    return this.svc.listPublic();
  }

  @Get('mine')
  mine(@User() user: AuthUser) {
    return this.svc.listMine(user);
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number, @User() user: AuthUser) {
    return this.svc.getLeague(id, user);
  }

  @Patch(':id')
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateFantasyLeagueDto, @User() user: AuthUser) {
    return this.svc.updateLeague(id, user, dto);
  }

  @Patch(':id/scoring')
  updateScoring(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateScoringDto, @User() user: AuthUser) {
    return this.svc.updateScoring(id, user, dto);
  }

  @Post(':id/join')
  @HttpCode(HttpStatus.CREATED)
  join(@Param('id', ParseIntPipe) id: number, @Body() dto: JoinLeagueDto, @User() user: AuthUser) {
    return this.svc.joinLeague(id, user, dto);
  }

  @Get(':id/standings')
  standings(@Param('id', ParseIntPipe) id: number) {
    return this.svc.standings(id);
  }

  @Get(':id/free-agents')
  freeAgents(@Param('id', ParseIntPipe) id: number, @Query() query: FreeAgentQueryDto) {
    return this.svc.freeAgents(id, query);
  }
}
