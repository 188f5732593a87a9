// src/fantasy/teams/fantasy-teams.controller.ts
import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { User } from '../../auth/user.decorator';
import type { AuthUser } from '../../auth/user.decorator';
import { AddRosterPlayerDto, MoveRosterPlayerDto, UpdateFantasyTeamDto } from './dto/fantasy-team.dto';
import { FantasyTeamsService } from './fantasy-teams.service';

@ApiTags('Fantasy teams')
@ApiBearerAuth('bearer')
@Controller('fantasy/teams')
export class FantasyTeamsController {
  constructor(private readonly svc: FantasyTeamsService) {}

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.svc.getTeam(id);
  }

  @Patch(':id')
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateFantasyTeamDto, @User() user: AuthUser) {
    return this.svc.updateTeam(id, user, dto);
  }

  @Get(':id/roster')
  roster(@Param('id', ParseIntPipe) id: number) {
    return this.svc.roster(id);
  }

  @Post(':id/roster')
  add(@Param('id', ParseIntPipe) id: number, @Body() dto: AddRosterPlayerDto, @User() user: AuthUser) {
    return this.svc.addPlayer(id, user, dto);
  }

  // Cambio de posición (titular <-> banquillo incluido)
  @Patch(':id/roster/:playerId')
  move(
    @Param('id', ParseIntPipe) id: number,
    @Param('playerId', ParseIntPipe) playerId: number,
    @Body() dto: MoveRosterPlayerDto,
    @User() user: AuthUser,
  ) {
    return this.svc.movePlayer(id, playerId, user, dto);
  }

  @Delete(':id/roster/:playerId')
  drop(@Param('id', ParseIntPipe) id: number, @Param('playerId', ParseIntPipe) playerId: number, @User() user: AuthUser) {
    return this.svc.dropPlayer(id, playerId, user);
  }

  @Delete(':id/roster/slots/:slotId')
  dropSlot(@Param('id', ParseIntPipe) id: number, @Param('slotId', ParseIntPipe) slotId: number, @User() user: AuthUser) {
    return this.svc.dropSlot(id, slotId, user);
  }
}
