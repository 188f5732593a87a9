import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/public.decorator';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { AssignTeamDto, PlayerQueryDto, RebuildStatsDto } from './dto/player.dto';
import { PlayerStatsService } from './player-stats.service';
import { PlayersService } from './players.service';

@ApiTags('Players')
@Controller('players')
export class PlayersController {
  constructor(private readonly svc: PlayersService, private readonly statsSvc: PlayerStatsService) {}

  @Public()
  @Get()
  list(@Query() query: PlayerQueryDto) {
    return this.svc.list(query);
  }

  @Public()
  @Get('positions')
  positions() {
    return this.svc.listPositions();
  }

  @ApiBearerAuth('bearer')
  @UseGuards(RolesGuard)
  @Roles('admin')
  @Post('stats/rebuild')
  @HttpCode(HttpStatus.OK)
  rebuild(@Body() body: RebuildStatsDto) {
    return this.statsSvc.rebuildSeasonStats(body.seasonId);
  }

  @Public()
  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.svc.getPlayer(id);
  }

  @Public()
  @Get(':id/stats')
  stats(@Param('id', ParseIntPipe) id: number) {
    return this.svc.seasonStats(id);
  }

  // Traspaso: cierra la estancia actual y abre otra
  @ApiBearerAuth('bearer')
  @UseGuards(RolesGuard)
  @Roles('admin')
  @Post(':id/team-history')
  assignTeam(@Param('id', ParseIntPipe) id: number, @Body() body: AssignTeamDto) {
    return this.svc.assignTeam(id, body);
  }
}
