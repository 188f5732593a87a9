import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/public.decorator';
import { TeamQueryDto } from './dto/team.dto';
import { TeamsService } from './teams.service';

@ApiTags('Teams')
@Public()
@Controller('teams')
export class TeamsController {
  constructor(private readonly svc: TeamsService) {}

  @Get()
  list(@Query() query: TeamQueryDto) {
    return this.svc.listTeams(query);
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.svc.getTeam(id);
  }

  @Get(':id/roster')
  roster(@Param('id', ParseIntPipe) id: number, @Query('seasonId') seasonId?: string) {
    return this.svc.currentRoster(id, seasonId ? Number(seasonId) : undefined);
  }
}
