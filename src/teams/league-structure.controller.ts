import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/public.decorator';
import { TeamsService } from './teams.service';

@ApiTags('Teams')
@Public()
@Controller()
export class LeagueStructureController {
  constructor(private readonly svc: TeamsService) {}

  // Conferencias con sus divisiones
  @Get('conferences')
  conferences() {
    return this.svc.listConferences();
  }

  @Get('seasons')
  seasons() {
    return this.svc.listSeasons();
  }

  @Get('seasons/current')
  currentSeason() {
    return this.svc.currentSeason();
  }
}
