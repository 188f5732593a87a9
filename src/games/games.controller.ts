import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/public.decorator';
import { GameQueryDto, StandingsQueryDto } from './dto/game.dto';
import { GamesService } from './games.service';

@ApiTags('Games')
@Public()
@Controller('games')
export class GamesController {
  constructor(private readonly svc: GamesService) {}

  @Get()
  list(@Query() query: GameQueryDto) {
    return this.svc.list(query);
  }

  @Get('standings')
  standings(@Query() query: StandingsQueryDto) {
    return this.svc.standings(query.seasonId);
  }

  @Get(':id')
  detail(@Param('id', ParseIntPipe) id: number) {
    return this.svc.detail(id);
  }
}
