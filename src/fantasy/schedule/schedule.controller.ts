import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { User } from '../../auth/user.decorator';
import type { AuthUser } from '../../auth/user.decorator';
import { GenerateScheduleDto } from './dto/schedule.dto';
import { ScheduleService } from './schedule.service';

@ApiTags('Fantasy schedule')
@ApiBearerAuth('bearer')
@Controller('fantasy')
export class ScheduleController {
  constructor(private readonly svc: ScheduleService) {}

  @Post('leagues/:id/schedule')
  generate(@Param('id', ParseIntPipe) id: number, @Body() dto: GenerateScheduleDto, @User() user: AuthUser) {
    return this.svc.generate(id, user, dto);
  }

  @Get('leagues/:id/weeks')
  weeks(@Param('id', ParseIntPipe) id: number) {
    return this.svc.listWeeks(id);
  }

  @Get('weeks/:id')
  week(@Param('id', ParseIntPipe) id: number) {
    return this.svc.weekDetail(id);
  }
}
