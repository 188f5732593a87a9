import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { AdminService } from './admin.service';

// Solo staff. `:resource` es el nombre registrado en admin.registry (p.ej. 'teams', 'fantasy-leagues')
@ApiTags('Admin')
@ApiBearerAuth('bearer')
@UseGuards(RolesGuard)
@Roles('admin')
@Controller('admin')
export class AdminController {
  constructor(private readonly svc: AdminService) {}

  @Get()
  index() {
    return this.svc.index();
  }

  @Get(':resource')
  list(@Param('resource') resource: string, @Query() query: Record<string, unknown>) {
    return this.svc.list(resource, query);
  }

  @Get(':resource/:id')
  get(@Param('resource') resource: string, @Param('id', ParseIntPipe) id: number) {
    return this.svc.get(resource, id);
  }

  @Post(':resource')
  create(@Param('resource') resource: string, @Body() body: Record<string, unknown>) {
    return this.svc.create(resource, body);
  }

  @Patch(':resource/:id')
  update(
    @Param('resource') resource: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: Record<string, unknown>,
  ) {
    return this.svc.update(resource, id, body);
  }

  @Delete(':resource/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('resource') resource: string, @Param('id', ParseIntPipe) id: number) {
    return this.svc.remove(resource, id);
  }
}
