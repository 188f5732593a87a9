import { Module } from '@nestjs/common';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

// Usa el DataSource global; los repositorios se resuelven por recurso
@Module({
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
