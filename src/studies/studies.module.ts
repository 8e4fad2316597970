import { Module } from '@nestjs/common';
import { StatsController, StudiesController } from './studies.controller';
import { StudiesService } from './studies.service';

@Module({
  controllers: [StudiesController, StatsController],
  providers: [StudiesService],
})
export class StudiesModule {}
