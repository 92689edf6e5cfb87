import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { JobsRepository } from './jobs.repository';
import { JobCleanupService } from './job-cleanup.service';

@Module({
  imports: [PipelineModule],
  controllers: [JobsController],
  providers: [JobsService, JobsRepository, JobCleanupService],
})
export class JobsModule {}
