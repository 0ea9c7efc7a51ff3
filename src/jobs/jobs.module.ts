import { Module } from '@nestjs/common';
import { ProcessingModule } from '../processing/processing.module';
import { JobEventsService } from './job-events.service';
import { JobQueueService } from './job-queue.service';
import { JobsController } from './jobs.controller';
import { FileJobRepository } from './repository/file-job.repository';
import { JobRepository } from './repository/job.repository';

@Module({
  imports: [ProcessingModule],
  controllers: [JobsController],
  providers: [
    JobEventsService,
    JobQueueService,
    { provide: JobRepository, useClass: FileJobRepository },
  ],
  exports: [JobQueueService],
})
export class JobsModule {}
