import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  MessageEvent,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Sse,
  StreamableFile,
} from '@nestjs/common';
import { createReadStream, promises as fsPromises } from 'fs';
import * as path from 'path';
import { Observable } from 'rxjs';
import { CreateJobDto } from './dto/create-job.dto';
import {
  Job,
  JobStatusGroup,
  QueueStatistics,
  isJobStatus,
} from './interfaces/job.interface';
import { JobEventsService } from './job-events.service';
import { JobQueueService } from './job-queue.service';

const STATUS_GROUPS: readonly JobStatusGroup[] = ['active', 'completed', 'failed'];

function isStatusGroup(value: string): value is JobStatusGroup {
  return (STATUS_GROUPS as readonly string[]).includes(value);
}

type TransitionAction = 'cancel' | 'pause' | 'resume' | 'retry';

const PAST_TENSE: Record<TransitionAction, string> = {
  cancel: 'cancelled',
  pause: 'paused',
  resume: 'resumed',
  retry: 'queued for retry',
};

const jobIdPipe = new ParseUUIDPipe({ version: '4' });

@Controller('jobs')
export class JobsController {
  private readonly logger = new Logger(JobsController.name);

  constructor(
    private readonly jobQueue: JobQueueService,
    private readonly jobEvents: JobEventsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createJob(@Body() dto: CreateJobDto): Promise<{ id: string }> {
    this.logger.log(`Job request: ${dto.kind} for ${dto.sourceVideoPath}`);
    const id = await this.jobQueue.addJob(dto);
    return { id };
  }

  @Get()
  getJobs(@Query('status') status?: string): Job[] {
    if (status === undefined) {
      return this.jobQueue.getAllJobs();
    }
    if (!isJobStatus(status)) {
      throw new BadRequestException(`Unknown status: ${status}`);
    }
    return this.jobQueue.getAllJobs(status);
  }

  @Get('statistics')
  getStatistics(): QueueStatistics {
    return this.jobQueue.getStatistics();
  }

  @Get('groups/:group')
  getJobsByGroup(@Param('group') group: string): Job[] {
    if (!isStatusGroup(group)) {
      throw new BadRequestException(
        `Unknown group: ${group}. Expected one of ${STATUS_GROUPS.join(', ')}`,
      );
    }
    return this.jobQueue.getJobsByGroup(group);
  }

  @Get('queue')
  getQueueState(): { paused: boolean } {
    return { paused: this.jobQueue.isQueuePaused() };
  }

  @Post('queue/start')
  @HttpCode(HttpStatus.OK)
  startQueue(): { paused: boolean } {
    this.jobQueue.startQueue();
    return { paused: this.jobQueue.isQueuePaused() };
  }

  @Post('queue/stop')
  @HttpCode(HttpStatus.OK)
  stopQueue(): { paused: boolean } {
    this.jobQueue.stopQueue();
    return { paused: this.jobQueue.isQueuePaused() };
  }

  @Sse('events')
  events(): Observable<MessageEvent> {
    return this.jobEvents.stream();
  }

  @Delete('completed')
  async clearCompleted(): Promise<{ deleted: number }> {
    return { deleted: await this.jobQueue.clearCompletedJobs() };
  }

  @Delete()
  async clearAll(): Promise<{ deleted: number }> {
    this.logger.log('Clear all jobs request');
    return { deleted: await this.jobQueue.clearAllJobs() };
  }

  @Get(':id')
  getJob(@Param('id', jobIdPipe) id: string): Job {
    return this.requireJob(id);
  }

  @Get(':id/output')
  async downloadOutput(@Param('id', jobIdPipe) id: string): Promise<StreamableFile> {
    const job = this.requireJob(id);
    if (job.status !== 'completed') {
      throw new ConflictException(`Job ${id} has not completed`);
    }

    const stats = await fsPromises.stat(job.outputPath).catch(() => null);
    if (!stats?.isFile()) {
      throw new NotFoundException('Output file not found');
    }

    this.logger.log(`Download started for ${job.outputPath}`);
    return new StreamableFile(createReadStream(job.outputPath), {
      type: 'video/mp4',
      length: stats.size,
      disposition: `attachment; filename="${path.basename(job.outputPath)}"`,
    });
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  cancelJob(@Param('id', jobIdPipe) id: string): Promise<{ message: string }> {
    return this.transition(id, 'cancel', () => this.jobQueue.cancelJob(id));
  }

  @Post(':id/pause')
  @HttpCode(HttpStatus.OK)
  pauseJob(@Param('id', jobIdPipe) id: string): Promise<{ message: string }> {
    return this.transition(id, 'pause', () => this.jobQueue.pauseJob(id));
  }

  @Post(':id/resume')
  @HttpCode(HttpStatus.OK)
  resumeJob(@Param('id', jobIdPipe) id: string): Promise<{ message: string }> {
    return this.transition(id, 'resume', () => this.jobQueue.resumeJob(id));
  }

  @Post(':id/retry')
  @HttpCode(HttpStatus.OK)
  retryJob(@Param('id', jobIdPipe) id: string): Promise<{ message: string }> {
    return this.transition(id, 'retry', () => this.jobQueue.retryJob(id));
  }

  @Delete(':id')
  async deleteJob(@Param('id', jobIdPipe) id: string): Promise<{ message: string }> {
    if (!(await this.jobQueue.deleteJob(id))) {
      throw new NotFoundException(`Job ${id} not found`);
    }
    return { message: `Job ${id} deleted` };
  }

  private requireJob(id: string): Job {
    const job = this.jobQueue.getJob(id);
    if (!job) {
      throw new NotFoundException(`Job ${id} not found`);
    }
    return job;
  }

  private async transition(
    id: string,
    action: TransitionAction,
    apply: () => Promise<boolean>,
  ): Promise<{ message: string }> {
    const job = this.requireJob(id);
    this.logger.log(`${action} request for job ${id}`);
    if (!(await apply())) {
      throw new ConflictException(`Cannot ${action} job ${id} while it is ${job.status}`);
    }
    return { message: `Job ${id} ${PAST_TENSE[action]}` };
  }
}
