import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { errorMessage } from '../common/abort';
import { readNumber, readString } from '../config/config.helpers';
import { DEFAULT_DATA_DIR, WORK_SUBDIR } from '../constants';
import { JobQueueService } from '../jobs/job-queue.service';

@Injectable()
export class CleanupService {
  private readonly logger = new Logger(CleanupService.name);
  private readonly retentionMs: number;
  private readonly workRoot: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly jobQueue: JobQueueService,
  ) {
    // One week by default
    const retentionHours = readNumber(this.configService, 'JOB_RETENTION_HOURS', 168);
    this.retentionMs = retentionHours * 60 * 60 * 1000;
    const dataDir = readString(this.configService, 'DATA_DIR') ?? DEFAULT_DATA_DIR;
    this.workRoot = path.join(dataDir, WORK_SUBDIR);
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleCleanup(): Promise<void> {
    this.logger.log('Starting job cleanup...');
    const cutoff = new Date(Date.now() - this.retentionMs);

    try {
      const removed = await this.jobQueue.removeFinishedBefore(cutoff);
      if (removed > 0) {
        this.logger.log(
          `Removed ${removed} finished job(s) older than ${this.retentionMs / (60 * 60 * 1000)} hours`,
        );
      } else {
        this.logger.log('No jobs eligible for cleanup');
      }

      const orphaned = await this.removeOrphanedWorkDirs();
      if (orphaned > 0) {
        this.logger.log(`Removed ${orphaned} orphaned work director${orphaned === 1 ? 'y' : 'ies'}`);
      }
    } catch (error) {
      this.logger.error(`Error during cleanup: ${errorMessage(error)}`);
    }
  }

  /**
   * Scratch directories left behind by a crash. A directory belongs to a
   * job only while that job is running.
   */
  private async removeOrphanedWorkDirs(): Promise<number> {
    let entries: string[];
    try {
      entries = await fsPromises.readdir(this.workRoot);
    } catch {
      return 0;
    }

    let removed = 0;
    for (const entry of entries) {
      if (this.jobQueue.getJob(entry)?.status === 'running') {
        continue;
      }
      try {
        await fsPromises.rm(path.join(this.workRoot, entry), { recursive: true, force: true });
        removed++;
        this.logger.debug(`Removed work directory ${entry}`);
      } catch (error) {
        this.logger.error(`Failed to remove work directory ${entry}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }
}
