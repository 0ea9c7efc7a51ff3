import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_DATA_DIR, JOBS_SUBDIR } from '../../constants';
import { readString } from '../../config/config.helpers';
import { Job, JobStatus } from '../interfaces/job.interface';
import { JobRepository } from './job.repository';
import { fromJobRecord, toJobRecord } from './job.serializer';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Stores one JSON document per job under `<DATA_DIR>/jobs`.
 *
 * Writes go to a temporary file which is fsync'd and renamed over the
 * record, so a crash leaves either the old or the new version. Operations
 * on the same job are serialized.
 */
@Injectable()
export class FileJobRepository extends JobRepository {
  private readonly logger = new Logger(FileJobRepository.name);
  private readonly jobsDir: string;
  private readonly chains: Map<string, Promise<void>> = new Map();

  constructor(private readonly configService: ConfigService) {
    super();
    const dataDir = readString(this.configService, 'DATA_DIR') ?? DEFAULT_DATA_DIR;
    this.jobsDir = path.join(dataDir, JOBS_SUBDIR);
  }

  async add(job: Job): Promise<void> {
    await this.serialize(job.id, () => this.writeRecord(job));
    this.logger.debug(`Stored job ${job.id}`);
  }

  async update(job: Job): Promise<void> {
    await this.serialize(job.id, async () => {
      if (!(await this.exists(job.id))) {
        this.logger.debug(`Skipping update of deleted job ${job.id}`);
        return;
      }
      await this.writeRecord(job);
    });
  }

  async delete(jobId: string): Promise<boolean> {
    return this.serialize(jobId, async () => {
      try {
        await fsPromises.unlink(this.recordPath(jobId));
        this.logger.debug(`Removed job record ${jobId}`);
        return true;
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return false;
        }
        throw error;
      }
    });
  }

  async getById(jobId: string): Promise<Job | null> {
    return this.readRecord(this.recordPath(jobId));
  }

  async getByIds(jobIds: readonly string[]): Promise<Job[]> {
    const jobs = await Promise.all(jobIds.map((jobId) => this.getById(jobId)));
    return jobs.filter((job): job is Job => job !== null);
  }

  async getAll(): Promise<Job[]> {
    let files: string[];
    try {
      files = await fsPromises.readdir(this.jobsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const jsonFiles = files.filter((file) => file.endsWith('.json'));
    const jobs = await Promise.all(
      jsonFiles.map((file) => this.readRecord(path.join(this.jobsDir, file))),
    );

    return jobs
      .filter((job): job is Job => job !== null)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getByStatus(...statuses: JobStatus[]): Promise<Job[]> {
    const jobs = await this.getAll();
    return jobs.filter((job) => statuses.includes(job.status));
  }

  async countByStatus(status: JobStatus): Promise<number> {
    const jobs = await this.getByStatus(status);
    return jobs.length;
  }

  async deleteByStatus(...statuses: JobStatus[]): Promise<number> {
    const jobs = await this.getByStatus(...statuses);
    const results = await Promise.all(jobs.map((job) => this.delete(job.id)));
    return results.filter(Boolean).length;
  }

  private recordPath(jobId: string): string {
    if (path.basename(jobId) !== jobId || jobId.startsWith('.')) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  private async exists(jobId: string): Promise<boolean> {
    try {
      await fsPromises.access(this.recordPath(jobId));
      return true;
    } catch {
      return false;
    }
  }

  private async writeRecord(job: Job): Promise<void> {
    await fsPromises.mkdir(this.jobsDir, { recursive: true });

    const target = this.recordPath(job.id);
    const temp = `${target}.${uuidv4()}.tmp`;
    const handle = await fsPromises.open(temp, 'w');
    try {
      await handle.writeFile(JSON.stringify(toJobRecord(job), null, 2));
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await fsPromises.rename(temp, target);
    } catch (error) {
      await fsPromises.rm(temp, { force: true });
      throw error;
    }
  }

  private async readRecord(filePath: string): Promise<Job | null> {
    let content: string;
    try {
      content = await fsPromises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return fromJobRecord(JSON.parse(content));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error loading job record ${filePath}: ${message}`);
      return null;
    }
  }

  /** Chains operations per job id so writes land in call order. */
  private serialize<T>(jobId: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(jobId) ?? Promise.resolve();
    const result = previous.then(operation);
    const settled = result.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(jobId, settled);
    void settled.then(() => {
      if (this.chains.get(jobId) === settled) {
        this.chains.delete(jobId);
      }
    });
    return result;
  }
}
