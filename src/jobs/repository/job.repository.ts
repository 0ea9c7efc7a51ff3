import { Job, JobStatus } from '../interfaces/job.interface';

/**
 * Durable job storage. Implementations must be crash safe: after a crash a
 * record is either the previous version or the new one, never a torn write.
 *
 * Used as the injection token; swap the implementation in the module.
 */
export abstract class JobRepository {
  abstract add(job: Job): Promise<void>;

  /** No-op when the record no longer exists. */
  abstract update(job: Job): Promise<void>;

  abstract delete(jobId: string): Promise<boolean>;

  abstract getById(jobId: string): Promise<Job | null>;

  abstract getByIds(jobIds: readonly string[]): Promise<Job[]>;

  /** Newest first. */
  abstract getAll(): Promise<Job[]>;

  abstract getByStatus(...statuses: JobStatus[]): Promise<Job[]>;

  abstract countByStatus(status: JobStatus): Promise<number>;

  abstract deleteByStatus(...statuses: JobStatus[]): Promise<number>;
}
