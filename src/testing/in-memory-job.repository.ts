import { Job, JobStatus } from '../jobs/interfaces/job.interface';
import { JobRepository } from '../jobs/repository/job.repository';

function clone(job: Job): Job {
  return {
    ...job,
    settings: { ...job.settings },
    createdAt: new Date(job.createdAt),
    queuedAt: job.queuedAt && new Date(job.queuedAt),
    startedAt: job.startedAt && new Date(job.startedAt),
    completedAt: job.completedAt && new Date(job.completedAt),
    lastUpdatedAt: new Date(job.lastUpdatedAt),
  };
}

/** Keeps copies so callers cannot mutate stored records by reference. */
export class InMemoryJobRepository extends JobRepository {
  readonly records = new Map<string, Job>();
  failWrites = false;

  seed(...jobs: Job[]): void {
    for (const job of jobs) {
      this.records.set(job.id, clone(job));
    }
  }

  async add(job: Job): Promise<void> {
    this.assertWritable();
    this.records.set(job.id, clone(job));
  }

  async update(job: Job): Promise<void> {
    this.assertWritable();
    if (this.records.has(job.id)) {
      this.records.set(job.id, clone(job));
    }
  }

  async delete(jobId: string): Promise<boolean> {
    return this.records.delete(jobId);
  }

  async getById(jobId: string): Promise<Job | null> {
    const job = this.records.get(jobId);
    return job ? clone(job) : null;
  }

  async getByIds(jobIds: readonly string[]): Promise<Job[]> {
    const jobs = await Promise.all(jobIds.map((jobId) => this.getById(jobId)));
    return jobs.filter((job): job is Job => job !== null);
  }

  async getAll(): Promise<Job[]> {
    return [...this.records.values()]
      .map(clone)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getByStatus(...statuses: JobStatus[]): Promise<Job[]> {
    const jobs = await this.getAll();
    return jobs.filter((job) => statuses.includes(job.status));
  }

  async countByStatus(status: JobStatus): Promise<number> {
    return (await this.getByStatus(status)).length;
  }

  async deleteByStatus(...statuses: JobStatus[]): Promise<number> {
    const jobs = await this.getByStatus(...statuses);
    jobs.forEach((job) => this.records.delete(job.id));
    return jobs.length;
  }

  private assertWritable(): void {
    if (this.failWrites) {
      throw new Error('disk full');
    }
  }
}
