import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { delay, errorMessage, linkedAbortController } from '../common/abort';
import { readBoolean, readNumber } from '../config/config.helpers';
import { INTERRUPTED_BY_RESTART_MESSAGE, QUEUE_PAUSED_POLL_MS } from '../constants';
import { PipelineError } from '../pipeline/pipeline.errors';
import { JobProcessorService, JobProgressUpdate } from '../processing/job-processor.service';
import { ConcurrencyGate } from './concurrency-gate';
import {
  CreateJobInput,
  Job,
  JOB_STATUSES,
  JobStatus,
  JobStatusGroup,
  ProcessingKind,
  QueueStatistics,
} from './interfaces/job.interface';
import { JobEventsService } from './job-events.service';
import { canTransition, isActive, isTerminal, statusesForGroup } from './job-state';
import { JobRepository } from './repository/job.repository';
import { WorkItemChannel } from './work-item.channel';

export function defaultOutputPath(sourceVideoPath: string, kind: ProcessingKind): string {
  const parsed = path.parse(sourceVideoPath);
  return path.join(parsed.dir, `${parsed.name}_${kind}.mp4`);
}

function snapshot(job: Job): Job {
  return { ...job, settings: { ...job.settings } };
}

function errorDetail(error: unknown): string | null {
  if (error instanceof PipelineError) {
    return error.detail ?? null;
  }
  return error instanceof Error ? error.stack ?? null : null;
}

function byNewest(a: Job, b: Job): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/**
 * Owns the live job cache, the dispatch loop and every status transition.
 *
 * Submissions enqueue a work item per job. One loop takes items in FIFO
 * order; each item waits while the queue is paused, takes a slot from the
 * gate and starts the run in the background, so up to MAX_CONCURRENT_JOBS
 * runs are in flight while admission stays ordered.
 */
@Injectable()
export class JobQueueService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(JobQueueService.name);

  private readonly jobs = new Map<string, Job>();
  private readonly channel = new WorkItemChannel();
  private readonly gate: ConcurrencyGate;

  // Latest enqueue per job; older work items are stale
  private readonly tickets = new Map<string, number>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly activeRuns = new Map<string, Promise<void>>();
  private readonly shutdown = new AbortController();

  private nextTicket = 0;
  private paused: boolean;
  private readonly maxRetries: number;
  private dispatchLoop: Promise<void> | null = null;

  constructor(
    private readonly repository: JobRepository,
    private readonly processor: JobProcessorService,
    private readonly events: JobEventsService,
    private readonly configService: ConfigService,
  ) {
    this.gate = new ConcurrencyGate(readNumber(this.configService, 'MAX_CONCURRENT_JOBS', 1));
    this.paused = readBoolean(this.configService, 'QUEUE_START_PAUSED', false);
    this.maxRetries = readNumber(this.configService, 'JOB_MAX_RETRIES', 3);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.recover();
    this.dispatchLoop = this.dispatch();
    this.logger.log(
      `Job queue started with ${this.gate.capacity} slot(s)${this.paused ? ', paused' : ''}`,
    );
  }

  async onApplicationShutdown(): Promise<void> {
    this.shutdown.abort('shutdown');
    const runs = [...this.activeRuns.values()];
    if (runs.length > 0) {
      this.logger.log(`Waiting for ${runs.length} running job(s) to stop`);
    }
    await Promise.allSettled(runs);
    await this.dispatchLoop;
  }

  // ---- submission and transitions ----

  async addJob(input: CreateJobInput): Promise<string> {
    const now = new Date();
    const job: Job = {
      id: uuidv4(),
      name: input.name ?? path.basename(input.sourceVideoPath),
      sourceVideoPath: input.sourceVideoPath,
      outputPath: input.outputPath ?? defaultOutputPath(input.sourceVideoPath, input.kind),
      kind: input.kind,
      settings: input.settings ?? {},
      status: 'pending',
      createdAt: now,
      queuedAt: now,
      startedAt: null,
      completedAt: null,
      lastUpdatedAt: now,
      progressPercentage: 0,
      currentFrame: 0,
      totalFrames: input.totalFrames ?? null,
      estimatedTimeRemainingMs: null,
      currentPhase: null,
      lastError: null,
      errorDetail: null,
      retryCount: 0,
      maxRetries: this.maxRetries,
      owningProcessId: null,
      owningHostName: null,
      outputFileSizeBytes: null,
    };

    await this.repository.add(job);
    this.jobs.set(job.id, job);
    this.events.emitStatus(job);
    this.enqueue(job.id);

    this.logger.log(`Queued job ${job.id} (${job.kind}) for ${job.sourceVideoPath}`);
    return job.id;
  }

  async cancelJob(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || !canTransition(job.status, 'cancelled')) {
      return false;
    }

    const now = new Date();
    job.status = 'cancelled';
    job.completedAt = now;
    job.lastUpdatedAt = now;
    job.estimatedTimeRemainingMs = null;
    // A paused job may still own a live pipeline
    this.controllers.get(jobId)?.abort('cancelled');

    await this.persist(job);
    this.events.emitStatus(job);
    this.logger.log(`Cancelled job ${jobId}`);
    return true;
  }

  /** The run notices at its next progress checkpoint and stops its pipeline. */
  async pauseJob(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'running') {
      return false;
    }

    job.status = 'paused';
    job.lastUpdatedAt = new Date();
    job.estimatedTimeRemainingMs = null;

    await this.persist(job);
    this.events.emitStatus(job);
    this.logger.log(`Paused job ${jobId}`);
    return true;
  }

  /** A run that has not yet noticed the pause is stopped; the job restarts from the beginning. */
  async resumeJob(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'paused') {
      return false;
    }
    this.controllers.get(jobId)?.abort('paused');

    const now = new Date();
    job.status = 'pending';
    job.queuedAt = now;
    job.lastUpdatedAt = now;

    await this.persist(job);
    this.events.emitStatus(job);
    this.enqueue(jobId);
    this.logger.log(`Resumed job ${jobId}`);
    return true;
  }

  /** Manual retries are allowed past maxRetries. */
  async retryJob(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || (job.status !== 'failed' && job.status !== 'cancelled')) {
      return false;
    }

    const now = new Date();
    job.status = 'pending';
    job.retryCount += 1;
    job.lastError = null;
    job.errorDetail = null;
    job.progressPercentage = 0;
    job.currentFrame = 0;
    job.currentPhase = null;
    job.estimatedTimeRemainingMs = null;
    job.completedAt = null;
    job.outputFileSizeBytes = null;
    job.queuedAt = now;
    job.lastUpdatedAt = now;

    await this.persist(job);
    this.events.emitStatus(job);
    this.enqueue(jobId);
    this.logger.log(`Retrying job ${jobId} (attempt ${job.retryCount + 1})`);
    return true;
  }

  /** Jobs with a live run are cancelled first, then removed. */
  async deleteJob(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    if (this.hasLiveRun(job)) {
      await this.cancelJob(jobId);
    }

    this.jobs.delete(jobId);
    this.tickets.delete(jobId);
    await this.repository.delete(jobId);
    this.logger.log(`Deleted job ${jobId}`);
    return true;
  }

  async clearCompletedJobs(): Promise<number> {
    for (const job of this.jobs.values()) {
      if (job.status === 'completed') {
        this.jobs.delete(job.id);
      }
    }
    const count = await this.repository.deleteByStatus('completed');
    this.logger.log(`Cleared ${count} completed jobs`);
    return count;
  }

  async clearAllJobs(): Promise<number> {
    for (const job of this.jobs.values()) {
      if (this.hasLiveRun(job)) {
        await this.cancelJob(job.id);
      }
    }
    this.jobs.clear();
    this.tickets.clear();

    const count = await this.repository.deleteByStatus(...JOB_STATUSES);
    this.logger.log(`Cleared all ${count} jobs`);
    return count;
  }

  /** Removes terminal jobs that finished before `cutoff`. */
  async removeFinishedBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const job of [...this.jobs.values()]) {
      const finishedAt = job.completedAt ?? job.lastUpdatedAt;
      if (isTerminal(job.status) && finishedAt.getTime() < cutoff.getTime()) {
        this.jobs.delete(job.id);
        this.tickets.delete(job.id);
        if (await this.repository.delete(job.id)) {
          removed++;
        }
      }
    }
    return removed;
  }

  // ---- queries ----

  getJob(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job && snapshot(job);
  }

  getAllJobs(status?: JobStatus): Job[] {
    return [...this.jobs.values()]
      .filter((job) => status === undefined || job.status === status)
      .sort(byNewest)
      .map(snapshot);
  }

  getJobsByGroup(group: JobStatusGroup): Job[] {
    const statuses = statusesForGroup(group);
    return this.getAllJobs().filter((job) => statuses.includes(job.status));
  }

  getStatistics(): QueueStatistics {
    const statistics: QueueStatistics = {
      pending: 0,
      running: 0,
      paused: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      total: 0,
    };
    for (const job of this.jobs.values()) {
      statistics[job.status]++;
      statistics.total++;
    }
    return statistics;
  }

  // ---- queue control ----

  startQueue(): void {
    if (!this.paused) {
      return;
    }
    this.paused = false;
    this.events.emitQueue(false);
    this.logger.log('Queue started');
  }

  stopQueue(): void {
    if (this.paused) {
      return;
    }
    this.paused = true;
    this.events.emitQueue(true);
    this.logger.log('Queue stopped');
  }

  isQueuePaused(): boolean {
    return this.paused;
  }

  // ---- recovery ----

  private async recover(): Promise<void> {
    const stored = (await this.repository.getAll()).reverse();
    let interrupted = 0;
    let requeued = 0;

    for (const job of stored) {
      this.jobs.set(job.id, job);

      if (job.status === 'running') {
        const now = new Date();
        job.status = 'failed';
        job.lastError = INTERRUPTED_BY_RESTART_MESSAGE;
        job.completedAt = now;
        job.lastUpdatedAt = now;
        job.estimatedTimeRemainingMs = null;
        job.owningProcessId = null;
        job.owningHostName = null;
        await this.persist(job);
        interrupted++;
      } else if (job.status === 'pending') {
        this.enqueue(job.id);
        requeued++;
      }
    }

    this.logger.log(
      `Loaded ${stored.length} job(s): ${requeued} re-queued, ${interrupted} marked as interrupted`,
    );
  }

  // ---- dispatch ----

  private enqueue(jobId: string): void {
    const ticket = ++this.nextTicket;
    this.tickets.set(jobId, ticket);
    this.channel.write((signal) => this.admit(jobId, ticket, signal));
  }

  private async dispatch(): Promise<void> {
    const { signal } = this.shutdown;
    while (!signal.aborted) {
      try {
        const item = await this.channel.read(signal);
        await item(signal);
      } catch (error) {
        if (!signal.aborted) {
          this.logger.error(`Dispatch error: ${errorMessage(error)}`);
        }
      }
    }
  }

  private eligible(jobId: string, ticket: number): Job | undefined {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'pending' || this.tickets.get(jobId) !== ticket) {
      return undefined;
    }
    return job;
  }

  private async admit(jobId: string, ticket: number, signal: AbortSignal): Promise<void> {
    while (this.paused) {
      await delay(QUEUE_PAUSED_POLL_MS, signal);
    }
    if (!this.eligible(jobId, ticket)) {
      return;
    }

    // A stopped run of the same job must settle before the next one starts.
    // The item goes back on the channel then, so other work is not held up.
    const previous = this.activeRuns.get(jobId);
    if (previous) {
      const readmit = () => this.channel.write((next) => this.admit(jobId, ticket, next));
      void previous.then(readmit, readmit);
      return;
    }

    await this.gate.acquire(signal);
    const job = this.eligible(jobId, ticket);
    if (!job) {
      this.gate.release();
      return;
    }

    const { controller, detach } = linkedAbortController(signal);
    this.controllers.set(jobId, controller);

    const run: Promise<void> = this.runJob(job, controller).finally(() => {
      detach();
      this.gate.release();
      if (this.controllers.get(jobId) === controller) {
        this.controllers.delete(jobId);
      }
      if (this.activeRuns.get(jobId) === run) {
        this.activeRuns.delete(jobId);
      }
      this.pauseIfDrained();
    });
    this.activeRuns.set(jobId, run);
  }

  private async runJob(job: Job, controller: AbortController): Promise<void> {
    const startedAt = new Date();
    job.status = 'running';
    job.startedAt = startedAt;
    job.lastUpdatedAt = startedAt;
    job.progressPercentage = 0;
    job.currentFrame = 0;
    job.currentPhase = null;
    job.estimatedTimeRemainingMs = null;
    job.owningProcessId = process.pid;
    job.owningHostName = os.hostname();

    await this.persist(job);
    this.events.emitStatus(job);
    this.logger.log(`Starting job ${job.id} (${job.kind})`);

    let lastPersistedPercent = -1;
    const onProgress = (update: JobProgressUpdate) => {
      // Pause and cancel are observed here
      if (job.status !== 'running') {
        controller.abort(job.status);
        return;
      }
      job.progressPercentage = update.percentage;
      job.currentPhase = update.phase;
      job.estimatedTimeRemainingMs = update.estimatedTimeRemainingMs;
      if (update.currentFrame !== undefined) {
        job.currentFrame = update.currentFrame;
      }
      if (update.totalFrames !== undefined) {
        job.totalFrames = update.totalFrames;
      }
      job.lastUpdatedAt = new Date();
      this.events.emitProgress(job);

      const wholePercent = Math.floor(update.percentage);
      if (wholePercent !== lastPersistedPercent) {
        lastPersistedPercent = wholePercent;
        void this.persist(job);
      }
    };

    try {
      const result = await this.processor.process(job, { signal: controller.signal, onProgress });
      // A pause the run never observed has nothing left to pause
      if (job.status === 'running' || job.status === 'paused') {
        job.status = 'completed';
        job.progressPercentage = 100;
        job.estimatedTimeRemainingMs = 0;
        job.completedAt = new Date();
        job.outputFileSizeBytes = result.outputFileSizeBytes;
        this.logger.log(`Job ${job.id} completed`);
      }
    } catch (error) {
      if (job.status !== 'running') {
        this.logger.log(`Job ${job.id} stopped (${job.status})`);
      } else if (this.shutdown.signal.aborted) {
        // Left running on disk; the next start marks it interrupted
        this.logger.warn(`Job ${job.id} interrupted by shutdown`);
        return;
      } else {
        job.status = 'failed';
        job.lastError = errorMessage(error);
        job.errorDetail = errorDetail(error);
        job.estimatedTimeRemainingMs = null;
        job.completedAt = new Date();
        this.logger.error(`Job ${job.id} failed: ${job.lastError}`);
      }
    }

    job.owningProcessId = null;
    job.owningHostName = null;
    job.lastUpdatedAt = new Date();
    await this.persist(job);
    this.events.emitStatus(job);
  }

  private hasLiveRun(job: Job): boolean {
    return job.status === 'running' || this.controllers.has(job.id);
  }

  private pauseIfDrained(): void {
    if (this.paused || this.shutdown.signal.aborted) {
      return;
    }
    for (const job of this.jobs.values()) {
      if (isActive(job.status)) {
        return;
      }
    }
    this.paused = true;
    this.events.emitQueue(true);
    this.logger.log('No jobs left, queue paused');
  }

  private async persist(job: Job): Promise<void> {
    try {
      await this.repository.update(job);
    } catch (error) {
      this.logger.error(`Failed to persist job ${job.id}: ${errorMessage(error)}`);
    }
  }
}
