import { Injectable, MessageEvent, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject, map, merge } from 'rxjs';
import { Job } from './interfaces/job.interface';
import { JobProgressEvent, QueueStatusEvent } from './interfaces/job-event.interface';

function toProgressEvent(job: Job): JobProgressEvent {
  return {
    jobId: job.id,
    status: job.status,
    progressPercentage: job.progressPercentage,
    currentFrame: job.currentFrame,
    totalFrames: job.totalFrames,
    estimatedTimeRemainingMs: job.estimatedTimeRemainingMs,
    phase: job.currentPhase,
  };
}

/**
 * Publish side of job notifications. Subjects deliver synchronously, so
 * events for one job arrive in emission order.
 */
@Injectable()
export class JobEventsService implements OnModuleDestroy {
  readonly progress$ = new Subject<JobProgressEvent>();
  readonly status$ = new Subject<JobProgressEvent>();
  readonly queue$ = new Subject<QueueStatusEvent>();

  emitProgress(job: Job): void {
    this.progress$.next(toProgressEvent(job));
  }

  emitStatus(job: Job): void {
    this.status$.next({ ...toProgressEvent(job), errorMessage: job.lastError });
  }

  emitQueue(paused: boolean): void {
    this.queue$.next({ paused });
  }

  /** All notifications as server-sent events. */
  stream(): Observable<MessageEvent> {
    return merge(
      this.progress$.pipe(map((data): MessageEvent => ({ type: 'progress', data }))),
      this.status$.pipe(map((data): MessageEvent => ({ type: 'status', data }))),
      this.queue$.pipe(map((data): MessageEvent => ({ type: 'queue', data }))),
    );
  }

  onModuleDestroy(): void {
    this.progress$.complete();
    this.status$.complete();
    this.queue$.complete();
  }
}
