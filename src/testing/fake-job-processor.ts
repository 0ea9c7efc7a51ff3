import { Job } from '../jobs/interfaces/job.interface';
import { PipelineError } from '../pipeline/pipeline.errors';
import {
  JobProgressUpdate,
  ProcessingHooks,
  ProcessingResult,
} from '../processing/job-processor.service';
import { waitFor } from './wait-for';

export interface FakeRun {
  jobId: string;
  signal: AbortSignal;
  progress(update: Partial<JobProgressUpdate> & { percentage: number }): void;
  succeed(outputFileSizeBytes?: number): void;
  fail(error: Error): void;
}

/**
 * Stands in for JobProcessorService. Each call stays open until the test
 * settles it; aborting the signal rejects it like a stopped pipeline.
 */
export class FakeJobProcessor {
  readonly runs: FakeRun[] = [];
  /** When false, an aborted run stays open, like a stage inside its grace period. */
  stopsOnAbort = true;

  process(job: Job, hooks: ProcessingHooks): Promise<ProcessingResult> {
    return new Promise<ProcessingResult>((resolve, reject) => {
      if (this.stopsOnAbort) {
        hooks.signal.addEventListener(
          'abort',
          () => reject(new PipelineError('cancelled', 'Processing cancelled')),
          { once: true },
        );
      }
      this.runs.push({
        jobId: job.id,
        signal: hooks.signal,
        progress: (update) =>
          hooks.onProgress({ phase: 'transform', estimatedTimeRemainingMs: null, ...update }),
        succeed: (outputFileSizeBytes = 1024) => resolve({ outputFileSizeBytes }),
        fail: reject,
      });
    });
  }

  async waitForRun(index: number): Promise<FakeRun> {
    await waitFor(() => this.runs.length > index, 2000, `run #${index}`);
    return this.runs[index];
  }
}
