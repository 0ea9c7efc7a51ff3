import { JobStatus, ProgressPhase } from './job.interface';

export interface JobProgressEvent {
  jobId: string;
  status: JobStatus;
  progressPercentage: number;
  currentFrame: number;
  totalFrames: number | null;
  estimatedTimeRemainingMs: number | null;
  phase: ProgressPhase | null;
  errorMessage?: string | null; // status events only
}

export interface QueueStatusEvent {
  paused: boolean;
}
