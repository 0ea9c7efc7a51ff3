export const JOB_STATUSES = [
  'pending',
  'running',
  'paused',
  'completed',
  'failed',
  'cancelled',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const PROCESSING_KINDS = [
  'interpolation',
  'super-resolution-cugan',
  'super-resolution-esrgan',
  'scaling',
] as const;

export type ProcessingKind = (typeof PROCESSING_KINDS)[number];

export const PROGRESS_PHASES = [
  'analyze',
  'extract-audio',
  'extract-frames',
  'transform',
  'reassemble',
] as const;

export type ProgressPhase = (typeof PROGRESS_PHASES)[number];

/**
 * Kind-specific settings as submitted. Only the plugin registered for the
 * job's kind reads it.
 */
export type SettingsPayload = Record<string, unknown>;

export interface Job {
  id: string;
  name: string;
  sourceVideoPath: string;
  outputPath: string;
  kind: ProcessingKind;
  settings: SettingsPayload;
  status: JobStatus;

  createdAt: Date;
  queuedAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
  lastUpdatedAt: Date;

  progressPercentage: number; // 0-100
  currentFrame: number;
  totalFrames: number | null;
  estimatedTimeRemainingMs: number | null;
  currentPhase: ProgressPhase | null;

  lastError: string | null;
  errorDetail: string | null;
  retryCount: number;
  maxRetries: number;

  // Set while a run owns the job, used to spot orphans after a restart
  owningProcessId: number | null;
  owningHostName: string | null;

  outputFileSizeBytes: number | null;
}

export interface CreateJobInput {
  sourceVideoPath: string;
  outputPath?: string;
  kind: ProcessingKind;
  settings?: SettingsPayload;
  name?: string;
  totalFrames?: number;
}

export type JobStatusGroup = 'active' | 'completed' | 'failed';

export interface QueueStatistics {
  pending: number;
  running: number;
  paused: number;
  completed: number;
  failed: number;
  cancelled: number;
  total: number;
}

export function isJobStatus(value: unknown): value is JobStatus {
  return (
    typeof value === 'string' &&
    (JOB_STATUSES as readonly string[]).includes(value)
  );
}

export function isProcessingKind(value: unknown): value is ProcessingKind {
  return (
    typeof value === 'string' &&
    (PROCESSING_KINDS as readonly string[]).includes(value)
  );
}

export function isProgressPhase(value: unknown): value is ProgressPhase {
  return (
    typeof value === 'string' &&
    (PROGRESS_PHASES as readonly string[]).includes(value)
  );
}
