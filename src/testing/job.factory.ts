import { Job } from '../jobs/interfaces/job.interface';

let sequence = 0;

export function buildJob(overrides: Partial<Job> = {}): Job {
  sequence += 1;
  const createdAt = new Date(Date.UTC(2024, 0, 1, 0, 0, sequence));
  return {
    id: `job-${sequence}`,
    name: `clip-${sequence}.mp4`,
    sourceVideoPath: `/videos/clip-${sequence}.mp4`,
    outputPath: `/videos/clip-${sequence}_scaling.mp4`,
    kind: 'scaling',
    settings: { algorithm: 'lanczos', scale: 2 },
    status: 'pending',
    createdAt,
    queuedAt: createdAt,
    startedAt: null,
    completedAt: null,
    lastUpdatedAt: createdAt,
    progressPercentage: 0,
    currentFrame: 0,
    totalFrames: null,
    estimatedTimeRemainingMs: null,
    currentPhase: null,
    lastError: null,
    errorDetail: null,
    retryCount: 0,
    maxRetries: 3,
    owningProcessId: null,
    owningHostName: null,
    outputFileSizeBytes: null,
    ...overrides,
  };
}
