import {
  MAX_ERROR_DETAIL_LENGTH,
  MAX_ERROR_LENGTH,
} from '../../constants';
import {
  Job,
  isJobStatus,
  isProcessingKind,
  isProgressPhase,
  ProgressPhase,
  SettingsPayload,
} from '../interfaces/job.interface';

/** On-disk shape of a job: dates as ISO strings, error fields bounded. */
export interface JobRecord {
  id: string;
  name: string;
  sourceVideoPath: string;
  outputPath: string;
  kind: string;
  settings: SettingsPayload;
  status: string;
  createdAt: string;
  queuedAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
  lastUpdatedAt: string;
  progressPercentage: number;
  currentFrame: number;
  totalFrames: number | null;
  estimatedTimeRemainingMs: number | null;
  currentPhase: string | null;
  lastError: string | null;
  errorDetail: string | null;
  retryCount: number;
  maxRetries: number;
  owningProcessId: number | null;
  owningHostName: string | null;
  outputFileSizeBytes: number | null;
}

export class InvalidJobRecordError extends Error {
  constructor(field: string) {
    super(`Invalid job record: field "${field}" is missing or malformed`);
    this.name = 'InvalidJobRecordError';
  }
}

export function truncateHead(value: string | null, max: number): string | null {
  if (value === null || value.length <= max) {
    return value;
  }
  return value.slice(0, max);
}

// Keeps the end: stderr tails carry the useful part
export function truncateTail(value: string | null, max: number): string | null {
  if (value === null || value.length <= max) {
    return value;
  }
  return `...${value.slice(value.length - (max - 3))}`;
}

export function toJobRecord(job: Job): JobRecord {
  return {
    id: job.id,
    name: job.name,
    sourceVideoPath: job.sourceVideoPath,
    outputPath: job.outputPath,
    kind: job.kind,
    settings: job.settings,
    status: job.status,
    createdAt: job.createdAt.toISOString(),
    queuedAt: job.queuedAt?.toISOString() ?? null,
    startedAt: job.startedAt?.toISOString() ?? null,
    completedAt: job.completedAt?.toISOString() ?? null,
    lastUpdatedAt: job.lastUpdatedAt.toISOString(),
    progressPercentage: job.progressPercentage,
    currentFrame: job.currentFrame,
    totalFrames: job.totalFrames,
    estimatedTimeRemainingMs: job.estimatedTimeRemainingMs,
    currentPhase: job.currentPhase,
    lastError: truncateHead(job.lastError, MAX_ERROR_LENGTH),
    errorDetail: truncateTail(job.errorDetail, MAX_ERROR_DETAIL_LENGTH),
    retryCount: job.retryCount,
    maxRetries: job.maxRetries,
    owningProcessId: job.owningProcessId,
    owningHostName: job.owningHostName,
    outputFileSizeBytes: job.outputFileSizeBytes,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new InvalidJobRecordError(field);
  }
  return value;
}

function optionalString(
  raw: Record<string, unknown>,
  field: string,
): string | null {
  const value = raw[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new InvalidJobRecordError(field);
  }
  return value;
}

function requireNumber(
  raw: Record<string, unknown>,
  field: string,
  fallback?: number,
): number {
  const value = raw[field];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidJobRecordError(field);
  }
  return value;
}

function optionalNumber(
  raw: Record<string, unknown>,
  field: string,
): number | null {
  const value = raw[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidJobRecordError(field);
  }
  return value;
}

function requireDate(raw: Record<string, unknown>, field: string): Date {
  const date = new Date(requireString(raw, field));
  if (Number.isNaN(date.getTime())) {
    throw new InvalidJobRecordError(field);
  }
  return date;
}

function optionalDate(raw: Record<string, unknown>, field: string): Date | null {
  const value = optionalString(raw, field);
  if (value === null) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidJobRecordError(field);
  }
  return date;
}

/**
 * Rebuild a job from parsed JSON. Throws InvalidJobRecordError when the
 * record does not describe a job.
 */
export function fromJobRecord(raw: unknown): Job {
  if (!isObject(raw)) {
    throw new InvalidJobRecordError('<root>');
  }

  const kind = raw.kind;
  if (!isProcessingKind(kind)) {
    throw new InvalidJobRecordError('kind');
  }
  const status = raw.status;
  if (!isJobStatus(status)) {
    throw new InvalidJobRecordError('status');
  }
  const settings = raw.settings ?? {};
  if (!isObject(settings)) {
    throw new InvalidJobRecordError('settings');
  }
  const phase = raw.currentPhase ?? null;
  let currentPhase: ProgressPhase | null = null;
  if (phase !== null) {
    if (!isProgressPhase(phase)) {
      throw new InvalidJobRecordError('currentPhase');
    }
    currentPhase = phase;
  }

  const sourceVideoPath = requireString(raw, 'sourceVideoPath');

  return {
    id: requireString(raw, 'id'),
    name: optionalString(raw, 'name') ?? sourceVideoPath,
    sourceVideoPath,
    outputPath: requireString(raw, 'outputPath'),
    kind,
    settings,
    status,
    createdAt: requireDate(raw, 'createdAt'),
    queuedAt: optionalDate(raw, 'queuedAt'),
    startedAt: optionalDate(raw, 'startedAt'),
    completedAt: optionalDate(raw, 'completedAt'),
    lastUpdatedAt: requireDate(raw, 'lastUpdatedAt'),
    progressPercentage: requireNumber(raw, 'progressPercentage', 0),
    currentFrame: requireNumber(raw, 'currentFrame', 0),
    totalFrames: optionalNumber(raw, 'totalFrames'),
    estimatedTimeRemainingMs: optionalNumber(raw, 'estimatedTimeRemainingMs'),
    currentPhase,
    lastError: optionalString(raw, 'lastError'),
    errorDetail: optionalString(raw, 'errorDetail'),
    retryCount: requireNumber(raw, 'retryCount', 0),
    maxRetries: requireNumber(raw, 'maxRetries', 0),
    owningProcessId: optionalNumber(raw, 'owningProcessId'),
    owningHostName: optionalString(raw, 'owningHostName'),
    outputFileSizeBytes: optionalNumber(raw, 'outputFileSizeBytes'),
  };
}
