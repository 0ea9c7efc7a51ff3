import { JobStatus, JobStatusGroup } from './interfaces/job.interface';

/**
 * Allowed status transitions.
 *
 *   pending  → running | cancelled
 *   running  → completed | failed | cancelled | paused
 *   paused   → pending | cancelled | completed (run finished before it saw the pause)
 *   failed | cancelled → pending (retry)
 *   completed is final
 */
const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled', 'paused'],
  paused: ['pending', 'cancelled', 'completed'],
  completed: [],
  failed: ['pending'],
  cancelled: ['pending'],
};

export const ACTIVE_STATUSES: readonly JobStatus[] = [
  'pending',
  'running',
  'paused',
];

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  'completed',
  'failed',
  'cancelled',
];

const STATUS_GROUPS: Readonly<Record<JobStatusGroup, readonly JobStatus[]>> = {
  active: ACTIVE_STATUSES,
  completed: ['completed'],
  failed: ['failed', 'cancelled'],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isActive(status: JobStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function statusesForGroup(group: JobStatusGroup): readonly JobStatus[] {
  return STATUS_GROUPS[group];
}
