import * as path from 'path';

export const DEFAULT_DATA_DIR = path.join(process.cwd(), 'data');

export const JOBS_SUBDIR = 'jobs';
export const WORK_SUBDIR = 'work';

// Polling interval while the queue is paused.
export const QUEUE_PAUSED_POLL_MS = 500;

// Producer gets longer so the consumer can flush before its feed disappears.
export const PRODUCER_GRACE_PERIOD_MS = 3000;
export const CONSUMER_GRACE_PERIOD_MS = 2000;

// 20 minutes: first model load may compile engines.
export const DEFAULT_PREFLIGHT_TIMEOUT_MS = 20 * 60 * 1000;

export const INTERRUPTED_BY_RESTART_MESSAGE = 'Job interrupted by restart';

// Persisted field bounds
export const MAX_PATH_LENGTH = 1024;
export const MAX_ERROR_LENGTH = 2048;
export const MAX_ERROR_DETAIL_LENGTH = 8192;
