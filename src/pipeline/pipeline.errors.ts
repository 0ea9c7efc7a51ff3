export const PIPELINE_ERROR_CODES = [
  'input-missing',
  'tool-missing',
  'invalid-settings',
  'preflight-timeout',
  'preflight-failed',
  'stage-failed',
  'stream-copy-failed',
  'cancelled',
] as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number];

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    readonly detail?: string,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
