export interface StageProgress {
  percentage: number; // 0-100 within the stage
  currentFrame?: number;
  totalFrames?: number;
}

/** Returns progress when the line carries any, otherwise undefined. */
export type DiagnosticLineHandler = (line: string) => StageProgress | undefined;

export interface StageDefinition {
  name: string;
  command: string;
  args: string[];
  // Time between SIGINT and SIGKILL on cancellation
  gracePeriodMs: number;
  onDiagnosticLine?: DiagnosticLineHandler;
}

export interface PreflightDefinition {
  command: string;
  args: string[];
  timeoutMs?: number;
}

/**
 * One producer, optionally piped into a consumer. Temp files are removed
 * once the run ends, whatever the outcome.
 */
export interface PipelineDefinition {
  stages: [StageDefinition] | [StageDefinition, StageDefinition];
  preflight?: PreflightDefinition;
  tempFiles: string[];
}

export interface PipelineRunOptions {
  signal: AbortSignal;
  onProgress?: (progress: StageProgress) => void;
  onPreflightComplete?: () => void;
}
