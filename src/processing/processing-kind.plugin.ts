import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { Job, ProcessingKind, SettingsPayload } from '../jobs/interfaces/job.interface';
import { PipelineError } from '../pipeline/pipeline.errors';
import { PipelineDefinition } from '../pipeline/pipeline.interfaces';
import { ToolName } from './tool-locator.service';

export const PROCESSING_PLUGINS = Symbol('PROCESSING_PLUGINS');

export type ResolvedTools = Partial<Record<ToolName, string>>;

export interface PipelineBuildContext<TSettings> {
  job: Job;
  settings: TSettings;
  tools: ResolvedTools;
  // Scratch directory owned by this run
  workDir: string;
}

/**
 * Turns a job's settings payload into a pipeline definition for one
 * processing kind. `parseSettings` throws an `invalid-settings`
 * PipelineError; the queue never looks inside the payload.
 */
export interface ProcessingKindPlugin<TSettings = unknown> {
  readonly kind: ProcessingKind;
  readonly requiredTools: readonly ToolName[];
  parseSettings(payload: SettingsPayload): TSettings;
  buildPipeline(context: PipelineBuildContext<TSettings>): Promise<PipelineDefinition>;
}

function collectMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

export function validateSettings<T extends object>(
  kind: ProcessingKind,
  settingsClass: ClassConstructor<T>,
  payload: SettingsPayload,
): T {
  const settings = plainToInstance(settingsClass, payload);
  const errors = validateSync(settings, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new PipelineError(
      'invalid-settings',
      `Invalid ${kind} settings: ${collectMessages(errors).join('; ')}`,
    );
  }
  return settings;
}

export function requireTool(tools: ResolvedTools, tool: ToolName): string {
  const resolved = tools[tool];
  if (!resolved) {
    throw new PipelineError('tool-missing', `Required tool not found: ${tool}`);
  }
  return resolved;
}
