import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { errorMessage } from '../common/abort';
import { readString } from '../config/config.helpers';
import { DEFAULT_DATA_DIR, WORK_SUBDIR } from '../constants';
import { Job, ProcessingKind, ProgressPhase } from '../jobs/interfaces/job.interface';
import { PipelineError } from '../pipeline/pipeline.errors';
import { PipelineDefinition } from '../pipeline/pipeline.interfaces';
import { ProcessPipelineService } from '../pipeline/process-pipeline.service';
import {
  DEFAULT_PHASE_WEIGHTS,
  PhaseWeights,
  ProgressTracker,
  parsePhaseWeights,
} from '../pipeline/progress-tracker';
import {
  PROCESSING_PLUGINS,
  PipelineBuildContext,
  ProcessingKindPlugin,
  ResolvedTools,
} from './processing-kind.plugin';
import { ToolLocatorService } from './tool-locator.service';

export interface JobProgressUpdate {
  phase: ProgressPhase;
  percentage: number;
  currentFrame?: number;
  totalFrames?: number;
  estimatedTimeRemainingMs: number | null;
}

export interface ProcessingHooks {
  signal: AbortSignal;
  onProgress: (update: JobProgressUpdate) => void;
}

export interface ProcessingResult {
  outputFileSizeBytes: number | null;
}

/**
 * Runs one job end to end: input check, settings, tool lookup, pipeline,
 * output stat. Every failure surfaces as a PipelineError.
 */
@Injectable()
export class JobProcessorService {
  private readonly logger = new Logger(JobProcessorService.name);
  private readonly plugins = new Map<ProcessingKind, ProcessingKindPlugin>();
  private readonly weights: PhaseWeights;
  private readonly workRoot: string;

  constructor(
    @Inject(PROCESSING_PLUGINS) plugins: ProcessingKindPlugin[],
    private readonly toolLocator: ToolLocatorService,
    private readonly pipeline: ProcessPipelineService,
    private readonly configService: ConfigService,
  ) {
    for (const plugin of plugins) {
      this.plugins.set(plugin.kind, plugin);
    }
    this.weights = this.loadWeights();
    const dataDir = readString(this.configService, 'DATA_DIR') ?? DEFAULT_DATA_DIR;
    this.workRoot = path.join(dataDir, WORK_SUBDIR);
  }

  async process(job: Job, hooks: ProcessingHooks): Promise<ProcessingResult> {
    const tracker = new ProgressTracker(this.weights);
    const report = (
      phase: ProgressPhase,
      phasePercentage: number,
      frames: { currentFrame?: number; totalFrames?: number } = {},
    ) => {
      const snapshot = tracker.report(phase, phasePercentage);
      hooks.onProgress({ ...snapshot, ...frames });
    };
    const ensureActive = () => {
      if (hooks.signal.aborted) {
        throw new PipelineError('cancelled', 'Processing cancelled');
      }
    };

    report('analyze', 0);
    await this.assertInputExists(job.sourceVideoPath);

    const plugin = this.plugins.get(job.kind);
    if (!plugin) {
      throw new PipelineError(
        'invalid-settings',
        `No processor registered for kind ${job.kind}`,
      );
    }
    const settings = plugin.parseSettings(job.settings);
    const tools = await this.resolveTools(plugin);
    ensureActive();

    const workDir = path.join(this.workRoot, job.id);
    try {
      await fsPromises.mkdir(path.dirname(job.outputPath), { recursive: true });
      const definition = await this.buildDefinition(plugin, { job, settings, tools, workDir });
      ensureActive();

      this.logger.log(`Running ${job.kind} pipeline for job ${job.id}`);
      await this.pipeline.run(definition, {
        signal: hooks.signal,
        onPreflightComplete: () => report('analyze', 100),
        onProgress: (progress) =>
          report('transform', progress.percentage, {
            currentFrame: progress.currentFrame,
            totalFrames: progress.totalFrames,
          }),
      });
    } finally {
      await fsPromises.rm(workDir, { recursive: true, force: true });
    }

    report('reassemble', 100);
    return { outputFileSizeBytes: await this.outputSize(job.outputPath) };
  }

  private async assertInputExists(sourcePath: string): Promise<void> {
    const stats = await fsPromises.stat(sourcePath).catch(() => null);
    if (!stats?.isFile()) {
      throw new PipelineError('input-missing', `Input video not found: ${sourcePath}`);
    }
  }

  private async resolveTools(plugin: ProcessingKindPlugin): Promise<ResolvedTools> {
    const tools: ResolvedTools = {};
    for (const tool of plugin.requiredTools) {
      const resolved = await this.toolLocator.locate(tool);
      if (!resolved) {
        throw new PipelineError(
          'tool-missing',
          `Required tool not found: ${tool}. Install it or set ${tool.toUpperCase()}_PATH`,
        );
      }
      tools[tool] = resolved;
    }
    return tools;
  }

  private async buildDefinition(
    plugin: ProcessingKindPlugin,
    context: PipelineBuildContext<unknown>,
  ): Promise<PipelineDefinition> {
    try {
      return await plugin.buildPipeline(context);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new PipelineError(
        'invalid-settings',
        `Could not prepare ${plugin.kind} pipeline: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }

  private async outputSize(outputPath: string): Promise<number | null> {
    try {
      return (await fsPromises.stat(outputPath)).size;
    } catch (error) {
      this.logger.error(`Error getting file size for ${outputPath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private loadWeights(): PhaseWeights {
    try {
      return parsePhaseWeights(readString(this.configService, 'PROGRESS_WEIGHTS'));
    } catch (error) {
      this.logger.warn(`Ignoring PROGRESS_WEIGHTS: ${errorMessage(error)}`);
      return { ...DEFAULT_PHASE_WEIGHTS };
    }
  }
}
