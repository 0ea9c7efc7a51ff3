import { Injectable } from '@nestjs/common';
import { IsIn, IsInt, IsOptional, IsPositive, Max, Min } from 'class-validator';
import { CONSUMER_GRACE_PERIOD_MS } from '../../constants';
import { SettingsPayload } from '../../jobs/interfaces/job.interface';
import { parseEncoderProgress } from '../../pipeline/frame-progress';
import { PipelineDefinition } from '../../pipeline/pipeline.interfaces';
import {
  PipelineBuildContext,
  ProcessingKindPlugin,
  requireTool,
  validateSettings,
} from '../processing-kind.plugin';

export const SCALING_ALGORITHMS = ['lanczos', 'bicubic', 'xbr', 'hqx'] as const;

export type ScalingAlgorithm = (typeof SCALING_ALGORITHMS)[number];

export class ScalingSettings {
  @IsIn(SCALING_ALGORITHMS)
  algorithm: ScalingAlgorithm = 'lanczos';

  @IsInt()
  @Min(2)
  @Max(4)
  scale: number = 2;

  // Used for progress when the frame count is unknown
  @IsOptional()
  @IsPositive()
  durationSeconds?: number;
}

function videoFilter(settings: ScalingSettings): string {
  switch (settings.algorithm) {
    case 'xbr':
    case 'hqx':
      return `${settings.algorithm}=n=${settings.scale}`;
    default:
      return `scale=iw*${settings.scale}:ih*${settings.scale}:flags=${settings.algorithm}`;
  }
}

/** Plain ffmpeg filter upscale, no frame server involved. */
@Injectable()
export class ScalingPlugin implements ProcessingKindPlugin<ScalingSettings> {
  readonly kind = 'scaling';
  readonly requiredTools = ['ffmpeg'] as const;

  parseSettings(payload: SettingsPayload): ScalingSettings {
    return validateSettings(this.kind, ScalingSettings, payload);
  }

  async buildPipeline(context: PipelineBuildContext<ScalingSettings>): Promise<PipelineDefinition> {
    const { job, settings } = context;
    const totals = { totalFrames: job.totalFrames, durationSeconds: settings.durationSeconds };

    return {
      stages: [
        {
          name: 'ffmpeg',
          command: requireTool(context.tools, 'ffmpeg'),
          args: [
            '-hide_banner',
            '-y',
            '-i',
            job.sourceVideoPath,
            '-vf',
            videoFilter(settings),
            '-c:v',
            'libx264',
            '-preset',
            'fast',
            '-crf',
            '18',
            '-pix_fmt',
            'yuv420p',
            '-c:a',
            'copy',
            job.outputPath,
          ],
          gracePeriodMs: CONSUMER_GRACE_PERIOD_MS,
          onDiagnosticLine: (line) => parseEncoderProgress(line, totals),
        },
      ],
      tempFiles: [],
    };
  }
}
