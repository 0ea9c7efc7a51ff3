import { Injectable } from '@nestjs/common';
import { IsIn, IsInt, IsOptional, IsPositive, Max, Min } from 'class-validator';
import { SettingsPayload } from '../../jobs/interfaces/job.interface';
import { PipelineDefinition } from '../../pipeline/pipeline.interfaces';
import {
  PipelineBuildContext,
  ProcessingKindPlugin,
  validateSettings,
} from '../processing-kind.plugin';
import { sourceClip, vapourSynthPipeline, writeScript } from './vapoursynth';

export const QUALITY_PRESETS = ['fast', 'medium', 'high'] as const;

export type QualityPreset = (typeof QUALITY_PRESETS)[number];

// Model version per preset
const PRESET_MODELS: Record<QualityPreset, string> = {
  fast: '4.6',
  medium: '4.15',
  high: '4.22',
};

export class InterpolationSettings {
  @IsInt()
  @Min(2)
  @Max(8)
  multiplier: number = 2;

  @IsOptional()
  @IsPositive()
  targetFps?: number;

  @IsIn(QUALITY_PRESETS)
  qualityPreset: QualityPreset = 'medium';
}

@Injectable()
export class InterpolationPlugin implements ProcessingKindPlugin<InterpolationSettings> {
  readonly kind = 'interpolation';
  readonly requiredTools = ['vspipe', 'ffmpeg'] as const;

  parseSettings(payload: SettingsPayload): InterpolationSettings {
    return validateSettings(this.kind, InterpolationSettings, payload);
  }

  modelFor(preset: QualityPreset): string {
    return PRESET_MODELS[preset];
  }

  async buildPipeline(
    context: PipelineBuildContext<InterpolationSettings>,
  ): Promise<PipelineDefinition> {
    const { job, settings } = context;
    const model = `v${this.modelFor(settings.qualityPreset).replace('.', '_')}`;

    const script = [
      sourceClip(job.sourceVideoPath),
      'from vsmlrt import RIFE, RIFEModel, Backend',
      "clip = core.resize.Bicubic(clip, format=vs.RGBS, matrix_in_s='709')",
      `clip = RIFE(clip, multi=${settings.multiplier}, model=RIFEModel.${model}, backend=Backend.TRT(fp16=True))`,
      "clip = core.resize.Bicubic(clip, format=vs.YUV420P8, matrix_s='709')",
    ].join('\n');
    const scriptPath = await writeScript(context.workDir, job.id, script);

    const outputArgs = settings.targetFps ? ['-r', String(settings.targetFps)] : [];
    return vapourSynthPipeline(context, scriptPath, outputArgs);
  }
}
