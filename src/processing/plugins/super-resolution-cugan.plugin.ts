import { Injectable } from '@nestjs/common';
import { IsBoolean, IsInt, Max, Min } from 'class-validator';
import { SettingsPayload } from '../../jobs/interfaces/job.interface';
import { PipelineError } from '../../pipeline/pipeline.errors';
import { PipelineDefinition } from '../../pipeline/pipeline.interfaces';
import {
  PipelineBuildContext,
  ProcessingKindPlugin,
  validateSettings,
} from '../processing-kind.plugin';
import { pythonBool, sourceClip, vapourSynthPipeline, writeScript } from './vapoursynth';

export class CuganSettings {
  @IsInt()
  @Min(2)
  @Max(4)
  scale: number = 2;

  // -1 disables denoising
  @IsInt()
  @Min(-1)
  @Max(3)
  noiseLevel: number = -1;

  @IsBoolean()
  useFp16: boolean = true;
}

@Injectable()
export class SuperResolutionCuganPlugin implements ProcessingKindPlugin<CuganSettings> {
  readonly kind = 'super-resolution-cugan';
  readonly requiredTools = ['vspipe', 'ffmpeg'] as const;

  parseSettings(payload: SettingsPayload): CuganSettings {
    const settings = validateSettings(this.kind, CuganSettings, payload);
    // The 3x and 4x models only ship without denoising or with level 3
    if (settings.scale !== 2 && (settings.noiseLevel === 1 || settings.noiseLevel === 2)) {
      throw new PipelineError(
        'invalid-settings',
        `Invalid ${this.kind} settings: noise level ${settings.noiseLevel} is only available at scale 2`,
      );
    }
    return settings;
  }

  async buildPipeline(context: PipelineBuildContext<CuganSettings>): Promise<PipelineDefinition> {
    const { job, settings } = context;
    const script = [
      sourceClip(job.sourceVideoPath),
      'from vsmlrt import CUGAN, Backend',
      "clip = core.resize.Bicubic(clip, format=vs.RGBS, matrix_in_s='709')",
      `clip = CUGAN(clip, noise=${settings.noiseLevel}, scale=${settings.scale}, backend=Backend.TRT(fp16=${pythonBool(settings.useFp16)}))`,
      "clip = core.resize.Bicubic(clip, format=vs.YUV420P8, matrix_s='709')",
    ].join('\n');
    const scriptPath = await writeScript(context.workDir, job.id, script);
    return vapourSynthPipeline(context, scriptPath);
  }
}
