import { Injectable } from '@nestjs/common';
import { IsBoolean, IsIn, IsInt, Max, Min } from 'class-validator';
import { SettingsPayload } from '../../jobs/interfaces/job.interface';
import { PipelineDefinition } from '../../pipeline/pipeline.interfaces';
import {
  PipelineBuildContext,
  ProcessingKindPlugin,
  validateSettings,
} from '../processing-kind.plugin';
import { pythonBool, sourceClip, vapourSynthPipeline, writeScript } from './vapoursynth';

// Model name -> [enum member, native scale]
const ESRGAN_MODELS = {
  RealESRGAN_x4plus: ['RealESRGAN_x4plus', 4],
  RealESRGAN_x4plus_anime_6B: ['RealESRGAN_x4plus_anime_6B', 4],
  RealESRGAN_x2plus: ['RealESRGAN_x2plus', 2],
  'realesr-general-x4v3': ['realesr_general_x4v3', 4],
  'RealESRGAN_AnimeVideo-v3': ['RealESRGAN_AnimeVideo_v3', 4],
} as const satisfies Record<string, readonly [string, number]>;

export type EsrganModel = keyof typeof ESRGAN_MODELS;

export const ESRGAN_MODEL_NAMES = Object.keys(ESRGAN_MODELS);

export class EsrganSettings {
  @IsIn(ESRGAN_MODEL_NAMES)
  model: EsrganModel = 'RealESRGAN_x4plus';

  @IsInt()
  @Min(2)
  @Max(4)
  scale: number = 4;

  // 0 disables tiling
  @IsInt()
  @Min(0)
  tileSize: number = 0;

  @IsBoolean()
  useFp16: boolean = true;
}

@Injectable()
export class SuperResolutionEsrganPlugin implements ProcessingKindPlugin<EsrganSettings> {
  readonly kind = 'super-resolution-esrgan';
  readonly requiredTools = ['vspipe', 'ffmpeg'] as const;

  parseSettings(payload: SettingsPayload): EsrganSettings {
    return validateSettings(this.kind, EsrganSettings, payload);
  }

  async buildPipeline(context: PipelineBuildContext<EsrganSettings>): Promise<PipelineDefinition> {
    const { job, settings } = context;
    const [member, nativeScale] = ESRGAN_MODELS[settings.model];
    const tile = settings.tileSize > 0 ? `[${settings.tileSize}, ${settings.tileSize}]` : 'None';
    const format = settings.useFp16 ? 'vs.RGBH' : 'vs.RGBS';

    const lines = [
      sourceClip(job.sourceVideoPath),
      'from vsrealesrgan import realesrgan, RealESRGANModel',
      `clip = core.resize.Bicubic(clip, format=${format}, matrix_in_s='709')`,
      `clip = realesrgan(clip, model=RealESRGANModel.${member}, tile=${tile}, trt=${pythonBool(false)}, auto_download=True)`,
    ];
    if (nativeScale !== settings.scale) {
      lines.push(
        `clip = core.resize.Lanczos(clip, width=src_width * ${settings.scale}, height=src_height * ${settings.scale})`,
      );
    }
    lines.push("clip = core.resize.Bicubic(clip, format=vs.YUV420P8, matrix_s='709')");

    const scriptPath = await writeScript(context.workDir, job.id, lines.join('\n'));
    return vapourSynthPipeline(context, scriptPath);
  }
}
