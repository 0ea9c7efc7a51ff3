import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { JobProcessorService } from './job-processor.service';
import { PROCESSING_PLUGINS, ProcessingKindPlugin } from './processing-kind.plugin';
import { InterpolationPlugin } from './plugins/interpolation.plugin';
import { ScalingPlugin } from './plugins/scaling.plugin';
import { SuperResolutionCuganPlugin } from './plugins/super-resolution-cugan.plugin';
import { SuperResolutionEsrganPlugin } from './plugins/super-resolution-esrgan.plugin';
import { ToolLocatorService } from './tool-locator.service';

const PLUGINS = [
  InterpolationPlugin,
  SuperResolutionCuganPlugin,
  SuperResolutionEsrganPlugin,
  ScalingPlugin,
];

@Module({
  imports: [PipelineModule],
  providers: [
    ...PLUGINS,
    {
      provide: PROCESSING_PLUGINS,
      useFactory: (...plugins: ProcessingKindPlugin[]) => plugins,
      inject: PLUGINS,
    },
    ToolLocatorService,
    JobProcessorService,
  ],
  exports: [JobProcessorService],
})
export class ProcessingModule {}
