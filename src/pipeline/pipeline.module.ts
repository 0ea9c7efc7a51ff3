import { Module } from '@nestjs/common';
import { ProcessPipelineService } from './process-pipeline.service';
import { ChildProcessStageLauncher, StageLauncher } from './stage-launcher';

@Module({
  providers: [
    ProcessPipelineService,
    { provide: StageLauncher, useClass: ChildProcessStageLauncher },
  ],
  exports: [ProcessPipelineService],
})
export class PipelineModule {}
