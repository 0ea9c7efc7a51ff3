import { ConfigService } from '@nestjs/config';
import { PipelineError } from './pipeline.errors';
import { StageDefinition } from './pipeline.interfaces';
import { ProcessPipelineService } from './process-pipeline.service';
import { ChildProcessStageLauncher, StageProcess } from './stage-launcher';

const node = process.execPath;

function script(name: string, source: string, gracePeriodMs = 300): StageDefinition {
  return { name, command: node, args: ['-e', source], gracePeriodMs };
}

async function firstStderrLine(stage: StageProcess): Promise<string> {
  return new Promise<string>((resolve) => {
    stage.stderr.once('data', (chunk: Buffer) => resolve(chunk.toString().trim()));
  });
}

describe('ChildProcessStageLauncher', () => {
  const launcher = new ChildProcessStageLauncher();

  it('reports the exit code once the process has closed', async () => {
    const stage = launcher.launch(node, ['-e', 'process.exit(3)'], { stdin: 'ignore' });

    expect(stage.hasExited).toBe(false);
    await expect(stage.exited).resolves.toEqual({ code: 3, signal: null });
    expect(stage.hasExited).toBe(true);
  });

  it('resolves with the spawn error of a missing executable', async () => {
    const stage = launcher.launch('/nonexistent/encoder', [], { stdin: 'ignore' });

    const exit = await stage.exited;

    expect(exit.code).toBeNull();
    expect(exit.error?.code).toBe('ENOENT');
    expect(stage.hasExited).toBe(true);
  });

  it('kills a process that ignores SIGINT', async () => {
    const stage = launcher.launch(
      node,
      ['-e', "process.on('SIGINT', () => {}); setInterval(() => {}, 1000); console.error('ready')"],
      { stdin: 'ignore' },
    );
    await expect(firstStderrLine(stage)).resolves.toBe('ready');

    await stage.signal('SIGINT');
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(stage.hasExited).toBe(false);

    await stage.signal('SIGKILL');
    await expect(stage.exited).resolves.toEqual({ code: null, signal: 'SIGKILL' });
  });
});

describe('ProcessPipelineService with real processes', () => {
  const service = new ProcessPipelineService(new ChildProcessStageLauncher(), new ConfigService());

  it('fails when the consumer exits non-zero after a clean producer', async () => {
    const producer = script('producer', "process.stdout.write('frames')");
    const consumer = script(
      'consumer',
      "process.stdin.resume(); process.stdin.on('end', () => process.exit(1))",
    );

    const error = await service
      .run({ stages: [producer, consumer], tempFiles: [] }, { signal: new AbortController().signal })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      code: 'stage-failed',
      message: 'Pipeline stage failed: consumer (exit code 1)',
    });
  });

  it('reports a missing executable as a missing tool', async () => {
    const stage: StageDefinition = {
      name: 'encoder',
      command: '/nonexistent/encoder',
      args: [],
      gracePeriodMs: 100,
    };

    await expect(
      service.run({ stages: [stage], tempFiles: [] }, { signal: new AbortController().signal }),
    ).rejects.toMatchObject({
      code: 'tool-missing',
      message: 'Executable not found: /nonexistent/encoder',
    });
  });

  it('force-kills a stage that ignores SIGINT once its grace period ends', async () => {
    const controller = new AbortController();
    const stubborn: StageDefinition = {
      ...script(
        'producer',
        "process.on('SIGINT', () => {}); setInterval(() => {}, 1000); console.error('Frame: 1/10')",
        200,
      ),
      onDiagnosticLine: (line) => (line.startsWith('Frame:') ? { percentage: 10 } : undefined),
    };
    const startedAt = Date.now();

    await expect(
      service.run(
        { stages: [stubborn], tempFiles: [] },
        { signal: controller.signal, onProgress: () => controller.abort() },
      ),
    ).rejects.toMatchObject({ code: 'cancelled', message: 'Pipeline cancelled' });
    expect(Date.now() - startedAt).toBeLessThan(4000);
  });
});
