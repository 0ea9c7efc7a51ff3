import { PipelineError } from '../../pipeline/pipeline.errors';
import { buildJob } from '../../testing/job.factory';
import { ScalingPlugin } from './scaling.plugin';

describe('ScalingPlugin', () => {
  const plugin = new ScalingPlugin();
  const tools = { ffmpeg: '/opt/ff/ffmpeg' };

  it('builds a single ffmpeg stage with a scale filter', async () => {
    const job = buildJob({ sourceVideoPath: '/in/a.mp4', outputPath: '/out/a.mp4' });
    const settings = plugin.parseSettings({ algorithm: 'bicubic', scale: 3 });

    const definition = await plugin.buildPipeline({ job, settings, tools, workDir: '/tmp/unused' });

    expect(definition.preflight).toBeUndefined();
    expect(definition.stages).toHaveLength(1);
    const [stage] = definition.stages;
    expect(stage.command).toBe('/opt/ff/ffmpeg');
    expect(stage.args.slice(0, 6)).toEqual([
      '-hide_banner',
      '-y',
      '-i',
      '/in/a.mp4',
      '-vf',
      'scale=iw*3:ih*3:flags=bicubic',
    ]);
    expect(stage.args[stage.args.length - 1]).toBe('/out/a.mp4');
  });

  it('uses the pixel-art filters directly', async () => {
    const job = buildJob();
    const settings = plugin.parseSettings({ algorithm: 'xbr', scale: 4 });

    const definition = await plugin.buildPipeline({ job, settings, tools, workDir: '/tmp/unused' });

    expect(definition.stages[0].args).toContain('xbr=n=4');
  });

  it('parses encoder progress against the job frame count', async () => {
    const job = buildJob({ totalFrames: 1000 });
    const settings = plugin.parseSettings({});

    const definition = await plugin.buildPipeline({ job, settings, tools, workDir: '/tmp/unused' });

    expect(
      definition.stages[0].onDiagnosticLine?.('frame=  250 fps= 50 q=28.0 size=  512kB time=00:00:08.33'),
    ).toEqual({ percentage: 25, currentFrame: 250, totalFrames: 1000 });
  });

  it('needs ffmpeg', async () => {
    const job = buildJob();
    const settings = plugin.parseSettings({});

    await expect(
      plugin.buildPipeline({ job, settings, tools: {}, workDir: '/tmp/unused' }),
    ).rejects.toEqual(new PipelineError('tool-missing', 'Required tool not found: ffmpeg'));
  });

  it('rejects unknown algorithms', () => {
    expect(() => plugin.parseSettings({ algorithm: 'nearest' })).toThrow(
      'Invalid scaling settings: algorithm must be one of the following values: lanczos, bicubic, xbr, hqx',
    );
  });
});
