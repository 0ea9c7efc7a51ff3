import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { CONSUMER_GRACE_PERIOD_MS, PRODUCER_GRACE_PERIOD_MS } from '../../constants';
import { parseFrameProgress } from '../../pipeline/frame-progress';
import { PipelineDefinition } from '../../pipeline/pipeline.interfaces';
import { PipelineBuildContext, requireTool } from '../processing-kind.plugin';

// JSON string literals are valid Python string literals
export function pythonString(value: string): string {
  return JSON.stringify(value);
}

export function pythonBool(value: boolean): string {
  return value ? 'True' : 'False';
}

/** Script prologue loading the source clip with the first available source filter. */
export function sourceClip(sourcePath: string): string {
  const source = pythonString(sourcePath);
  return [
    'import vapoursynth as vs',
    'core = vs.core',
    '',
    'try:',
    `    clip = core.bs.VideoSource(source=${source})`,
    'except AttributeError:',
    '    try:',
    `        clip = core.ffms2.Source(${source})`,
    '    except AttributeError:',
    `        clip = core.lsmas.LWLibavSource(${source})`,
    'src_width, src_height = clip.width, clip.height',
  ].join('\n');
}

export async function writeScript(
  workDir: string,
  name: string,
  body: string,
): Promise<string> {
  await fsPromises.mkdir(workDir, { recursive: true });
  const scriptPath = path.join(workDir, `${name}.vpy`);
  await fsPromises.writeFile(scriptPath, `${body}\nclip.set_output()\n`, 'utf-8');
  return scriptPath;
}

/** Encoder args reading y4m frames on stdin and audio from the source. */
export function encoderArgs(
  sourcePath: string,
  outputPath: string,
  extraOutputArgs: readonly string[] = [],
): string[] {
  return [
    '-hide_banner',
    '-y',
    '-f',
    'yuv4mpegpipe',
    '-i',
    '-',
    '-i',
    sourcePath,
    '-map',
    '0:v',
    '-map',
    '1:a?',
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
    ...extraOutputArgs,
    outputPath,
  ];
}

/**
 * vspipe renders the script as y4m into ffmpeg. The script is checked with
 * `vspipe --info` first; the first load may build model engines.
 */
export function vapourSynthPipeline(
  context: PipelineBuildContext<unknown>,
  scriptPath: string,
  extraOutputArgs: readonly string[] = [],
): PipelineDefinition {
  const vspipe = requireTool(context.tools, 'vspipe');
  const ffmpeg = requireTool(context.tools, 'ffmpeg');
  const { job } = context;

  return {
    preflight: { command: vspipe, args: ['--info', scriptPath] },
    stages: [
      {
        name: 'vspipe',
        command: vspipe,
        args: ['--progress', '-c', 'y4m', scriptPath, '-'],
        gracePeriodMs: PRODUCER_GRACE_PERIOD_MS,
        onDiagnosticLine: parseFrameProgress,
      },
      {
        name: 'ffmpeg',
        command: ffmpeg,
        args: encoderArgs(job.sourceVideoPath, job.outputPath, extraOutputArgs),
        gracePeriodMs: CONSUMER_GRACE_PERIOD_MS,
      },
    ],
    tempFiles: [scriptPath],
  };
}
