import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'events';
import { promises as fsPromises } from 'fs';
import * as readline from 'readline';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { errorMessage } from '../common/abort';
import { readNumber } from '../config/config.helpers';
import { DEFAULT_PREFLIGHT_TIMEOUT_MS } from '../constants';
import { OutputTail } from './output-tail';
import { PipelineError } from './pipeline.errors';
import {
  PipelineDefinition,
  PipelineRunOptions,
  PreflightDefinition,
  StageDefinition,
  StageProgress,
} from './pipeline.interfaces';
import { StageExit, StageLauncher, StageProcess } from './stage-launcher';

interface RunningStage {
  definition: StageDefinition;
  process: StageProcess;
  tail: OutputTail;
}

type PreflightOutcome = 'exited' | 'timeout' | 'aborted';

function describeExit(exit: StageExit): string {
  if (exit.code !== null) {
    return `exit code ${exit.code}`;
  }
  return exit.signal ? `terminated by ${exit.signal}` : 'no exit code';
}

/**
 * Runs a pipeline definition: optional pre-flight check, then one or two
 * stages with the producer's stdout copied into the consumer's stdin.
 *
 * Aborting the signal sends SIGINT to every stage and SIGKILL to those still
 * alive after their grace period. `run` resolves only when every stage has
 * exited and every stream has been drained, and throws a PipelineError for
 * any outcome other than all-zero exit codes.
 */
@Injectable()
export class ProcessPipelineService {
  private readonly logger = new Logger(ProcessPipelineService.name);
  private readonly defaultPreflightTimeoutMs: number;

  constructor(
    private readonly launcher: StageLauncher,
    private readonly configService: ConfigService,
  ) {
    this.defaultPreflightTimeoutMs = readNumber(
      this.configService,
      'PREFLIGHT_TIMEOUT_MS',
      DEFAULT_PREFLIGHT_TIMEOUT_MS,
    );
  }

  async run(
    definition: PipelineDefinition,
    options: PipelineRunOptions,
  ): Promise<void> {
    try {
      if (options.signal.aborted) {
        throw new PipelineError('cancelled', 'Pipeline cancelled before start');
      }
      if (definition.preflight) {
        await this.runPreflight(definition.preflight, options.signal);
        options.onPreflightComplete?.();
      }
      await this.runStages(definition, options);
    } finally {
      await this.removeTempFiles(definition.tempFiles);
    }
  }

  private async runPreflight(
    preflight: PreflightDefinition,
    signal: AbortSignal,
  ): Promise<void> {
    const timeoutMs = preflight.timeoutMs ?? this.defaultPreflightTimeoutMs;
    const stage: RunningStage = {
      definition: {
        name: `${preflight.command} (pre-flight)`,
        command: preflight.command,
        args: preflight.args,
        gracePeriodMs: 0,
      },
      process: this.launcher.launch(preflight.command, preflight.args, {
        stdin: 'ignore',
      }),
      tail: new OutputTail(),
    };
    this.logger.log(
      `Running pre-flight check: ${preflight.command} ${preflight.args.join(' ')}`,
    );
    this.guardStreams(stage);

    const readers = Promise.all([
      this.readLines(stage, stage.process.stdout, (line) => stage.tail.push(line), signal),
      this.readLines(stage, stage.process.stderr, (line) => stage.tail.push(line), signal),
    ]);

    const outcome = await this.waitForPreflight(stage.process, timeoutMs, signal);
    if (outcome !== 'exited') {
      await this.sendSignal(stage, 'SIGKILL');
    }
    const exit = await stage.process.exited;
    await readers;

    if (outcome === 'aborted') {
      throw new PipelineError('cancelled', 'Pipeline cancelled during pre-flight');
    }
    if (outcome === 'timeout') {
      throw new PipelineError(
        'preflight-timeout',
        `Pre-flight check did not finish within ${Math.round(timeoutMs / 1000)} s`,
        stage.tail.toString() || undefined,
      );
    }
    if (exit.error) {
      throw this.launchFailure(stage, exit.error);
    }
    if (exit.code !== 0) {
      throw new PipelineError(
        'preflight-failed',
        `Pre-flight check failed (${describeExit(exit)})`,
        stage.tail.toString() || undefined,
      );
    }
    this.logger.log('Pre-flight check passed');
  }

  private waitForPreflight(
    process: StageProcess,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<PreflightOutcome> {
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const outcomes: Promise<PreflightOutcome>[] = [
      process.exited.then((): PreflightOutcome => 'exited'),
      new Promise<PreflightOutcome>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      }),
      new Promise<PreflightOutcome>((resolve) => {
        onAbort = () => resolve('aborted');
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener('abort', onAbort, { once: true });
        }
      }),
    ];

    return Promise.race(outcomes).finally(() => {
      clearTimeout(timer);
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    });
  }

  private async runStages(
    definition: PipelineDefinition,
    options: PipelineRunOptions,
  ): Promise<void> {
    const { signal } = options;
    const [producerDefinition, consumerDefinition] = definition.stages;

    const stages: RunningStage[] = [this.launch(producerDefinition, false)];
    if (consumerDefinition) {
      stages.push(this.launch(consumerDefinition, true));
    }
    const producer = stages[0];
    const consumer: RunningStage | undefined = stages[1];

    const shutdowns: Promise<void>[] = [];
    const onAbort = () => {
      this.logger.log('Cancellation requested, stopping pipeline stages');
      for (const stage of stages) {
        shutdowns.push(this.stopStage(stage));
      }
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    let copyError: Error | undefined;
    const copyTask = consumer
      ? this.copyStream(producer, consumer, signal).then((error) => {
          copyError = error;
        })
      : this.drain(producer.process.stdout);

    const diagnosticTasks = stages.map((stage) =>
      this.readLines(
        stage,
        stage.process.stderr,
        (line) => this.handleDiagnosticLine(stage, line, options.onProgress),
        signal,
      ),
    );

    let exits: StageExit[];
    try {
      exits = await Promise.all(stages.map((stage) => stage.process.exited));
      await Promise.all([copyTask, ...diagnosticTasks]);
    } finally {
      signal.removeEventListener('abort', onAbort);
      await Promise.all(shutdowns);
    }

    this.judge(stages, exits, copyError, signal);
  }

  private launch(definition: StageDefinition, pipeInput: boolean): RunningStage {
    this.logger.log(
      `Starting stage ${definition.name}: ${definition.command} ${definition.args.join(' ')}`,
    );
    const stage: RunningStage = {
      definition,
      process: this.launcher.launch(definition.command, definition.args, {
        stdin: pipeInput ? 'pipe' : 'ignore',
      }),
      tail: new OutputTail(),
    };
    this.guardStreams(stage);
    return stage;
  }

  // Stdio errors surface through the copy and readers; keep late ones from going unhandled
  private guardStreams(stage: RunningStage): void {
    const { stdin, stdout, stderr } = stage.process;
    const streams: Array<EventEmitter | null> = [stdin, stdout, stderr];
    for (const stream of streams) {
      stream?.on('error', (error: Error) => {
        this.logger.debug(`${stage.definition.name} stream error: ${error.message}`);
      });
    }
  }

  /** Resolves with the copy error, if any; broken pipes after abort are expected. */
  private async copyStream(
    producer: RunningStage,
    consumer: RunningStage,
    signal: AbortSignal,
  ): Promise<Error | undefined> {
    const input = consumer.process.stdin;
    if (!input) {
      await this.drain(producer.process.stdout);
      return new Error(`${consumer.definition.name} has no writable input`);
    }
    try {
      await pipeline(producer.process.stdout, input);
      return undefined;
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug(`Stream copy interrupted by cancellation: ${errorMessage(error)}`);
        return undefined;
      }
      return error instanceof Error ? error : new Error(errorMessage(error));
    }
  }

  private async drain(stream: Readable): Promise<void> {
    try {
      for await (const chunk of stream) {
        void chunk;
      }
    } catch (error) {
      this.logger.debug(`Output stream closed with error: ${errorMessage(error)}`);
    }
  }

  private async readLines(
    stage: RunningStage,
    stream: Readable,
    onLine: (line: string) => void,
    signal: AbortSignal,
  ): Promise<void> {
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        onLine(line);
      }
    } catch (error) {
      if (!signal.aborted) {
        this.logger.warn(
          `Lost diagnostic output of ${stage.definition.name}: ${errorMessage(error)}`,
        );
      }
    } finally {
      lines.close();
    }
  }

  private handleDiagnosticLine(
    stage: RunningStage,
    line: string,
    onProgress: ((progress: StageProgress) => void) | undefined,
  ): void {
    stage.tail.push(line);
    const progress = stage.definition.onDiagnosticLine?.(line);
    if (!progress) {
      this.logger.verbose(`[${stage.definition.name}] ${line}`);
      return;
    }
    try {
      onProgress?.(progress);
    } catch (error) {
      this.logger.warn(`Progress callback failed: ${errorMessage(error)}`);
    }
  }

  private judge(
    stages: RunningStage[],
    exits: StageExit[],
    copyError: Error | undefined,
    signal: AbortSignal,
  ): void {
    if (signal.aborted) {
      throw new PipelineError('cancelled', 'Pipeline cancelled');
    }

    for (const [index, stage] of stages.entries()) {
      const error = exits[index].error;
      if (error) {
        throw this.launchFailure(stage, error);
      }
    }

    const failed = stages
      .map((stage, index) => ({ stage, exit: exits[index] }))
      .filter(({ exit }) => exit.code !== 0);
    if (failed.length > 0) {
      const summary = failed
        .map(({ stage, exit }) => `${stage.definition.name} (${describeExit(exit)})`)
        .join(', ');
      const detail = failed
        .map(({ stage, exit }) => `[${stage.definition.name}] ${describeExit(exit)}\n${stage.tail.toString()}`)
        .join('\n\n');
      throw new PipelineError('stage-failed', `Pipeline stage failed: ${summary}`, detail);
    }

    if (copyError) {
      const names = stages.map((stage) => stage.definition.name).join(' -> ');
      throw new PipelineError(
        'stream-copy-failed',
        `Failed to stream data through ${names}: ${copyError.message}`,
        copyError.stack,
      );
    }
  }

  private launchFailure(stage: RunningStage, error: NodeJS.ErrnoException): PipelineError {
    if (error.code === 'ENOENT') {
      return new PipelineError(
        'tool-missing',
        `Executable not found: ${stage.definition.command}`,
        error.message,
      );
    }
    return new PipelineError(
      'stage-failed',
      `Failed to start ${stage.definition.name}: ${error.message}`,
      error.stack,
    );
  }

  private async stopStage(stage: RunningStage): Promise<void> {
    const { process, definition } = stage;
    if (process.hasExited) {
      return;
    }
    this.logger.log(`Sending SIGINT to ${definition.name} (pid ${process.pid})`);
    await this.sendSignal(stage, 'SIGINT');

    if (await this.exitsWithin(process, definition.gracePeriodMs)) {
      return;
    }
    this.logger.warn(
      `${definition.name} still running after ${definition.gracePeriodMs} ms, killing`,
    );
    await this.sendSignal(stage, 'SIGKILL');
  }

  private async exitsWithin(process: StageProcess, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([process.exited.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async sendSignal(stage: RunningStage, signal: NodeJS.Signals): Promise<void> {
    try {
      await stage.process.signal(signal);
    } catch (error) {
      this.logger.error(
        `Failed to send ${signal} to ${stage.definition.name} (pid ${stage.process.pid}): ${errorMessage(error)}`,
      );
    }
  }

  private async removeTempFiles(files: readonly string[]): Promise<void> {
    await Promise.all(
      files.map(async (file) => {
        try {
          await fsPromises.rm(file, { force: true });
        } catch (error) {
          this.logger.warn(`Could not remove temporary file ${file}: ${errorMessage(error)}`);
        }
      }),
    );
  }
}
