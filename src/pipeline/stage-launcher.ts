import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'child_process';
import { Readable, Writable } from 'stream';
import kill from 'tree-kill';

export interface StageExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  // Set when the process could not be started
  error?: NodeJS.ErrnoException;
}

export interface StageProcess {
  readonly pid: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exited: Promise<StageExit>;
  readonly hasExited: boolean;
  /** Signals the whole process tree. */
  signal(signal: NodeJS.Signals): Promise<void>;
}

export interface LaunchOptions {
  stdin: 'pipe' | 'ignore';
}

/** Seam between the pipeline and the OS; tests swap in fake processes. */
export abstract class StageLauncher {
  abstract launch(
    command: string,
    args: readonly string[],
    options: LaunchOptions,
  ): StageProcess;
}

@Injectable()
export class ChildProcessStageLauncher extends StageLauncher {
  private readonly logger = new Logger(ChildProcessStageLauncher.name);

  launch(
    command: string,
    args: readonly string[],
    options: LaunchOptions,
  ): StageProcess {
    const child = spawn(command, args, {
      stdio: [options.stdin, 'pipe', 'pipe'],
      windowsHide: true,
    });
    const { stdout, stderr } = child;
    if (!stdout || !stderr) {
      throw new Error(`Output streams of ${command} are not piped`);
    }

    let hasExited = false;
    const exited = new Promise<StageExit>((resolve) => {
      child.once('close', (code, signal) => {
        hasExited = true;
        resolve({ code, signal });
      });
      child.on('error', (error: NodeJS.ErrnoException) => {
        // Only a failed spawn ends the process; later errors are kill failures
        if (child.pid === undefined) {
          hasExited = true;
          resolve({ code: null, signal: null, error });
        } else {
          this.logger.warn(`Process ${child.pid} (${command}) error: ${error.message}`);
        }
      });
    });

    this.logger.debug(`Spawned ${command} ${args.join(' ')} (pid ${child.pid})`);

    return {
      pid: child.pid,
      stdin: child.stdin,
      stdout,
      stderr,
      exited,
      get hasExited() {
        return hasExited;
      },
      signal: (signal) => this.signalTree(child.pid, signal, () => hasExited),
    };
  }

  private signalTree(
    pid: number | undefined,
    signal: NodeJS.Signals,
    exited: () => boolean,
  ): Promise<void> {
    if (pid === undefined || exited()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      kill(pid, signal, (err) => {
        if (err && !exited()) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}
