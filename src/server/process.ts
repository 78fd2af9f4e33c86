/**
 * Batch-mode prover runs (`isabelle process`) and system option building.
 */
import { spawn as spawnChild } from 'node:child_process';
import { DEFAULT_EXECUTABLE } from '../constants';
import { ServerLaunchError } from '../errors';
import { getLogger, type Logger } from '../utils/logger';

export interface ProcessArgs {
  /** Theories to load (-T), in this order */
  theories: string[];
  /** Session directories (-d) */
  sessionDirs?: string[];
  /** Logic session (-l); the installation default is HOL */
  logic?: string;
  /** System option overrides (-o key=value); see {@link OptionsBuilder} */
  options?: Record<string, string>;
}

export interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** The parts of a child process batch runs rely on */
export interface BatchChild {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  once(event: 'close', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type BatchSpawner = (command: string, args: readonly string[], options: { cwd?: string }) => BatchChild;

export interface BatchProcessOptions {
  cwd?: string;
  executable?: string;
  spawn?: BatchSpawner;
  logger?: Logger;
}

const defaultSpawner: BatchSpawner = (command, args, options) =>
  spawnChild(command, [...args], { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}

/** Builds the argument list of `isabelle process` (without the executable) */
export function buildProcessArgv(args: ProcessArgs): string[] {
  const argv = ['process'];
  for (const theory of args.theories) {
    argv.push('-T', theory);
  }
  for (const dir of args.sessionDirs ?? []) {
    argv.push('-d', dir);
  }
  if (args.logic !== undefined) {
    argv.push('-l', args.logic);
  }
  for (const [key, value] of Object.entries(args.options ?? {})) {
    argv.push('-o', `${key}=${value}`);
  }
  return argv;
}

/**
 * Runs the prover in batch mode and collects its output.
 *
 * @example
 * ```typescript
 * const output = await batchProcess({ theories: ['~~/src/HOL/Examples/Drinker'] });
 * console.log(output.exitCode);
 * ```
 */
export function batchProcess(args: ProcessArgs, options: BatchProcessOptions = {}): Promise<ProcessOutput> {
  const executable = options.executable ?? DEFAULT_EXECUTABLE;
  const spawnProcess = options.spawn ?? defaultSpawner;
  const logger = options.logger ?? getLogger().child('process');
  const argv = buildProcessArgv(args);

  return new Promise((resolve, reject) => {
    let child: BatchChild;
    try {
      child = spawnProcess(executable, argv, { cwd: options.cwd });
    } catch (error) {
      reject(new ServerLaunchError(`Could not run ${executable}`, error));
      return;
    }
    logger.debug('Batch process started', { argv });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer | string) => stdout.push(toBuffer(chunk)));
    child.stderr?.on('data', (chunk: Buffer | string) => stderr.push(toBuffer(chunk)));

    child.once('error', (error) => reject(new ServerLaunchError(`Could not run ${executable}`, error)));
    child.once('close', (code) => {
      logger.debug('Batch process exited', { code });
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
}

/**
 * Fluent builder for common system options.
 *
 * @example
 * ```typescript
 * const options = new OptionsBuilder().threads(4).quickAndDirty(true);
 * await client.sessionBuild({ session: 'HOL', options: options.toServerOptions() });
 * ```
 */
export class OptionsBuilder {
  private readonly options: Record<string, string> = {};

  /** Maximum number of worker threads for the prover (0 = hardware max.) */
  threads(threads: number): this {
    return this.int('threads', threads);
  }

  /** Maximum stack size for worker threads (in giga words, 0 = unlimited) */
  threadsStackLimit(limit: number): this {
    return this.real('threads_stack_limit', limit);
  }

  /** Approximate limit for parallel tasks (0 = unlimited) */
  parallelLimit(limit: number): this {
    return this.int('parallel_limit', limit);
  }

  /** Level of parallel proof checking: 0, 1, 2 */
  parallelProofs(level: number): this {
    return this.int('parallel_proofs', level);
  }

  /** Scale factor for timeouts in ML and session builds */
  timeoutScale(scale: number): this {
    return this.real('timeout_scale', scale);
  }

  /** Level of proof term recording: 0, 1, 2; negative means unchanged */
  recordProofs(level: number): this {
    return this.int('record_proofs', level);
  }

  /** Lets some tools omit proofs */
  quickAndDirty(flag: boolean): this {
    return this.bool('quick_and_dirty', flag);
  }

  /** Skips proofs (implicit `sorry`) */
  skipProofs(flag: boolean): this {
    return this.bool('skip_proofs', flag);
  }

  /** Timeout for a session build job (seconds > 0) */
  timeout(seconds: number): this {
    return this.real('timeout', seconds);
  }

  /** Observe the timeout for session builds */
  timeoutBuild(flag: boolean): this {
    return this.bool('timeout_build', flag);
  }

  /** Build process output limit (in million characters, 0 = unlimited) */
  processOutputLimit(limit: number): this {
    return this.int('process_output_limit', limit);
  }

  /** Build process output tail shown to the user (in lines, 0 = unlimited) */
  processOutputTail(lines: number): this {
    return this.int('process_output_tail', lines);
  }

  /** Report PIDE markup in ML */
  pideReports(flag: boolean): this {
    return this.bool('pide_reports', flag);
  }

  /** Report PIDE markup in batch builds */
  buildPideReports(flag: boolean): this {
    return this.bool('build_pide_reports', flag);
  }

  /** Options as a key/value map, e.g. for {@link ProcessArgs.options} */
  build(): Record<string, string> {
    return { ...this.options };
  }

  /** Options as `name=value` entries, as `session_build` and `session_start` take them */
  toServerOptions(): string[] {
    return Object.entries(this.options).map(([key, value]) => `${key}=${value}`);
  }

  private int(key: string, value: number): this {
    this.options[key] = String(Math.trunc(value));
    return this;
  }

  private real(key: string, value: number): this {
    this.options[key] = String(value).toLowerCase();
    return this;
  }

  private bool(key: string, value: boolean): this {
    this.options[key] = String(value);
    return this;
  }
}
