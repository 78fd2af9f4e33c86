/**
 * Starting, discovering and stopping named servers.
 *
 * `isabelle server -n NAME` prints one banner line and either keeps running
 * (new server) or exits at once (a server of that name is already up):
 *
 *   server "NAME" = 127.0.0.1:4711 (password "...")
 */
import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { DEFAULT_EXECUTABLE, DEFAULT_SERVER_NAME } from '../constants';
import { ServerLaunchError } from '../errors';
import { LineBuffer } from '../client/tcp';
import { getLogger, type Logger } from '../utils/logger';

/** The parts of a child process the launcher relies on */
export interface ServerProcess {
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  /** Lets this process exit while the child keeps running */
  unref(): void;
  /** Emitted after the child has exited and its stdio streams have closed */
  once(event: 'close', listener: (code: number | null) => void): unknown;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type Spawner = (command: string, args: readonly string[]) => ServerProcess;

export interface LauncherOptions {
  /** Server name (default: 'isabelle') */
  name?: string;
  /** Executable to run (default: 'isabelle') */
  executable?: string;
  /** Process factory, replaceable in tests */
  spawn?: Spawner;
  logger?: Logger;
}

export interface ServerBanner {
  name?: string;
  host: string;
  port: number;
  password: string;
}

const defaultSpawner: Spawner = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'inherit'], detached: true });

const BANNER_PATTERN = /= (\S+):(\d+) \(password "([^"]*)"\)/;
const NAME_PATTERN = /server "([^"]*)"/;

/**
 * Parses the banner line printed by `isabelle server`.
 *
 * @throws ServerLaunchError if the line does not contain an address and password
 */
export function parseServerBanner(line: string): ServerBanner {
  const text = line.replace(/\\/g, '').trim();
  const match = BANNER_PATTERN.exec(text);
  if (!match) {
    throw new ServerLaunchError(`Unrecognized server banner: ${text}`);
  }
  const [, host, port, password] = match;
  return {
    name: NAME_PATTERN.exec(text)?.[1],
    host,
    port: Number(port),
    password,
  };
}

/** A running server, started by this process or found already running */
export class IsabelleServer {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly password: string;

  constructor(
    banner: ServerBanner & { name: string },
    private handle: ServerProcess | null,
    private readonly options: Pick<LauncherOptions, 'executable' | 'spawn' | 'logger'> = {}
  ) {
    this.name = banner.name;
    this.host = banner.host;
    this.port = banner.port;
    this.password = banner.password;
  }

  /** True if the server process was started by this launcher and is still attached */
  get owned(): boolean {
    return this.handle !== null;
  }

  /**
   * Stops the server by name, then kills the process this launcher started
   * if it is still alive.
   */
  async exit(): Promise<void> {
    await exitServer(this.name, this.options);
    const handle = this.handle;
    this.handle = null;
    if (handle && handle.exitCode === null) {
      handle.kill();
    }
  }
}

/**
 * Starts a server with the given name, or returns the address of the one
 * already running under that name. The server outlives this process unless
 * `exit()` is called.
 *
 * @throws ServerLaunchError if the process cannot be started or prints no banner
 */
export async function runServer(options: LauncherOptions = {}): Promise<IsabelleServer> {
  const name = options.name ?? DEFAULT_SERVER_NAME;
  const executable = options.executable ?? DEFAULT_EXECUTABLE;
  const logger = options.logger ?? getLogger().child('server');
  const spawnProcess = options.spawn ?? defaultSpawner;

  let child: ServerProcess;
  try {
    child = spawnProcess(executable, ['server', '-n', name]);
  } catch (error) {
    throw new ServerLaunchError(`Could not start ${executable}`, error);
  }

  const line = await readBanner(child, executable);
  child.unref();
  const banner = parseServerBanner(line);
  const running = child.exitCode === null;
  logger.info(running ? 'Server started' : 'Server already running', {
    name,
    host: banner.host,
    port: banner.port,
  });

  return new IsabelleServer({ ...banner, name }, running ? child : null, {
    executable,
    spawn: options.spawn,
    logger: options.logger,
  });
}

/**
 * Stops the server with the given name (`isabelle server -n NAME -x`).
 *
 * @returns the exit code of the stop command
 */
export function exitServer(
  name: string,
  options: Pick<LauncherOptions, 'executable' | 'spawn' | 'logger'> = {}
): Promise<number | null> {
  const executable = options.executable ?? DEFAULT_EXECUTABLE;
  const spawnProcess = options.spawn ?? defaultSpawner;
  const logger = options.logger ?? getLogger().child('server');

  return new Promise((resolve, reject) => {
    let child: ServerProcess;
    try {
      child = spawnProcess(executable, ['server', '-n', name, '-x']);
    } catch (error) {
      reject(new ServerLaunchError(`Could not run ${executable}`, error));
      return;
    }
    child.stdout?.resume();
    child.once('error', (error) => reject(new ServerLaunchError(`Could not run ${executable}`, error)));
    child.once('exit', (code) => {
      logger.info('Server stopped', { name, code });
      resolve(code);
    });
  });
}

function readBanner(child: ServerProcess, executable: string): Promise<string> {
  const stdout = child.stdout;
  if (!stdout) {
    return Promise.reject(new ServerLaunchError(`${executable} has no stdout`));
  }

  return new Promise((resolve, reject) => {
    const buffer = new LineBuffer();
    let settled = false;

    const finish = (outcome: { line: string } | { error: ServerLaunchError }): void => {
      if (settled) return;
      settled = true;
      stdout.removeListener('data', onData);
      stdout.destroy();
      if ('line' in outcome) resolve(outcome.line);
      else reject(outcome.error);
    };

    const onData = (chunk: Buffer | string): void => {
      buffer.append(chunk);
      const [line] = buffer.extractLines();
      if (line !== undefined) finish({ line });
    };

    stdout.on('data', onData);
    child.once('error', (error) =>
      finish({ error: new ServerLaunchError(`Could not start ${executable}`, error) })
    );
    // 'exit' can arrive before the banner has been read; 'close' waits for stdout to drain
    child.once('close', (code) => {
      const tail = buffer.flush();
      if (tail !== undefined) {
        finish({ line: tail });
        return;
      }
      finish({ error: new ServerLaunchError(`${executable} exited with code ${code} before printing its address`) });
    });
  });
}
