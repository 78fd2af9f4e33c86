/**
 * Server Launcher Tests
 *
 * Child processes are replaced by in-memory fakes.
 */
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, test, expect, vi } from 'vitest';
import { ServerLaunchError } from '../../src/errors';
import { exitServer, parseServerBanner, runServer, type ServerProcess, type Spawner } from '../../src/server';
import { Logger } from '../../src/utils/logger';

const spawnMock = vi.hoisted(() => vi.fn());
vi.mock('node:child_process', () => ({ spawn: spawnMock }));

const quiet = new Logger({ level: 'silent' });

class FakeProcess extends EventEmitter implements ServerProcess {
  readonly stdout = new PassThrough();
  exitCode: number | null = null;
  killed = false;
  unrefed = false;

  unref(): void {
    this.unrefed = true;
  }

  kill(): boolean {
    this.killed = true;
    this.exit(143);
    return true;
  }

  exit(code: number): void {
    this.exitCode = code;
    this.emit('exit', code);
  }

  /** Ends stdout and emits 'close' once the reader has drained it */
  close(): void {
    this.stdout.once('end', () => this.emit('close', this.exitCode));
    this.stdout.end();
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
}

/** Spawner handing out prepared fakes in order and recording every call */
function fakeSpawner(...processes: FakeProcess[]): { spawn: Spawner; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: Spawner = (command, args) => {
    calls.push({ command, args });
    const next = processes.shift();
    if (!next) throw new Error('unexpected spawn');
    return next;
  };
  return { spawn, calls };
}

describe('parseServerBanner', () => {
  test('parses name, address and password', () => {
    expect(parseServerBanner('server "isabelle" = 127.0.0.1:4711 (password "test-secret")')).toEqual({
      name: 'isabelle',
      host: '127.0.0.1',
      port: 4711,
      password: 'test-secret',
    });
  });

  test('removes escaping backslashes', () => {
    expect(parseServerBanner('server \\"ci\\" = 127.0.0.1:9000 (password \\"test-secret\\")\n')).toEqual({
      name: 'ci',
      host: '127.0.0.1',
      port: 9000,
      password: 'test-secret',
    });
  });

  test('name is optional', () => {
    expect(parseServerBanner('= localhost:1234 (password "p")').name).toBeUndefined();
  });

  test('rejects other output', () => {
    expect(() => parseServerBanner('Usage: isabelle server [OPTIONS]')).toThrow(ServerLaunchError);
  });
});

describe('runServer', () => {
  test('starts a server and reads its banner', async () => {
    const child = new FakeProcess();
    const { spawn, calls } = fakeSpawner(child);

    const pending = runServer({ name: 'test', spawn, logger: quiet });
    child.stdout.write('server "test" = 127.0.0.1:');
    child.stdout.write('4711 (password "test-secret")\n');
    const server = await pending;

    expect(calls).toEqual([{ command: 'isabelle', args: ['server', '-n', 'test'] }]);
    expect(server.name).toBe('test');
    expect(server.host).toBe('127.0.0.1');
    expect(server.port).toBe(4711);
    expect(server.password).toBe('test-secret');
    expect(server.owned).toBe(true);
  });

  test('releases the child and its stdout once the banner is read', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ name: 'test', spawn, logger: quiet });
    child.stdout.write('server "test" = 127.0.0.1:4711 (password "test-secret")\n');
    await pending;

    expect(child.unrefed).toBe(true);
    expect(child.stdout.destroyed).toBe(true);
  });

  test('the default spawner starts the server detached', async () => {
    const child = new FakeProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = runServer({ name: 'bg', logger: quiet });
    child.stdout.write('server "bg" = 127.0.0.1:4711 (password "test-secret")\n');
    const server = await pending;

    expect(spawnMock).toHaveBeenCalledWith('isabelle', ['server', '-n', 'bg'], {
      stdio: ['ignore', 'pipe', 'inherit'],
      detached: true,
    });
    expect(server.owned).toBe(true);
    expect(child.unrefed).toBe(true);
  });

  test('a banner that arrives after the exit event is still read', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ name: 'shared', spawn, logger: quiet });
    child.exit(0);
    child.stdout.write('server "shared" = 127.0.0.1:5000 (password "test-secret")\n');
    child.close();
    const server = await pending;

    expect(server.port).toBe(5000);
    expect(server.owned).toBe(false);
  });

  test('an unterminated banner is read when stdout closes', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ name: 'shared', spawn, logger: quiet });
    child.exit(0);
    child.stdout.write('server "shared" = 127.0.0.1:5001 (password "test-secret")');
    child.close();
    const server = await pending;

    expect(server.port).toBe(5001);
    expect(server.password).toBe('test-secret');
  });

  test('an already running server is not owned', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ name: 'shared', executable: '/opt/isabelle/bin/isabelle', spawn, logger: quiet });
    child.stdout.write('server "shared" = 127.0.0.1:5000 (password "test-secret")\n');
    child.exitCode = 0;
    const server = await pending;

    expect(server.owned).toBe(false);
  });

  test('exit stops the server by name and kills the started process', async () => {
    const child = new FakeProcess();
    const stopper = new FakeProcess();
    const { spawn, calls } = fakeSpawner(child, stopper);

    const pending = runServer({ name: 'test', spawn, logger: quiet });
    child.stdout.write('server "test" = 127.0.0.1:4711 (password "test-secret")\n');
    const server = await pending;

    const exiting = server.exit();
    await Promise.resolve();
    stopper.exit(0);
    await exiting;

    expect(calls[1]).toEqual({ command: 'isabelle', args: ['server', '-n', 'test', '-x'] });
    expect(child.killed).toBe(true);
    expect(server.owned).toBe(false);
  });

  test('early exit without a banner fails', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ spawn, logger: quiet });
    child.exit(2);
    child.close();
    await expect(pending).rejects.toThrow('isabelle exited with code 2 before printing its address');
  });

  test('spawn errors become ServerLaunchError', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ spawn, logger: quiet });
    child.emit('error', new Error('ENOENT'));
    await expect(pending).rejects.toBeInstanceOf(ServerLaunchError);
  });

  test('a synchronous spawn failure becomes ServerLaunchError', async () => {
    const { spawn } = fakeSpawner();
    await expect(runServer({ spawn, logger: quiet })).rejects.toMatchObject({
      code: 'SERVER_LAUNCH_FAILED',
      message: 'Could not start isabelle',
    });
  });

  test('an unparseable banner fails', async () => {
    const child = new FakeProcess();
    const { spawn } = fakeSpawner(child);

    const pending = runServer({ spawn, logger: quiet });
    child.stdout.write('*** Unknown option\n');
    await expect(pending).rejects.toThrow('Unrecognized server banner: *** Unknown option');
  });
});

describe('exitServer', () => {
  test('resolves with the exit code', async () => {
    const stopper = new FakeProcess();
    const { spawn, calls } = fakeSpawner(stopper);

    const pending = exitServer('ci', { spawn, executable: 'isabelle2024', logger: quiet });
    stopper.exit(1);
    await expect(pending).resolves.toBe(1);
    expect(calls).toEqual([{ command: 'isabelle2024', args: ['server', '-n', 'ci', '-x'] }]);
  });
});
