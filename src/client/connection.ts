/**
 * TCP connection serving exactly one call.
 *
 * Lines are buffered as they arrive; `readLine()` is the only suspension
 * point for a reader. Once the socket ends, errors or is closed, every pending
 * and later read rejects with the `ConnectionError` that ended it (lines that
 * arrived before the end are still handed out first).
 *
 * @module client/connection
 */
import * as net from 'node:net';
import { DEFAULT_CONNECTION_TIMEOUT } from '../constants';
import { ConnectionError } from '../errors';
import type { LineTransport } from '../protocol/transport';
import { getLogger, type Logger } from '../utils/logger';
import { LineBuffer } from './tcp';

export interface ConnectionAddress {
  host: string;
  port: number;
}

export interface ConnectionOptions {
  /** TCP connect timeout in ms */
  connectTimeout?: number;
  /** Aborting destroys the socket; pending reads reject with `CONNECTION_ABORTED` */
  signal?: AbortSignal;
  logger?: Logger;
}

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: ConnectionError) => void;
}

function abortedError(signal: AbortSignal): ConnectionError {
  return new ConnectionError('Call aborted', 'CONNECTION_ABORTED', signal.reason);
}

export class Connection implements LineTransport {
  private readonly buffer = new LineBuffer();
  private readonly lines: string[] = [];
  private readonly pendingReads: PendingRead[] = [];
  private failure: ConnectionError | null = null;
  private detachSignal: (() => void) | null = null;

  private constructor(
    private readonly socket: net.Socket,
    readonly address: ConnectionAddress,
    private readonly logger: Logger
  ) {
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('error', (error) => {
      this.fail(new ConnectionError(`Socket error: ${error.message}`, 'CONNECTION_FAILED', error));
    });
    socket.on('close', () => {
      this.fail(new ConnectionError('Connection closed', 'CONNECTION_CLOSED'));
    });
  }

  /**
   * Opens a TCP connection.
   *
   * @throws ConnectionError `CONNECTION_FAILED`, `CONNECTION_TIMEOUT` or `CONNECTION_ABORTED`
   */
  static open(address: ConnectionAddress, options: ConnectionOptions = {}): Promise<Connection> {
    const logger = options.logger ?? getLogger().child('connection');
    const timeoutMs = options.connectTimeout ?? DEFAULT_CONNECTION_TIMEOUT;
    const { signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortedError(signal));
        return;
      }

      const socket = net.createConnection({ host: address.host, port: address.port });

      const settle = (error: ConnectionError | null): void => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          socket.destroy();
          logger.debug('Connect failed', { ...address, code: error.code });
          reject(error);
          return;
        }
        const connection = new Connection(socket, address, logger);
        if (signal) connection.bindSignal(signal);
        logger.debug('Connected', address);
        resolve(connection);
      };

      const onConnect = (): void => settle(null);
      const onError = (error: Error): void =>
        settle(
          new ConnectionError(
            `Could not connect to ${address.host}:${address.port}: ${error.message}`,
            'CONNECTION_FAILED',
            error
          )
        );
      const onAbort = (): void => {
        if (signal) settle(abortedError(signal));
      };
      const timer = setTimeout(
        () => settle(new ConnectionError(`Connection timeout after ${timeoutMs}ms`, 'CONNECTION_TIMEOUT')),
        timeoutMs
      );

      socket.once('connect', onConnect);
      socket.once('error', onError);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  isOpen(): boolean {
    return this.failure === null;
  }

  /**
   * Writes one frame and resolves once the socket has flushed it.
   *
   * @throws ConnectionError `NOT_CONNECTED` after close, `CONNECTION_FAILED` on write errors
   */
  writeLine(line: string): Promise<void> {
    if (this.failure !== null) {
      return Promise.reject(
        new ConnectionError(`Connection is not open: ${this.failure.message}`, 'NOT_CONNECTED', this.failure)
      );
    }
    return new Promise((resolve, reject) => {
      this.socket.write(line, 'utf8', (error) => {
        if (error) {
          reject(new ConnectionError(`Write failed: ${error.message}`, 'CONNECTION_FAILED', error));
        } else {
          resolve();
        }
      });
    });
  }

  /** Resolves with the next line; rejects once the stream is over */
  readLine(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure !== null) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.pendingReads.push({ resolve, reject });
    });
  }

  /** Destroys the socket. Safe to call more than once. */
  close(): void {
    if (this.failure === null) {
      this.logger.debug('Closing connection', this.address);
    }
    this.fail(new ConnectionError('Connection closed', 'CONNECTION_CLOSED'));
  }

  private bindSignal(signal: AbortSignal): void {
    const onAbort = (): void => this.fail(abortedError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    this.detachSignal = () => signal.removeEventListener('abort', onAbort);
  }

  private onData(chunk: Buffer): void {
    this.buffer.append(chunk);
    for (const line of this.buffer.extractLines()) {
      this.deliver(line);
    }
  }

  private onEnd(): void {
    const tail = this.buffer.flush();
    if (tail !== undefined) this.deliver(tail);
    this.fail(new ConnectionError('Connection closed by server', 'CONNECTION_CLOSED'));
  }

  private deliver(line: string): void {
    const reader = this.pendingReads.shift();
    if (reader) {
      reader.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  /** First failure wins; later ones (e.g. the `close` after an `error`) are ignored */
  private fail(error: ConnectionError): void {
    if (this.failure !== null) return;
    this.failure = error;
    this.detachSignal?.();
    this.detachSignal = null;
    for (const reader of this.pendingReads.splice(0)) {
      reader.reject(error);
    }
    this.buffer.reset();
    this.socket.destroy();
  }
}
