/**
 * Client option and sender types.
 */
import type { ClientHooks } from './hooks';
import type { AsyncSchemas, NoteObserver, SyncSchemas } from './protocol/dispatch';
import type { AsyncResult, SyncResult } from './protocol/outcomes';
import type { Logger, LogLevel } from './utils/logger';

export interface ClientOptions {
  /** Server host (default: 127.0.0.1) */
  host?: string;
  /** Server port */
  port: number;
  /** Server password sent in the handshake */
  password: string;
  /** TCP connect timeout in ms (default: 5000). Calls themselves are not timed. */
  connectTimeout?: number;
  /** Log level of the client's own logger (default: 'silent') */
  logLevel?: LogLevel;
  /** Ready-made logger; takes precedence over `logLevel` */
  logger?: Logger;
  hooks?: ClientHooks;
}

export interface CallOptions {
  /** Aborting closes the call's connection */
  signal?: AbortSignal;
}

export interface AsyncCallOptions extends CallOptions {
  /** Receives every progress note of the task */
  onNote?: NoteObserver;
}

/** What the command modules need from a client */
export interface CommandSender {
  sendSync<T, R, E>(
    name: string,
    args: T | undefined,
    schemas: SyncSchemas<R, E>,
    options?: CallOptions
  ): Promise<SyncResult<R, E>>;

  sendAsync<T, R, F>(
    name: string,
    args: T | undefined,
    schemas: AsyncSchemas<R, F>,
    options?: AsyncCallOptions
  ): Promise<AsyncResult<R, F>>;
}
