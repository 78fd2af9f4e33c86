/**
 * Isabelle client - one TCP connection per command.
 *
 * Every call opens a connection, authenticates, dispatches the command and
 * closes the connection again, whatever the outcome. Concurrent calls use
 * independent connections.
 */
import { z } from 'zod';
import type { Config } from '../config';
import { DEFAULT_CONNECTION_TIMEOUT, DEFAULT_HOST } from '../constants';
import { ValidationError } from '../errors';
import {
  callErrorHook,
  callHook,
  createHookContext,
  type ClientHooks,
  type CommandHookContext,
  type ConnectionHookContext,
} from '../hooks';
import { dispatchAsync, dispatchSync, type AsyncSchemas, type SyncSchemas } from '../protocol/dispatch';
import type { AsyncResult, SyncResult } from '../protocol/outcomes';
import type { CommandError, Note, PayloadSchema, Task, Unit } from '../protocol/schemas';
import type { AsyncCallOptions, CallOptions, ClientOptions, CommandSender } from '../types';
import { Logger } from '../utils/logger';
import type {
  PurgeTheoriesArgs,
  PurgeTheoriesResults,
  SessionBuildArgs,
  SessionBuildResults,
  SessionStartResult,
  SessionStopArgs,
  SessionStopResult,
  UseTheoriesArgs,
  UseTheoriesResults,
} from './commands';
import { Connection } from './connection';
import { handshake } from './handshake';
import * as control from './methods/control';
import * as session from './methods/session';
import * as theories from './methods/theories';

/** Client options with defaults applied */
type ResolvedClientOptions = Required<Omit<ClientOptions, 'hooks' | 'logger' | 'logLevel'>> & {
  hooks?: ClientHooks;
};

/** Address and password of a running server */
export interface ServerEndpoint {
  host?: string;
  port: number;
  password: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class IsabelleClient implements CommandSender {
  protected readonly _options: ResolvedClientOptions;
  protected readonly logger: Logger;

  constructor(options: ClientOptions) {
    if (!Number.isInteger(options.port) || options.port < 1 || options.port > 65535) {
      throw new ValidationError(`Invalid port: ${options.port}`, 'port');
    }
    if (!options.password) {
      throw new ValidationError('Password is required', 'password');
    }

    this.logger =
      options.logger ?? new Logger({ level: options.logLevel ?? 'silent', prefix: 'isabelle' });
    this._options = {
      host: options.host ?? DEFAULT_HOST,
      port: options.port,
      password: options.password,
      connectTimeout: options.connectTimeout ?? DEFAULT_CONNECTION_TIMEOUT,
      hooks: options.hooks,
    };
  }

  /**
   * Creates a client from loaded configuration.
   *
   * @throws ValidationError if port or password are not configured
   */
  static fromConfig(config: Config, overrides: Partial<ClientOptions> = {}): IsabelleClient {
    const port = overrides.port ?? config.port;
    const password = overrides.password ?? config.password;
    if (port === undefined) throw new ValidationError('ISABELLE_PORT is not set', 'ISABELLE_PORT');
    if (password === undefined) {
      throw new ValidationError('ISABELLE_PASSWORD is not set', 'ISABELLE_PASSWORD');
    }
    return new IsabelleClient({
      host: config.host,
      connectTimeout: config.connectTimeout,
      logLevel: config.logLevel,
      ...overrides,
      port,
      password,
    });
  }

  /** Creates a client for a server started or discovered by the launcher */
  static forServer(
    server: ServerEndpoint,
    options: Omit<ClientOptions, 'host' | 'port' | 'password'> = {}
  ): IsabelleClient {
    return new IsabelleClient({ ...options, host: server.host, port: server.port, password: server.password });
  }

  get options(): Readonly<ResolvedClientOptions> {
    return this._options;
  }

  get hooks(): ClientHooks | undefined {
    return this._options.hooks;
  }

  // === DISPATCH ===

  /** Sends any synchronous command */
  async sendSync<T, R, E>(
    name: string,
    args: T | undefined,
    schemas: SyncSchemas<R, E>,
    options: CallOptions = {}
  ): Promise<SyncResult<R, E>> {
    return this.run(name, args, 'sync', options, (connection) =>
      dispatchSync(connection, { name, args }, schemas, { logger: this.logger.child('dispatch') })
    );
  }

  /** Sends any asynchronous command and waits for its task to end */
  async sendAsync<T, R, F>(
    name: string,
    args: T | undefined,
    schemas: AsyncSchemas<R, F>,
    options: AsyncCallOptions = {}
  ): Promise<AsyncResult<R, F>> {
    const onNote = async (note: Note): Promise<void> => {
      await callHook(this.hooks?.onNote, createHookContext({ command: name, note }), this.logger);
      await options.onNote?.(note);
    };
    return this.run(name, args, 'async', options, (connection) =>
      dispatchAsync(connection, { name, args }, schemas, { logger: this.logger.child('dispatch'), onNote })
    );
  }

  // === COMMANDS ===

  /** Echoes a string */
  echo(value: string, options?: CallOptions): Promise<SyncResult<string, CommandError>> {
    return control.echo(this, value, z.string(), options);
  }

  /** Echoes any JSON value, validated with the given schema */
  echoValue<T>(value: T, schema: PayloadSchema<T>, options?: CallOptions): Promise<SyncResult<T, CommandError>> {
    return control.echo(this, value, schema, options);
  }

  shutdown(options?: CallOptions): Promise<SyncResult<Unit, CommandError>> {
    return control.shutdown(this, options);
  }

  cancel(task: string | Task, options?: CallOptions): Promise<SyncResult<Unit, CommandError>> {
    return control.cancel(this, task, options);
  }

  sessionBuild(
    args: SessionBuildArgs,
    options?: AsyncCallOptions
  ): Promise<AsyncResult<SessionBuildResults, SessionBuildResults>> {
    return session.sessionBuild(this, args, options);
  }

  sessionStart(args: SessionBuildArgs, options?: AsyncCallOptions): Promise<AsyncResult<SessionStartResult, never>> {
    return session.sessionStart(this, args, options);
  }

  sessionStop(
    args: SessionStopArgs,
    options?: AsyncCallOptions
  ): Promise<AsyncResult<SessionStopResult, SessionStopResult>> {
    return session.sessionStop(this, args, options);
  }

  useTheories(args: UseTheoriesArgs, options?: AsyncCallOptions): Promise<AsyncResult<UseTheoriesResults, never>> {
    return theories.useTheories(this, args, options);
  }

  purgeTheories(
    args: PurgeTheoriesArgs,
    options?: CallOptions
  ): Promise<SyncResult<PurgeTheoriesResults, CommandError>> {
    return theories.purgeTheories(this, args, options);
  }

  // === CONNECTION LIFECYCLE ===

  private async run<R>(
    name: string,
    args: unknown,
    mode: 'sync' | 'async',
    options: CallOptions,
    dispatch: (connection: Connection) => Promise<R>
  ): Promise<R> {
    const ctx: CommandHookContext = createHookContext({ command: name, args, mode });
    await callHook(this.hooks?.onCommand, ctx, this.logger);
    try {
      const outcome = await this.withConnection(options.signal, dispatch);
      ctx.outcome = outcome;
      await callHook(this.hooks?.onCommandComplete, ctx, this.logger);
      return outcome;
    } catch (error) {
      this.logger.debug('Command failed', { command: name, error });
      await callErrorHook(this.hooks?.onCommandError, ctx, toError(error), this.logger);
      throw error;
    }
  }

  private async withConnection<R>(
    signal: AbortSignal | undefined,
    fn: (connection: Connection) => Promise<R>
  ): Promise<R> {
    const { host, port, connectTimeout, password } = this._options;

    let connection: Connection;
    try {
      connection = await Connection.open(
        { host, port },
        { connectTimeout, signal, logger: this.logger.child('connection') }
      );
    } catch (error) {
      await this.connectionEvent('error', toError(error));
      throw error;
    }
    await this.connectionEvent('connect');

    try {
      await handshake(connection, password, this.logger.child('handshake'));
      await this.connectionEvent('authenticated');
      return await fn(connection);
    } finally {
      connection.close();
      await this.connectionEvent('close');
    }
  }

  private async connectionEvent(event: ConnectionHookContext['event'], error?: Error): Promise<void> {
    const ctx: ConnectionHookContext = createHookContext({
      host: this._options.host,
      port: this._options.port,
      event,
      error,
    });
    await callHook(this.hooks?.onConnection, ctx, this.logger);
  }
}

export { Connection } from './connection';
export { handshake } from './handshake';
