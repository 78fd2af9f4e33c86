/**
 * Client for the Isabelle server's line protocol.
 *
 * @example
 * ```typescript
 * import { IsabelleClient, runServer, unwrapAsync } from 'isabelle-client';
 *
 * const server = await runServer({ name: 'test' });
 * const client = IsabelleClient.forServer(server);
 *
 * const started = unwrapAsync(await client.sessionStart({ session: 'HOL' }));
 * const result = await client.useTheories(
 *   { session_id: started.session_id, theories: ['Scratch'] },
 *   { onNote: (note) => console.log(note.message) }
 * );
 * ```
 *
 * @packageDocumentation
 */

// Client
export { IsabelleClient, IsabelleClient as default, Connection, handshake } from './client';
export type { ServerEndpoint } from './client';
export type { ConnectionAddress, ConnectionOptions } from './client/connection';

// Command arguments and results
export {
  sessionBuildArgs,
  useTheoriesArgs,
  purgeTheoriesArgs,
  TimingSchema,
  SessionBuildResultSchema,
  SessionBuildResultsSchema,
  SessionStartResultSchema,
  SessionStopResultSchema,
  NodeSchema,
  NodeStatusSchema,
  ExportSchema,
  NodeResultsSchema,
  UseTheoriesResultsSchema,
  PurgeTheoriesResultsSchema,
} from './client/commands';
export type {
  CancelArgs,
  SessionBuildArgs,
  SessionStopArgs,
  UseTheoriesArgs,
  PurgeTheoriesArgs,
  Timing,
  SessionBuildResult,
  SessionBuildResults,
  SessionStartResult,
  SessionStopResult,
  Node,
  NodeStatus,
  Export,
  NodeResults,
  UseTheoriesResults,
  PurgeTheoriesResults,
} from './client/commands';

// Protocol engine
export { encodeCommand, describeCommand } from './protocol/command';
export type { Command } from './protocol/command';
export { classifyLine, RESPONSE_PREFIXES } from './protocol/classifier';
export type { ClassifiedLine, ResponseKind } from './protocol/classifier';
export { decodePayload } from './protocol/decoder';
export { dispatchSync, dispatchAsync, awaitCompletion, failedOutcomeSchema } from './protocol/dispatch';
export type { AsyncSchemas, DispatchOptions, NoteObserver, SyncSchemas } from './protocol/dispatch';
export type { LineTransport } from './protocol/transport';
export {
  ok,
  err,
  finished,
  failed,
  rejected,
  isOk,
  isFinished,
  unwrapSync,
  unwrapAsync,
} from './protocol/outcomes';
export type { AsyncResult, FailedOutcome, SyncResult } from './protocol/outcomes';
export {
  PositionSchema,
  MessageSchema,
  TaskSchema,
  NoteSchema,
  CommandErrorSchema,
  UnitSchema,
  AnySchema,
  NoContextSchema,
} from './protocol/schemas';
export type { CommandError, Message, Note, PayloadSchema, Position, Task, Unit } from './protocol/schemas';

// Server processes
export {
  runServer,
  exitServer,
  parseServerBanner,
  IsabelleServer,
  batchProcess,
  buildProcessArgv,
  OptionsBuilder,
} from './server';
export type {
  LauncherOptions,
  ServerBanner,
  ServerProcess,
  Spawner,
  ProcessArgs,
  ProcessOutput,
  BatchChild,
  BatchSpawner,
  BatchProcessOptions,
} from './server';

// Configuration
export { loadConfig } from './config';
export type { Config } from './config';
export { DEFAULT_HOST, DEFAULT_CONNECTION_TIMEOUT, DEFAULT_SERVER_NAME } from './constants';

// Errors
export {
  IsabelleError,
  ConnectionError,
  AuthenticationError,
  ProtocolError,
  ValidationError,
  ServerLaunchError,
  isEngineError,
  Errors,
} from './errors';
export type { ConnectionErrorCode } from './errors';

// Logger utilities
export { Logger, createLogger, getLogger, setGlobalLogger, formatEntry, isLogLevel } from './utils/logger';
export type { LogLevel, LoggerOptions, LogEntry, LogHandler } from './utils/logger';

// Hooks for observability (OpenTelemetry, etc.)
export { callHook, callErrorHook, createHookContext, getDuration } from './hooks';
export type {
  ClientHooks,
  HookContext,
  CommandHookContext,
  NoteHookContext,
  ConnectionHookContext,
} from './hooks';

// Types
export type { ClientOptions, CallOptions, AsyncCallOptions, CommandSender } from './types';
