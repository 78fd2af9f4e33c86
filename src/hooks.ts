/**
 * Hooks system for observability (tracing, metrics, custom logging)
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const client = new IsabelleClient({
 *   port, password,
 *   hooks: {
 *     onCommand: (ctx) => {
 *       ctx.data.span = trace.getTracer('isabelle').startSpan(ctx.command);
 *     },
 *     onNote: (ctx) => console.log(ctx.note.message),
 *   },
 * });
 * ```
 */
import type { Note } from './protocol/schemas';
import { getLogger, type Logger } from './utils/logger';

/** Context passed to hooks */
export interface HookContext {
  /** Operation start time */
  startTime: number;
  /** Free storage shared between the hooks of one operation (e.g. a span) */
  data: Record<string, unknown>;
}

/** Command dispatch context */
export interface CommandHookContext extends HookContext {
  command: string;
  args?: unknown;
  mode: 'sync' | 'async';
  /** Set after the command produced an outcome */
  outcome?: unknown;
}

/** Progress note context */
export interface NoteHookContext extends HookContext {
  command: string;
  note: Note;
}

/** Connection event context */
export interface ConnectionHookContext extends HookContext {
  host: string;
  port: number;
  event: 'connect' | 'authenticated' | 'close' | 'error';
  error?: Error;
}

export interface ClientHooks {
  /** Called before a command is sent */
  onCommand?: Hook<CommandHookContext>;
  /** Called once the command produced an outcome (including server-reported failures) */
  onCommandComplete?: Hook<CommandHookContext>;
  /** Called if the connection, handshake or decoding failed */
  onCommandError?: ErrorHook<CommandHookContext>;
  /** Called for every progress note of an asynchronous command */
  onNote?: Hook<NoteHookContext>;
  /** Called on connection events */
  onConnection?: Hook<ConnectionHookContext>;
}

/** Error hook type */
export type ErrorHook<T extends HookContext> = (ctx: T, error: Error) => void | Promise<void>;

/** Standard hook type */
export type Hook<T extends HookContext> = (ctx: T) => void | Promise<void>;

/**
 * Calls a hook; a failing hook is logged and does not affect the call.
 */
export async function callHook<T extends HookContext>(
  hook: Hook<T> | undefined,
  ctx: T,
  logger: Logger = getLogger()
): Promise<void> {
  if (!hook) return;
  try {
    await hook(ctx);
  } catch (e) {
    logger.error('Hook error', e);
  }
}

export async function callErrorHook<T extends HookContext>(
  hook: ErrorHook<T> | undefined,
  ctx: T,
  error: Error,
  logger: Logger = getLogger()
): Promise<void> {
  if (!hook) return;
  try {
    await hook(ctx, error);
  } catch (e) {
    logger.error('Hook error', e);
  }
}

/**
 * Create a new hook context with start time
 */
export function createHookContext<T extends object>(fields: T): T & HookContext {
  const data: Record<string, unknown> = {};
  return { ...fields, startTime: Date.now(), data };
}

/**
 * Calculate duration from context start time
 */
export function getDuration(ctx: HookContext): number {
  return Date.now() - ctx.startTime;
}
