/**
 * Sync and async dispatch over one line transport.
 *
 * Sync: write the command, read until `OK` or `ERROR`.
 *
 * Async: a sync dispatch whose `OK` carries a task id (acceptance), then a
 * read loop until `FINISHED` or `FAILED` (completion):
 *
 *   awaiting-acceptance --OK-------> awaiting-completion
 *   awaiting-acceptance --ERROR----> done(error)
 *   awaiting-completion --NOTE-----> awaiting-completion
 *   awaiting-completion --FINISHED-> done(finished)
 *   awaiting-completion --FAILED---> done(failed)
 *
 * Any other line leaves the state unchanged.
 */
import { getLogger, type Logger } from '../utils/logger';
import { classifyLine, type ClassifiedLine } from './classifier';
import { describeCommand, encodeCommand, type Command } from './command';
import { decodePayload } from './decoder';
import { err, failed, finished, ok, rejected, type AsyncResult, type FailedOutcome, type SyncResult } from './outcomes';
import {
  MessageSchema,
  NoteSchema,
  TaskSchema,
  type Note,
  type PayloadSchema,
  type Task,
} from './schemas';
import type { LineTransport } from './transport';

export type NoteObserver = (note: Note) => void | Promise<void>;

export interface DispatchOptions {
  /** Defaults to a child of the global logger */
  logger?: Logger;
  /** Called once per `NOTE`, in arrival order, before the outcome is returned */
  onNote?: NoteObserver;
}

export interface SyncSchemas<R, E> {
  ok: PayloadSchema<R>;
  error: PayloadSchema<E>;
}

export interface AsyncSchemas<R, F> {
  finished: PayloadSchema<R>;
  /** Validates the command-specific fields of a `FAILED` payload */
  failed: PayloadSchema<F>;
}

const FailedPayloadSchema = TaskSchema.merge(MessageSchema).passthrough();

function resolveLogger(options: DispatchOptions): Logger {
  return options.logger ?? getLogger().child('dispatch');
}

async function readClassified(transport: LineTransport): Promise<ClassifiedLine> {
  return classifyLine(await transport.readLine());
}

function decode<T>(text: string, schema: PayloadSchema<T>, logger: Logger): T {
  try {
    return decodePayload(text, schema);
  } catch (error) {
    logger.warn('Malformed payload', error);
    throw error;
  }
}

/**
 * Sends a command and waits for its single `OK` or `ERROR` reply.
 *
 * @throws ConnectionError if the stream ends before a terminal line
 * @throws ProtocolError if the terminal payload does not decode
 */
export async function dispatchSync<T, R, E>(
  transport: LineTransport,
  command: Command<T>,
  schemas: SyncSchemas<R, E>,
  options: DispatchOptions = {}
): Promise<SyncResult<R, E>> {
  const logger = resolveLogger(options);

  logger.debug('Sending command', { command: describeCommand(command) });
  await transport.writeLine(encodeCommand(command));

  for (;;) {
    const line = await readClassified(transport);
    switch (line.kind) {
      case 'OK':
        return ok(decode(line.rest, schemas.ok, logger));
      case 'ERROR':
        return err(decode(line.rest, schemas.error, logger));
      case 'UNRECOGNIZED':
        logger.trace('Skipping unrecognized line', { line: line.line });
        break;
      default:
        logger.trace('Skipping line outside a sync reply', { kind: line.kind, rest: line.rest });
    }
  }
}

/**
 * Sends an asynchronous command and follows its task to the end.
 *
 * @throws ConnectionError if the stream ends before a terminal line
 * @throws ProtocolError if a classified payload does not decode
 */
export async function dispatchAsync<T, R, F>(
  transport: LineTransport,
  command: Command<T>,
  schemas: AsyncSchemas<R, F>,
  options: DispatchOptions = {}
): Promise<AsyncResult<R, F>> {
  const accepted = await dispatchSync(
    transport,
    command,
    { ok: TaskSchema, error: MessageSchema },
    options
  );
  if (accepted.kind === 'error') {
    return rejected(accepted.error);
  }
  resolveLogger(options).debug('Task accepted', { task: accepted.value.task });
  return awaitCompletion(transport, accepted.value, schemas, options);
}

/**
 * Completion phase of an accepted task: reads until `FINISHED` or `FAILED`,
 * handing every `NOTE` to the observer on the way.
 */
export async function awaitCompletion<R, F>(
  transport: LineTransport,
  task: Task,
  schemas: AsyncSchemas<R, F>,
  options: DispatchOptions = {}
): Promise<AsyncResult<R, F>> {
  const logger = resolveLogger(options);

  for (;;) {
    const line = await readClassified(transport);
    switch (line.kind) {
      case 'FINISHED':
        return finished(decode(line.rest, schemas.finished, logger));
      case 'FAILED':
        return failed(decode(line.rest, failedOutcomeSchema(schemas.failed), logger));
      case 'NOTE': {
        const note = decode(line.rest, NoteSchema, logger);
        logger.trace('Note', { task: task.task, note });
        await deliverNote(note, options.onNote, logger);
        break;
      }
      case 'UNRECOGNIZED':
        logger.trace('Skipping unrecognized line', { line: line.line });
        break;
      default:
        logger.trace('Skipping line outside a task reply', { kind: line.kind, rest: line.rest });
    }
  }
}

async function deliverNote(note: Note, observer: NoteObserver | undefined, logger: Logger): Promise<void> {
  if (!observer) return;
  try {
    await observer(note);
  } catch (error) {
    logger.warn('Note observer failed', error);
  }
}

/**
 * Schema for a `FAILED` payload. Task, message and context are flattened into
 * one object on the wire; `context` is set only when the remaining fields fit
 * the command's failure schema.
 */
export function failedOutcomeSchema<F>(context: PayloadSchema<F>): PayloadSchema<FailedOutcome<F>> {
  return FailedPayloadSchema.transform((payload) => {
    const parsed = context.safeParse(payload);
    const outcome: FailedOutcome<F> = {
      task: { task: payload.task },
      message: { kind: payload.kind, message: payload.message, pos: payload.pos },
    };
    if (parsed.success) outcome.context = parsed.data;
    return outcome;
  });
}
