/**
 * Outcome values of dispatched commands.
 *
 * A sync call ends in `ok` or `error`. An async call ends in `error` (rejected
 * before a task existed), `finished` or `failed`. None of these is thrown.
 */
import { IsabelleError } from '../errors';
import type { Message, Task } from './schemas';

export type SyncResult<T, E> = { kind: 'ok'; value: T } | { kind: 'error'; error: E };

/** Failure of an accepted task */
export interface FailedOutcome<F> {
  task: Task;
  message: Message;
  /** Command-specific data sent along with the failure */
  context?: F;
}

export type AsyncResult<T, F> =
  | { kind: 'error'; error: Message }
  | { kind: 'finished'; value: T }
  | { kind: 'failed'; failure: FailedOutcome<F> };

export function ok<T>(value: T): { kind: 'ok'; value: T } {
  return { kind: 'ok', value };
}

export function err<E>(error: E): { kind: 'error'; error: E } {
  return { kind: 'error', error };
}

export function finished<T>(value: T): { kind: 'finished'; value: T } {
  return { kind: 'finished', value };
}

export function failed<F>(failure: FailedOutcome<F>): { kind: 'failed'; failure: FailedOutcome<F> } {
  return { kind: 'failed', failure };
}

export function rejected(error: Message): { kind: 'error'; error: Message } {
  return { kind: 'error', error };
}

export function isOk<T, E>(result: SyncResult<T, E>): result is { kind: 'ok'; value: T } {
  return result.kind === 'ok';
}

export function isFinished<T, F>(
  result: AsyncResult<T, F>
): result is { kind: 'finished'; value: T } {
  return result.kind === 'finished';
}

/** Returns the success value or throws an `UNWRAP_FAILED` error */
export function unwrapSync<T, E>(result: SyncResult<T, E>): T {
  if (result.kind === 'ok') return result.value;
  throw new IsabelleError(`Command failed: ${describe(result.error)}`, 'UNWRAP_FAILED');
}

/** Returns the finished value or throws an `UNWRAP_FAILED` error */
export function unwrapAsync<T, F>(result: AsyncResult<T, F>): T {
  switch (result.kind) {
    case 'finished':
      return result.value;
    case 'failed':
      throw new IsabelleError(
        `Task ${result.failure.task.task} failed: ${result.failure.message.message}`,
        'UNWRAP_FAILED'
      );
    case 'error':
      throw new IsabelleError(`Command rejected: ${result.error.message}`, 'UNWRAP_FAILED');
  }
}

function describe(error: unknown): string {
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return JSON.stringify(error) ?? String(error);
}
