/**
 * Server control commands: echo, shutdown, cancel
 */
import { COMMAND_CANCEL, COMMAND_ECHO, COMMAND_SHUTDOWN } from '../../constants';
import type { SyncResult } from '../../protocol/outcomes';
import {
  CommandErrorSchema,
  UnitSchema,
  type CommandError,
  type PayloadSchema,
  type Task,
  type Unit,
} from '../../protocol/schemas';
import type { CallOptions, CommandSender } from '../../types';
import type { CancelArgs } from '../commands';

/**
 * Identity command: the server returns its argument.
 *
 * @example
 * ```typescript
 * const res = await echo(client, 'hello', z.string());
 * // { kind: 'ok', value: 'hello' }
 * ```
 */
export function echo<T>(
  client: CommandSender,
  value: T,
  schema: PayloadSchema<T>,
  options?: CallOptions
): Promise<SyncResult<T, CommandError>> {
  return client.sendSync(COMMAND_ECHO, value, { ok: schema, error: CommandErrorSchema }, options);
}

/**
 * Shuts the server down, stopping all sessions. Pending commands on other
 * connections may be cut off.
 */
export function shutdown(
  client: CommandSender,
  options?: CallOptions
): Promise<SyncResult<Unit, CommandError>> {
  return client.sendSync(COMMAND_SHUTDOWN, undefined, { ok: UnitSchema, error: CommandErrorSchema }, options);
}

/**
 * Asks the server to cancel a task. Only a hint: the task may still finish,
 * and a local dispatch waiting on it keeps waiting for its outcome.
 */
export function cancel(
  client: CommandSender,
  task: string | Task,
  options?: CallOptions
): Promise<SyncResult<Unit, CommandError>> {
  const args: CancelArgs = { task: typeof task === 'string' ? task : task.task };
  return client.sendSync(COMMAND_CANCEL, args, { ok: UnitSchema, error: CommandErrorSchema }, options);
}
