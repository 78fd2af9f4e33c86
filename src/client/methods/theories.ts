/**
 * Theory commands: use_theories, purge_theories
 */
import { COMMAND_PURGE_THEORIES, COMMAND_USE_THEORIES } from '../../constants';
import type { AsyncResult, SyncResult } from '../../protocol/outcomes';
import { CommandErrorSchema, NoContextSchema, type CommandError } from '../../protocol/schemas';
import type { AsyncCallOptions, CallOptions, CommandSender } from '../../types';
import {
  PurgeTheoriesResultsSchema,
  UseTheoriesResultsSchema,
  type PurgeTheoriesArgs,
  type PurgeTheoriesResults,
  type UseTheoriesArgs,
  type UseTheoriesResults,
} from '../commands';

/**
 * Adds the current version of theory files to a session; imports are
 * resolved implicitly. Notes report node status while theories are checked.
 */
export function useTheories(
  client: CommandSender,
  args: UseTheoriesArgs,
  options?: AsyncCallOptions
): Promise<AsyncResult<UseTheoriesResults, never>> {
  return client.sendAsync(
    COMMAND_USE_THEORIES,
    args,
    { finished: UseTheoriesResultsSchema, failed: NoContextSchema },
    options
  );
}

/**
 * Removes theories from a session. Theories still used by pending
 * `use_theories` tasks or imported elsewhere are retained.
 */
export function purgeTheories(
  client: CommandSender,
  args: PurgeTheoriesArgs,
  options?: CallOptions
): Promise<SyncResult<PurgeTheoriesResults, CommandError>> {
  return client.sendSync(
    COMMAND_PURGE_THEORIES,
    args,
    { ok: PurgeTheoriesResultsSchema, error: CommandErrorSchema },
    options
  );
}
