/**
 * Session lifecycle: session_build, session_start, session_stop
 */
import { COMMAND_SESSION_BUILD, COMMAND_SESSION_START, COMMAND_SESSION_STOP } from '../../constants';
import type { AsyncResult } from '../../protocol/outcomes';
import { NoContextSchema } from '../../protocol/schemas';
import type { AsyncCallOptions, CommandSender } from '../../types';
import {
  SessionBuildResultsSchema,
  SessionStartResultSchema,
  SessionStopResultSchema,
  type SessionBuildArgs,
  type SessionBuildResults,
  type SessionStartResult,
  type SessionStopArgs,
  type SessionStopResult,
} from '../commands';

/**
 * Builds a session image and its ancestors. Progress arrives as notes; a
 * failed build carries the per-session results as context.
 */
export function sessionBuild(
  client: CommandSender,
  args: SessionBuildArgs,
  options?: AsyncCallOptions
): Promise<AsyncResult<SessionBuildResults, SessionBuildResults>> {
  return client.sendAsync(
    COMMAND_SESSION_BUILD,
    args,
    { finished: SessionBuildResultsSchema, failed: SessionBuildResultsSchema },
    options
  );
}

/**
 * Starts a prover session, building its image on demand. The returned
 * `session_id` stays valid across connections until the session is stopped.
 */
export function sessionStart(
  client: CommandSender,
  args: SessionBuildArgs,
  options?: AsyncCallOptions
): Promise<AsyncResult<SessionStartResult, never>> {
  return client.sendAsync(
    COMMAND_SESSION_START,
    args,
    { finished: SessionStartResultSchema, failed: NoContextSchema },
    options
  );
}

/** Forces a shutdown of the identified session */
export function sessionStop(
  client: CommandSender,
  args: SessionStopArgs,
  options?: AsyncCallOptions
): Promise<AsyncResult<SessionStopResult, SessionStopResult>> {
  return client.sendAsync(
    COMMAND_SESSION_STOP,
    args,
    { finished: SessionStopResultSchema, failed: SessionStopResultSchema },
    options
  );
}
