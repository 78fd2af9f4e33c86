/**
 * Argument and result shapes of the server commands.
 *
 * Result schemas follow what servers send rather than what the system manual
 * states where the two disagree (see `PurgeTheoriesResultsSchema`).
 */
import { z } from 'zod';
import { MessageSchema } from '../protocol/schemas';

// ============== Arguments ==============

/** Arguments of `cancel` */
export interface CancelArgs {
  /** Id of the task to try to cancel */
  task: string;
}

/** Arguments of `session_build` and `session_start` */
export interface SessionBuildArgs {
  /** Target session; all required ancestor images are built as well */
  session: string;
  /** Preferences the system options environment is derived from */
  preferences?: string;
  /** Individual option updates of the form `name=value` or `name` */
  options?: string[];
  /** Additional directories for session `ROOT` and `ROOTS` files */
  dirs?: string[];
  /** Sessions whose theories join the overall name space */
  include_sessions?: string[];
}

/** Arguments of `session_stop` */
export interface SessionStopArgs {
  session_id: string;
}

/** Arguments of `use_theories` */
export interface UseTheoriesArgs {
  session_id: string;
  theories: string[];
  master_dir?: string;
  unicode_symbols?: boolean;
  export_pattern?: string;
  check_delay?: number;
  check_limit?: number;
  watchdog_timeout?: number;
  nodes_status_delay?: number;
}

/** Arguments of `purge_theories` */
export interface PurgeTheoriesArgs {
  session_id: string;
  theories: string[];
  master_dir?: string;
  all?: boolean;
}

/**
 * Builds `session_build` / `session_start` arguments. An empty
 * `include_sessions` list is left out of the payload.
 */
export function sessionBuildArgs(
  session: string,
  extra: Omit<SessionBuildArgs, 'session'> = {}
): SessionBuildArgs {
  const args: SessionBuildArgs = { session, ...extra };
  if (args.include_sessions?.length === 0) delete args.include_sessions;
  return args;
}

export function useTheoriesArgs(
  sessionId: string,
  theories: readonly string[],
  extra: Omit<UseTheoriesArgs, 'session_id' | 'theories'> = {}
): UseTheoriesArgs {
  return { session_id: sessionId, theories: [...theories], ...extra };
}

export function purgeTheoriesArgs(
  sessionId: string,
  theories: readonly string[],
  extra: Omit<PurgeTheoriesArgs, 'session_id' | 'theories'> = {}
): PurgeTheoriesArgs {
  return { session_id: sessionId, theories: [...theories], ...extra };
}

// ============== Results ==============

export const TimingSchema = z.object({
  elapsed: z.number(),
  cpu: z.number(),
  gc: z.number(),
});
export type Timing = z.infer<typeof TimingSchema>;

/** Outcome of building one session */
export const SessionBuildResultSchema = z.object({
  session: z.string(),
  ok: z.boolean(),
  /** Zero if `ok`; non-zero indicates an error */
  return_code: z.number().int(),
  /** The build was aborted after running too long */
  timeout: z.boolean(),
  timing: TimingSchema,
});
export type SessionBuildResult = z.infer<typeof SessionBuildResultSchema>;

/** Result (and failure context) of `session_build` */
export const SessionBuildResultsSchema = z.object({
  ok: z.boolean(),
  return_code: z.number().int(),
  sessions: z.array(SessionBuildResultSchema),
});
export type SessionBuildResults = z.infer<typeof SessionBuildResultsSchema>;

export const SessionStartResultSchema = z.object({
  task: z.string(),
  /** Server-side identification of the session */
  session_id: z.string(),
  /** Default `master_dir` for later theory commands; deleted when the session stops */
  tmp_dir: z.string().optional(),
});
export type SessionStartResult = z.infer<typeof SessionStartResultSchema>;

export const SessionStopResultSchema = z.object({
  task: z.string().optional(),
  ok: z.boolean(),
  return_code: z.number().int(),
});
export type SessionStopResult = z.infer<typeof SessionStopResultSchema>;

export const NodeSchema = z.object({
  node_name: z.string(),
  theory_name: z.string(),
});
export type Node = z.infer<typeof NodeSchema>;

export const NodeStatusSchema = z.object({
  ok: z.boolean(),
  total: z.number().int(),
  unprocessed: z.number().int(),
  running: z.number().int(),
  warned: z.number().int(),
  failed: z.number().int(),
  finished: z.number().int().optional(),
  canceled: z.boolean(),
  consolidated: z.boolean(),
  percentage: z.number(),
});
export type NodeStatus = z.infer<typeof NodeStatusSchema>;

export const ExportSchema = z.object({
  name: z.string(),
  base64: z.boolean(),
  body: z.string(),
});
export type Export = z.infer<typeof ExportSchema>;

/** Per-theory results of `use_theories` */
export const NodeResultsSchema = NodeSchema.extend({
  status: NodeStatusSchema,
  messages: z.array(MessageSchema),
  exports: z.array(ExportSchema),
});
export type NodeResults = z.infer<typeof NodeResultsSchema>;

export const UseTheoriesResultsSchema = z.object({
  task: z.string().optional(),
  ok: z.boolean(),
  errors: z.array(MessageSchema),
  nodes: z.array(NodeResultsSchema),
});
export type UseTheoriesResults = z.infer<typeof UseTheoriesResultsSchema>;

/**
 * Result of `purge_theories`.
 *
 * The manual documents `{ purged: [String] }`; servers send node objects
 * and a `retained` list. Both forms are accepted.
 */
export const PurgeTheoriesResultsSchema = z.object({
  purged: z.array(z.union([NodeSchema, z.string()])),
  retained: z.array(z.union([NodeSchema, z.string()])).default([]),
});
export type PurgeTheoriesResults = z.infer<typeof PurgeTheoriesResultsSchema>;
