/**
 * Client constants.
 */

// ============== Connection ==============

/** Default server host */
export const DEFAULT_HOST = '127.0.0.1';

/** Default TCP connect timeout in ms (covers the connect only, not the call) */
export const DEFAULT_CONNECTION_TIMEOUT = 5000;

// ============== Server process ==============

/** Executable used to start and stop servers */
export const DEFAULT_EXECUTABLE = 'isabelle';

/** Default server name as used by `isabelle server -n` */
export const DEFAULT_SERVER_NAME = 'isabelle';

// ============== Commands ==============

export const COMMAND_ECHO = 'echo';
export const COMMAND_SHUTDOWN = 'shutdown';
export const COMMAND_CANCEL = 'cancel';
export const COMMAND_SESSION_BUILD = 'session_build';
export const COMMAND_SESSION_START = 'session_start';
export const COMMAND_SESSION_STOP = 'session_stop';
export const COMMAND_USE_THEORIES = 'use_theories';
export const COMMAND_PURGE_THEORIES = 'purge_theories';
