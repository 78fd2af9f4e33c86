/**
 * Server process management.
 */
export { runServer, exitServer, parseServerBanner, IsabelleServer } from './launcher';
export type { LauncherOptions, ServerBanner, ServerProcess, Spawner } from './launcher';

export { batchProcess, buildProcessArgv, OptionsBuilder } from './process';
export type { ProcessArgs, ProcessOutput, BatchChild, BatchSpawner, BatchProcessOptions } from './process';
