/**
 * Configuration loading from environment variables
 */
import { z } from 'zod';
import { DEFAULT_CONNECTION_TIMEOUT, DEFAULT_HOST, DEFAULT_SERVER_NAME } from './constants';
import { ValidationError } from './errors';
import type { LogLevel } from './utils/logger';

export interface Config {
  host: string;
  /** Unset when the server is to be started or discovered by name */
  port?: number;
  password?: string;
  connectTimeout: number;
  logLevel: LogLevel;
  serverName: string;
}

const EnvSchema = z.object({
  ISABELLE_HOST: z.string().min(1).default(DEFAULT_HOST),
  ISABELLE_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  ISABELLE_PASSWORD: z.string().min(1).optional(),
  ISABELLE_CONNECT_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_CONNECTION_TIMEOUT),
  ISABELLE_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('silent'),
  ISABELLE_SERVER_NAME: z.string().min(1).default(DEFAULT_SERVER_NAME),
});

/**
 * Reads the client configuration.
 *
 * @throws ValidationError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'env';
    throw new ValidationError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, field);
  }

  const values = result.data;
  return {
    host: values.ISABELLE_HOST,
    port: values.ISABELLE_PORT,
    password: values.ISABELLE_PASSWORD,
    connectTimeout: values.ISABELLE_CONNECT_TIMEOUT,
    logLevel: values.ISABELLE_LOG_LEVEL,
    serverName: values.ISABELLE_SERVER_NAME,
  };
}
