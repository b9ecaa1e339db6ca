import type { LevelWithSilent } from 'pino';

/** Runtime configuration read from the environment. */
export interface RuntimeConfig {
  /** pino level for the package loggers. Env: `FORMATSTREAMS_LOG_LEVEL`. Default: `'info'`. */
  readonly logLevel: LevelWithSilent;
  /** Pipe log lines through pino-pretty. Env: `FORMATSTREAMS_LOG_PRETTY=true`. Default: `false`. */
  readonly prettyLogs: boolean;
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/** Build the configuration from environment variables. Throws on an unknown log level. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const rawLevel = env.FORMATSTREAMS_LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(rawLevel)) {
    throw new Error(`FORMATSTREAMS_LOG_LEVEL: unknown level '${rawLevel}'. Expected one of: ${LOG_LEVELS.join(', ')}`);
  }

  return {
    logLevel: rawLevel,
    prettyLogs: env.FORMATSTREAMS_LOG_PRETTY === 'true',
  };
}
