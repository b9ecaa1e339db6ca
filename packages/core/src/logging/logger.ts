import pino, { type Logger, type LoggerOptions } from 'pino';
import { loadConfig, type RuntimeConfig } from '../config.js';

/**
 * The logging surface components depend on. A pino `Logger` satisfies it;
 * tests pass plain spies.
 */
export type StreamsLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

/** Create the package's root pino logger. */
export function createLogger(config: RuntimeConfig = loadConfig()): Logger {
  const options: LoggerOptions = {
    name: 'formatstreams',
    level: config.logLevel,
  };

  if (config.prettyLogs) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

let rootLogger: Logger | null = null;

/** Lazily created root logger shared by the default registry and dispatcher. */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

const componentLoggers = new Map<string, Logger>();

/** Child logger tagged with a component name, created once per component. */
export function componentLogger(component: string): Logger {
  let logger = componentLoggers.get(component);
  if (!logger) {
    logger = getLogger().child({ component });
    componentLoggers.set(component, logger);
  }
  return logger;
}
