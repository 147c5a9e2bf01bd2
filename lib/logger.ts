import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** The named level, or `info` when the name is unset or not a pino level. */
export function resolveLogLevel(name: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === name) ?? 'info';
}

/**
 * Shared Pino configuration. Everything is written to stderr so that stdout
 * only ever carries generated statements.
 */
export function getPinoConfig() {
  const logLevel = resolveLogLevel(process.env.LOG_LEVEL);
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const usePretty = isDevelopment && process.stderr.isTTY === true;

  return {
    level: logLevel,
    transport: usePretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,component',
            messageFormat: '{component} {msg}',
          },
        }
      : undefined,
  };
}

function createPinoLogger() {
  const config = getPinoConfig();
  if (config.transport) {
    return pino(config);
  }
  return pino({ level: config.level }, pino.destination(2));
}

export const pinoLogger = createPinoLogger();

const componentLoggers: pino.Logger[] = [];

export interface Logger {
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  trace: (message: string, ...args: unknown[]) => void;
  fatal: (message: string, ...args: unknown[]) => void;
}

/**
 * Console-like API over pino. Extra arguments land in `data`; a leading Error
 * argument on error/fatal is logged under `err`.
 */
function createLoggerWrapper(pinoInstance: pino.Logger): Logger {
  const withErr = (level: 'error' | 'fatal', message: string, args: unknown[]) => {
    if (args.length === 0) {
      pinoInstance[level](message);
      return;
    }
    const firstArg = args[0];
    if (firstArg instanceof Error) {
      pinoInstance[level]({ err: firstArg, data: args.slice(1) }, message);
    } else {
      pinoInstance[level]({ data: args }, message);
    }
  };

  const plain = (level: 'info' | 'warn' | 'debug' | 'trace', message: string, args: unknown[]) => {
    if (args.length > 0) {
      pinoInstance[level]({ data: args }, message);
    } else {
      pinoInstance[level](message);
    }
  };

  return {
    info: (message, ...args) => plain('info', message, args),
    warn: (message, ...args) => plain('warn', message, args),
    error: (message, ...args) => withErr('error', message, args),
    debug: (message, ...args) => plain('debug', message, args),
    trace: (message, ...args) => plain('trace', message, args),
    fatal: (message, ...args) => withErr('fatal', message, args),
  };
}

export const logger = createLoggerWrapper(pinoLogger);

/**
 * Create a child logger with a component prefix
 * @param component - The component name (e.g., 'StatementGenerator', 'MappingLoader')
 *
 * @example
 * const logger = createLogger('SchemaManager');
 * logger.info('Generating schema'); // Logs: [SchemaManager] Generating schema
 */
export function createLogger(component: string): Logger {
  const childLogger = pinoLogger.child({ component: `[${component}]` });
  componentLoggers.push(childLogger);
  return createLoggerWrapper(childLogger);
}

/** Apply a level to the root logger and every component logger created so far. */
export function setLogLevel(level: LogLevel): void {
  pinoLogger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}
