/**
 * Logger Configuration
 *
 * pino, configured for a command-line tool: logs go to stderr so stdout
 * stays free for the run summary.
 * - Development: pino-pretty, colorized, tagged with the component
 * - Production: one JSON object per line
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from '../shared/logging/logger';
 *   loggers.selector.info({ kept: 2 }, 'High-priority items kept');
 */

import pino, { Logger, LoggerOptions } from 'pino';

const NODE_ENV = process.env.NODE_ENV || 'development';
const isProduction = NODE_ENV === 'production';
const isTest = NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug');

const STDERR = 2;

const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { env: NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
  // API keys travel through config objects
  redact: {
    paths: ['apiKey', '*.apiKey', 'config.apiKey', 'llm.apiKey'],
    remove: true,
  },
};

function createRootLogger(): Logger {
  if (isProduction || isTest) {
    return pino(
      {
        ...baseOptions,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      pino.destination(STDERR)
    );
  }

  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: STDERR,
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname,env',
        messageFormat: '[{component}] {msg}',
      },
    },
  });
}

export const logger: Logger = createRootLogger();

/**
 * Child logger tagged with a component name
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * One logger per pipeline component
 */
export const loggers = {
  corpus: createComponentLogger('corpus'),
  selector: createComponentLogger('selector'),
  ranking: createComponentLogger('ranking'),
  skills: createComponentLogger('skills'),
  optimizer: createComponentLogger('optimizer'),
  coverLetter: createComponentLogger('coverLetter'),
  render: createComponentLogger('render'),
  pipeline: createComponentLogger('pipeline'),
  /** Text-generation client */
  llm: createComponentLogger('llm'),
};

/**
 * Plain-object view of an error for structured log fields, including the
 * extra properties of AppError subclasses
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }

  const fields: Record<string, unknown> = {
    type: err.constructor.name,
    message: err.message,
  };
  for (const key of Object.getOwnPropertyNames(err)) {
    if (key !== 'name' && key !== 'message' && key !== 'stack') {
      fields[key] = Reflect.get(err, key);
    }
  }
  if (!isProduction) {
    fields.stack = err.stack;
  }
  return fields;
}
