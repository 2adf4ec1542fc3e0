import { Logtail } from '@logtail/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LEVEL_WEIGHT, value);

export const resolveLogLevel = (
  level: string | undefined,
  nodeEnv: string | undefined
): LogLevel => {
  if (isLogLevel(level)) {
    return level;
  }
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
};

let activeLevel = resolveLogLevel(process.env.LOG_LEVEL, process.env.NODE_ENV);

// Ship logs to Logtail if a source token is provided
const logtail = process.env.LOGTAIL_TOKEN ? new Logtail(process.env.LOGTAIL_TOKEN) : null;

const enabled = (level: Exclude<LogLevel, 'silent'>) =>
  LEVEL_WEIGHT[activeLevel] >= LEVEL_WEIGHT[level];

const ship = (delivery: Promise<unknown>) => {
  delivery.catch((error: unknown) => {
    console.error(`[ERROR] ${new Date().toISOString()} - Logtail delivery failed`, error);
  });
};

export const setLogLevel = (level: LogLevel): void => {
  activeLevel = level;
};

export const getLogLevel = (): LogLevel => activeLevel;

export const logger = {
  info: (message: string, meta?: Record<string, unknown>) => {
    if (!enabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${message}`, meta || '');
    if (logtail) {
      ship(logtail.info(message, meta));
    }
  },

  error: (message: string, error?: Error | Record<string, unknown>) => {
    if (!enabled('error')) return;
    console.error(`[ERROR] ${new Date().toISOString()} - ${message}`, error || '');
    if (logtail) {
      ship(logtail.error(message, error instanceof Error ? { error: error.message, stack: error.stack } : error));
    }
  },

  warn: (message: string, meta?: Record<string, unknown>) => {
    if (!enabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${message}`, meta || '');
    if (logtail) {
      ship(logtail.warn(message, meta));
    }
  },

  debug: (message: string, meta?: Record<string, unknown>) => {
    if (!enabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${message}`, meta || '');
    if (logtail) {
      ship(logtail.debug(message, meta));
    }
  },

  /**
   * Flush pending Logtail deliveries before the process exits
   */
  flush: async (): Promise<void> => {
    if (logtail) {
      await logtail.flush();
    }
  },
};
