import {
  Switchyard,
  resolveLogLevel,
  type LogLevel,
  type SwitchyardLogger,
} from '../config/global';

type LogFn = (...args: unknown[]) => void;

type LoggedLevel = Exclude<LogLevel, 'silent'>;

export type Logger = Record<LoggedLevel, LogFn>;

export interface StructuredLogContext {
  machineId?: string;
  state?: string;
  event?: string;
  [key: string]: unknown;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const noop: LogFn = () => {
  /* noop */
};

/**
 * Build a logger level by level
 */
const byLevel = (build: (level: LoggedLevel) => LogFn): Logger => ({
  debug: build('debug'),
  info: build('info'),
  warn: build('warn'),
  error: build('error'),
});

export const noopLogger: Logger = byLevel(() => noop);

const consoleLogger: Logger = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Complete a partial user logger; missing levels are dropped
 */
const normalize = (logger: SwitchyardLogger): Logger =>
  byLevel(level => (...args) => {
    logger[level]?.(...args);
  });

/**
 * Drop every call below `level`
 */
export function withLevel(logger: Logger, level: LogLevel): Logger {
  return byLevel(target => (SEVERITY[target] >= SEVERITY[level] ? logger[target] : noop));
}

/**
 * Logger of the active configuration, or the console filtered by SWITCHYARD_LOG_LEVEL
 */
export function getLogger(): Logger {
  const active = Switchyard.getActive();
  if (!active) {
    return withLevel(consoleLogger, resolveLogLevel(process.env.SWITCHYARD_LOG_LEVEL));
  }

  const { logger } = active.getConfig();
  return withLevel(logger ? normalize(logger) : consoleLogger, active.getLogLevel());
}

export function createLoggerFromConfig(logger?: SwitchyardLogger, level?: LogLevel): Logger {
  const base = logger ? normalize(logger) : noopLogger;
  return level ? withLevel(base, level) : base;
}

/**
 * Prefix every message with `[key=value ...]` built from the defined context entries
 */
export function createStructuredLogger(context: StructuredLogContext, base: Logger = getLogger()): Logger {
  const prefix = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(' ');

  return byLevel(level => (message?: unknown, ...rest: unknown[]) => {
    base[level](`[${prefix}] ${typeof message === 'string' ? message : ''}`, ...rest);
  });
}
