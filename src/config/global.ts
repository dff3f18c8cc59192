import type { Action, AnyEvent } from '../types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface MachineLifecycleHooks {
  onHandle?: (machineId: string, stateName: string, event: AnyEvent, action: Action) => void;
  onTransition?: (machineId: string, from: string, to: string, event?: AnyEvent) => void;
}

export interface SwitchyardLogger {
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
  debug?: (...args: unknown[]) => void;
}

export interface SwitchyardGlobalConfig {
  logger?: SwitchyardLogger;
  logLevel?: LogLevel;
  lifecycleHooks?: MachineLifecycleHooks;
}

const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some(level => level === value);
};

/**
 * Resolve a log level from a raw string, e.g. the SWITCHYARD_LOG_LEVEL variable
 */
export function resolveLogLevel(value?: string): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return DEFAULT_LOG_LEVEL;
}

let activeInstance: Switchyard | null = null;

export class Switchyard {
  private config: SwitchyardGlobalConfig;

  constructor(config: SwitchyardGlobalConfig = {}) {
    this.config = {
      ...config,
      logLevel: config.logLevel || resolveLogLevel(process.env.SWITCHYARD_LOG_LEVEL),
      logger: config.logger,
      lifecycleHooks: config.lifecycleHooks,
    };
  }

  getConfig(): SwitchyardGlobalConfig {
    return this.config;
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getLifecycleHooks(): MachineLifecycleHooks {
    return this.config.lifecycleHooks ?? {};
  }

  setActive(): void {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    activeInstance = this;
  }

  static getActive(): Switchyard | null {
    return activeInstance;
  }

  static clearActive(): void {
    activeInstance = null;
  }
}
