import { inject } from '@angular/core';

import type { AppLockConfig, AppLockLogLevel } from '../models/app-lock-config';
import { APP_LOCK_CONFIG } from '../tokens/config.token';
import { DEFAULT_APP_LOCK_CONFIG } from '../defaults';
import { isLogLevel } from '../validation';

export type LogLevel = AppLockLogLevel;

type WrittenLevel = Exclude<LogLevel, 'silent'>;

const levelRank: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: Number.POSITIVE_INFINITY
};

export type Logger = Record<WrittenLevel, (message: string, ...rest: unknown[]) => void>;

const prefix = '[ng-app-lock]';

/**
 * Builds a console logger filtered at the configured level. Without an explicit config the
 * level is read from `APP_LOCK_CONFIG`, so this overload must run in an injection context.
 */
export function createLogger(config?: Pick<AppLockConfig, 'logging'>): Logger {
  const requested = config?.logging ?? inject(APP_LOCK_CONFIG, { optional: true })?.logging;
  const threshold = levelRank[isLogLevel(requested) ? requested : DEFAULT_APP_LOCK_CONFIG.logging];

  const writer =
    (level: WrittenLevel) =>
    (message: string, ...rest: unknown[]): void => {
      if (levelRank[level] >= threshold) {
        console[level](`${prefix} ${message}`, ...rest);
      }
    };

  return {
    trace: writer('trace'),
    debug: writer('debug'),
    info: writer('info'),
    warn: writer('warn'),
    error: writer('error')
  };
}
