import type { Type } from '@angular/core';

import type { ActivityEvent } from './activity-event';
import type { AppLockEvent } from './lock-event';

export const DOM_ACTIVITY_EVENT_NAMES = [
  'pointerdown',
  'pointermove',
  'pointerup',
  'pointercancel',
  'wheel',
  'keydown',
  'keyup',
  'touchstart'
] as const;

export type DomActivityEventName = (typeof DOM_ACTIVITY_EVENT_NAMES)[number];

export type AppLockLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type ContentBuilder = (payload: unknown) => Type<unknown>;

export interface AppLockConfig {
  lockScreen: Type<unknown> | null;
  contentBuilder: ContentBuilder | null;
  enabled: boolean;
  backgroundLockLatencyMs: number;
  inactivityLockLatencyMs: number | null;
  themeClass?: string;
  documentLifecycle: boolean;
  domActivityEvents: readonly DomActivityEventName[];
  debouncePointerMs: number;
  debounceKeyMs: number;
  routerCountsAsActivity: boolean;
  logging: AppLockLogLevel;
}

export type AppLockPartialConfig = Partial<AppLockConfig>;

export interface AppLockHooks {
  onLock?: (event: AppLockEvent) => void;
  onUnlock?: (event: AppLockEvent) => void;
  onActivity?: (activity: ActivityEvent) => void;
}
