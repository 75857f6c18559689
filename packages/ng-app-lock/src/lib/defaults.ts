import type { AppLockConfig, DomActivityEventName } from './models/app-lock-config';

export const DEFAULT_DOM_ACTIVITY_EVENTS = Object.freeze([
  'pointerdown',
  'pointermove',
  'pointerup',
  'pointercancel',
  'wheel',
  'keydown'
] as const satisfies readonly DomActivityEventName[]);

export const DEFAULT_APP_LOCK_CONFIG: AppLockConfig = {
  lockScreen: null,
  contentBuilder: null,
  enabled: true,
  backgroundLockLatencyMs: 0,
  inactivityLockLatencyMs: null,
  themeClass: undefined,
  documentLifecycle: true,
  domActivityEvents: DEFAULT_DOM_ACTIVITY_EVENTS,
  debouncePointerMs: 250,
  debounceKeyMs: 0,
  routerCountsAsActivity: false,
  logging: 'warn'
};
