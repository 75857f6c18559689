import { DEFAULT_APP_LOCK_CONFIG } from './defaults';
import { AppLockConfigError } from './errors';
import {
  DOM_ACTIVITY_EVENT_NAMES,
  type AppLockConfig,
  type AppLockLogLevel,
  type AppLockPartialConfig,
  type DomActivityEventName
} from './models/app-lock-config';

export interface ValidationIssue {
  field: string;
  message: string;
  required?: boolean;
}

export interface ValidationResult {
  issues: ValidationIssue[];
  config: AppLockConfig;
}

const DOM_ACTIVITY_EVENT_SET = new Set<string>(DOM_ACTIVITY_EVENT_NAMES);
const LOG_LEVEL_SET = new Set<string>(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

/**
 * Merges `partial` over `base` (defaults when omitted) and reports every field that had to be
 * corrected. Invalid optional values fall back to their defaults; missing required values are
 * reported with `required: true` and left empty.
 */
export function validateConfig(
  partial: AppLockPartialConfig | null | undefined,
  base: AppLockConfig = DEFAULT_APP_LOCK_CONFIG
): ValidationResult {
  const issues: ValidationIssue[] = [];
  const config: AppLockConfig = {
    ...base,
    ...withoutUndefined(partial ?? {}),
    domActivityEvents: base.domActivityEvents
  };

  if (typeof config.lockScreen !== 'function') {
    issues.push(createIssue('lockScreen', 'A lock screen component is required', true));
    config.lockScreen = null;
  }
  if (typeof config.contentBuilder !== 'function') {
    issues.push(createIssue('contentBuilder', 'A content builder function is required', true));
    config.contentBuilder = null;
  }

  if (!isDuration(config.backgroundLockLatencyMs)) {
    issues.push(createIssue('backgroundLockLatencyMs', 'Value must be a finite number >= 0'));
    config.backgroundLockLatencyMs = DEFAULT_APP_LOCK_CONFIG.backgroundLockLatencyMs;
  }
  if (config.inactivityLockLatencyMs !== null && !isDuration(config.inactivityLockLatencyMs)) {
    issues.push(createIssue('inactivityLockLatencyMs', 'Value must be null or a finite number >= 0'));
    config.inactivityLockLatencyMs = null;
  }
  if (!isDuration(config.debouncePointerMs)) {
    issues.push(createIssue('debouncePointerMs', 'Value must be >= 0'));
    config.debouncePointerMs = DEFAULT_APP_LOCK_CONFIG.debouncePointerMs;
  }
  if (!isDuration(config.debounceKeyMs)) {
    issues.push(createIssue('debounceKeyMs', 'Value must be >= 0'));
    config.debounceKeyMs = DEFAULT_APP_LOCK_CONFIG.debounceKeyMs;
  }
  if (!LOG_LEVEL_SET.has(String(config.logging))) {
    issues.push(createIssue('logging', `Unsupported log level: ${String(config.logging)}`));
    config.logging = DEFAULT_APP_LOCK_CONFIG.logging;
  }

  const requestedEvents = partial?.domActivityEvents;
  if (Array.isArray(requestedEvents)) {
    const { events, invalid } = normalizeDomEvents(requestedEvents);
    if (invalid.length > 0) {
      issues.push(createIssue('domActivityEvents', `Unsupported DOM events: ${invalid.join(', ')}`));
    }
    config.domActivityEvents = events;
  } else {
    config.domActivityEvents = [...base.domActivityEvents];
  }

  return { issues, config };
}

/** Throws when a required field is missing; returns the normalized config otherwise. */
export function assertValidConfig(result: ValidationResult): AppLockConfig {
  const fatal = result.issues.filter(issue => issue.required);
  if (fatal.length > 0) {
    throw new AppLockConfigError(fatal);
  }
  return result.config;
}

export function isLogLevel(value: unknown): value is AppLockLogLevel {
  return typeof value === 'string' && LOG_LEVEL_SET.has(value);
}

function normalizeDomEvents(raw: readonly unknown[]): { events: DomActivityEventName[]; invalid: string[] } {
  const events: DomActivityEventName[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    const candidate = String(entry);
    if (!isDomActivityEventName(candidate)) {
      invalid.push(candidate);
      continue;
    }
    if (!seen.has(candidate)) {
      seen.add(candidate);
      events.push(candidate);
    }
  }
  return { events, invalid };
}

function isDomActivityEventName(value: string): value is DomActivityEventName {
  return DOM_ACTIVITY_EVENT_SET.has(value);
}

function isDuration(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function withoutUndefined(partial: AppLockPartialConfig): AppLockPartialConfig {
  const entries = Object.entries(partial).filter(([, value]) => value !== undefined);
  return Object.fromEntries(entries);
}

function createIssue(field: string, message: string, required = false): ValidationIssue {
  return required ? { field, message, required } : { field, message };
}
