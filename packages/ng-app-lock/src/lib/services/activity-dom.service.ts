import { DestroyRef, Injectable, NgZone, inject } from '@angular/core';
import { DOCUMENT } from '@angular/common';
import { Subject } from 'rxjs';

import type { ActivityEvent } from '../models/activity-event';
import type { AppLockConfig, DomActivityEventName } from '../models/app-lock-config';
import { DEFAULT_APP_LOCK_CONFIG } from '../defaults';
import { now } from '../utils/platform';

type EventThrottle = 'pointer' | 'key';

interface ThrottleState {
  lastEmittedAt: number | null;
  pending: ActivityEvent | null;
  timer: ReturnType<typeof globalThis.setTimeout> | null;
}

interface DomEventSpec {
  throttle: EventThrottle;
  options?: AddEventListenerOptions;
}

const PASSIVE_CAPTURE_OPTIONS: AddEventListenerOptions = { passive: true, capture: true };
const CAPTURE_OPTIONS: AddEventListenerOptions = { capture: true };

const DOM_EVENT_SPECS: Record<DomActivityEventName, DomEventSpec> = {
  pointerdown: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  pointermove: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  pointerup: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  pointercancel: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  wheel: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  touchstart: { throttle: 'pointer', options: PASSIVE_CAPTURE_OPTIONS },
  keydown: { throttle: 'key', options: CAPTURE_OPTIONS },
  keyup: { throttle: 'key', options: CAPTURE_OPTIONS }
} as const;

/**
 * Raw input listener. Event content is only kept as log metadata; every delivered event is an
 * activity ping for the inactivity timer. Bursts inside a throttle window collapse into the
 * first event plus the last one, delivered when the window closes.
 */
@Injectable({ providedIn: 'root' })
export class ActivityDomService {
  private readonly destroyRef = inject(DestroyRef);
  private readonly zone = inject(NgZone);
  private readonly document = inject(DOCUMENT, { optional: true }) as Document | undefined;

  private readonly eventsSubject = new Subject<ActivityEvent>();
  readonly events$ = this.eventsSubject.asObservable();

  private config: AppLockConfig = DEFAULT_APP_LOCK_CONFIG;
  private readonly listenerCleanupByEvent = new Map<DomActivityEventName, () => void>();
  private destroyHookRegistered = false;
  private readonly throttles: Record<EventThrottle, ThrottleState> = {
    pointer: { lastEmittedAt: null, pending: null, timer: null },
    key: { lastEmittedAt: null, pending: null, timer: null }
  };

  updateConfig(config: AppLockConfig): void {
    this.config = config;
    this.syncEventListeners();
  }

  private syncEventListeners(): void {
    const doc = this.document;
    if (!doc || !doc.defaultView) {
      this.cleanupListeners();
      return;
    }

    const desired = new Set(this.config.domActivityEvents);

    for (const [eventName, cleanup] of this.listenerCleanupByEvent) {
      if (!desired.has(eventName)) {
        cleanup();
        this.listenerCleanupByEvent.delete(eventName);
      }
    }

    const toAdd = [...desired].filter(eventName => !this.listenerCleanupByEvent.has(eventName));

    this.zone.runOutsideAngular(() => {
      for (const eventName of toAdd) {
        const spec = DOM_EVENT_SPECS[eventName];
        const handler = (event: Event) => this.handleEvent(event, spec.throttle);
        doc.addEventListener(eventName, handler, spec.options);
        this.listenerCleanupByEvent.set(eventName, () => {
          doc.removeEventListener(eventName, handler, spec.options);
        });
      }
    });

    this.ensureDestroyHook();
  }

  private ensureDestroyHook(): void {
    if (this.destroyHookRegistered) {
      return;
    }
    this.destroyRef.onDestroy(() => {
      this.cleanupListeners();
      this.clearPending();
      this.eventsSubject.complete();
    });
    this.destroyHookRegistered = true;
  }

  private handleEvent(event: Event, throttle: EventThrottle): void {
    const activity = this.toActivity(event);
    const state = this.throttles[throttle];
    const windowMs = throttle === 'pointer' ? this.config.debouncePointerMs : this.config.debounceKeyMs;

    if (state.lastEmittedAt == null || activity.at - state.lastEmittedAt >= windowMs) {
      this.clearTrailing(state);
      this.emit(state, activity);
      return;
    }

    state.pending = activity;
    if (state.timer == null) {
      state.timer = globalThis.setTimeout(() => {
        state.timer = null;
        const pending = state.pending;
        state.pending = null;
        if (pending) {
          this.emit(state, pending);
        }
      }, state.lastEmittedAt + windowMs - activity.at);
    }
  }

  private emit(state: ThrottleState, activity: ActivityEvent): void {
    state.lastEmittedAt = now();
    this.eventsSubject.next(activity);
  }

  private toActivity(event: Event): ActivityEvent {
    const meta: Record<string, unknown> = {
      type: event.type
    };

    if (typeof KeyboardEvent !== 'undefined' && event instanceof KeyboardEvent) {
      meta['key'] = event.key;
    } else if (typeof MouseEvent !== 'undefined' && event instanceof MouseEvent) {
      meta['button'] = event.button;
    }

    const target = event.target;
    if (typeof Element !== 'undefined' && target instanceof Element) {
      meta['target'] = target.tagName.toLowerCase();
    }

    return { source: 'dom', at: now(), meta };
  }

  private clearTrailing(state: ThrottleState): void {
    if (state.timer != null) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    state.pending = null;
  }

  private clearPending(): void {
    this.clearTrailing(this.throttles.pointer);
    this.clearTrailing(this.throttles.key);
  }

  private cleanupListeners(): void {
    for (const [, cleanup] of this.listenerCleanupByEvent) {
      cleanup();
    }
    this.listenerCleanupByEvent.clear();
  }
}
