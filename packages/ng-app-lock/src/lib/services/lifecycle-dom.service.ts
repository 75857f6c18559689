import { DestroyRef, Injectable, NgZone, inject } from '@angular/core';
import { DOCUMENT } from '@angular/common';
import { Subject } from 'rxjs';

import type { LifecycleEvent, LifecycleState } from '../models/lifecycle-event';
import type { AppLockConfig } from '../models/app-lock-config';
import { DEFAULT_APP_LOCK_CONFIG } from '../defaults';
import { isBrowserPlatform, lifecycleStateOf, now } from '../utils/platform';

type LifecycleTrigger = 'visibilitychange' | 'pagehide' | 'pageshow';

/**
 * Translates page visibility into foreground/background transitions. Repeated signals for the
 * state already reported (e.g. `pagehide` right after the tab became hidden) are swallowed.
 */
@Injectable({ providedIn: 'root' })
export class LifecycleDomService {
  private readonly destroyRef = inject(DestroyRef);
  private readonly zone = inject(NgZone);
  private readonly document = inject(DOCUMENT, { optional: true }) as Document | undefined;
  private readonly isBrowser = isBrowserPlatform();

  private readonly eventsSubject = new Subject<LifecycleEvent>();
  readonly events$ = this.eventsSubject.asObservable();

  private config: AppLockConfig = DEFAULT_APP_LOCK_CONFIG;
  private cleanup: (() => void) | null = null;
  private destroyHookRegistered = false;
  private lastState: LifecycleState = this.readVisibility();

  get state(): LifecycleState {
    return this.lastState;
  }

  updateConfig(config: AppLockConfig): void {
    this.config = config;
    if (config.documentLifecycle) {
      this.startListening();
    } else {
      this.stopListening();
    }
  }

  private startListening(): void {
    const doc = this.document;
    const win = doc?.defaultView;
    if (this.cleanup || !this.isBrowser || !doc || !win) {
      return;
    }

    const onVisibility = () => this.handle('visibilitychange', this.readVisibility());
    const onPageHide = () => this.handle('pagehide', 'background');
    const onPageShow = () => this.handle('pageshow', 'foreground');

    this.zone.runOutsideAngular(() => {
      doc.addEventListener('visibilitychange', onVisibility);
      win.addEventListener('pagehide', onPageHide);
      win.addEventListener('pageshow', onPageShow);
    });

    this.cleanup = () => {
      doc.removeEventListener('visibilitychange', onVisibility);
      win.removeEventListener('pagehide', onPageHide);
      win.removeEventListener('pageshow', onPageShow);
    };

    if (!this.destroyHookRegistered) {
      this.destroyRef.onDestroy(() => {
        this.stopListening();
        this.eventsSubject.complete();
      });
      this.destroyHookRegistered = true;
    }
  }

  private stopListening(): void {
    this.cleanup?.();
    this.cleanup = null;
  }

  private handle(trigger: LifecycleTrigger, state: LifecycleState): void {
    if (!this.config.documentLifecycle || state === this.lastState) {
      return;
    }
    this.lastState = state;
    this.eventsSubject.next({
      state,
      source: 'dom',
      at: now(),
      meta: { trigger }
    });
  }

  private readVisibility(): LifecycleState {
    return lifecycleStateOf(this.document);
  }
}
