import { DestroyRef, Injectable, NgZone, inject } from '@angular/core';
import { NavigationEnd, Router } from '@angular/router';
import { Subject, filter } from 'rxjs';
import type { Subscription } from 'rxjs';

import type { ActivityEvent } from '../models/activity-event';
import type { AppLockConfig } from '../models/app-lock-config';
import { DEFAULT_APP_LOCK_CONFIG } from '../defaults';
import { now } from '../utils/platform';

@Injectable({ providedIn: 'root' })
export class ActivityRouterService {
  private readonly destroyRef = inject(DestroyRef);
  private readonly zone = inject(NgZone);
  private readonly router = inject(Router, { optional: true });

  private readonly eventsSubject = new Subject<ActivityEvent>();
  readonly events$ = this.eventsSubject.asObservable();

  private subscription: Subscription | null = null;
  private destroyHookRegistered = false;
  private config: AppLockConfig = DEFAULT_APP_LOCK_CONFIG;

  updateConfig(config: AppLockConfig): void {
    this.config = config;
    if (!config.routerCountsAsActivity) {
      this.stopListening();
      return;
    }
    this.startListening();
  }

  private startListening(): void {
    const router = this.router;
    if (this.subscription || !router) {
      return;
    }

    this.subscription = this.zone.runOutsideAngular(() =>
      router.events
        .pipe(filter((event): event is NavigationEnd => event instanceof NavigationEnd))
        .subscribe(event => {
          if (!this.config.routerCountsAsActivity) {
            return;
          }
          this.eventsSubject.next({
            source: 'router',
            at: now(),
            meta: {
              url: event.urlAfterRedirects
            }
          });
        })
    );

    if (!this.destroyHookRegistered) {
      this.destroyRef.onDestroy(() => {
        this.stopListening();
      });
      this.destroyHookRegistered = true;
    }
  }

  private stopListening(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }
}
