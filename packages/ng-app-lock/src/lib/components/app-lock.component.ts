import { ChangeDetectionStrategy, Component, Injector, computed, inject, untracked } from '@angular/core';
import type { Type } from '@angular/core';
import { NgComponentOutlet, NgIf } from '@angular/common';

import { LOCK_SCREEN_ROUTE, UNLOCKED_ROUTE, type LockRoute, type PresentationEntry } from '../models/presentation';
import { APP_LOCK_PAYLOAD } from '../tokens/config.token';
import { AppLockService } from '../services/app-lock.service';
import { PresentationStackService } from '../services/presentation-stack.service';

interface ContentView {
  component: Type<unknown>;
  injector: Injector;
}

// Stands in for the content of a disabled launch, which never goes through `replace`.
const LAUNCH_CONTENT_ENTRY: PresentationEntry = { id: 0, route: UNLOCKED_ROUTE, payload: undefined };

/**
 * Host for the lock screen and the unlocked content. The content stays mounted underneath a
 * presented lock screen and is only rebuilt when a new `unlocked` entry replaces it.
 */
@Component({
  selector: 'app-lock',
  standalone: true,
  imports: [NgIf, NgComponentOutlet],
  changeDetection: ChangeDetectionStrategy.OnPush,
  host: {
    '[class]': 'hostClass()',
    '[attr.data-route]': 'route()'
  },
  styles: [
    `
      :host {
        display: block;
        position: relative;
      }
      .app-lock__content--covered {
        visibility: hidden;
      }
      .app-lock__screen {
        position: absolute;
        inset: 0;
      }
    `
  ],
  template: `
    <div
      *ngIf="content() as view"
      class="app-lock__content"
      [class.app-lock__content--covered]="locked()"
      [attr.inert]="locked() ? '' : null"
      [attr.aria-hidden]="locked() ? 'true' : null"
    >
      <ng-container *ngComponentOutlet="view.component; injector: view.injector" />
    </div>
    <div *ngIf="lockScreen() as screen" class="app-lock__screen">
      <ng-container *ngComponentOutlet="screen" />
    </div>
  `
})
export class AppLockComponent {
  private readonly appLock = inject(AppLockService);
  private readonly stack = inject(PresentationStackService);
  private readonly injector = inject(Injector);

  readonly hostClass = computed(() => {
    const themeClass = this.appLock.getConfig().themeClass;
    return themeClass ? 'app-lock ' + themeClass : 'app-lock';
  });

  readonly locked = computed(() => (this.stack.top()?.route ?? this.appLock.launchRoute) === LOCK_SCREEN_ROUTE);

  readonly route = computed<LockRoute>(() => (this.locked() ? LOCK_SCREEN_ROUTE : UNLOCKED_ROUTE));

  private readonly contentEntry = computed<PresentationEntry | null>(
    () => {
      const entry = this.stack.entries().find(candidate => candidate.route === UNLOCKED_ROUTE);
      if (entry) {
        return entry;
      }
      return this.appLock.launchRoute === UNLOCKED_ROUTE ? LAUNCH_CONTENT_ENTRY : null;
    },
    { equal: (a, b) => a?.id === b?.id }
  );

  readonly content = computed<ContentView | null>(() => {
    const entry = this.contentEntry();
    if (!entry) {
      return null;
    }
    // built once per entry: config updates must not remount the content
    const builder = untracked(() => this.appLock.getConfig().contentBuilder);
    return {
      component: this.requireComponent(builder ? builder(entry.payload) : null),
      injector: Injector.create({
        providers: [{ provide: APP_LOCK_PAYLOAD, useValue: entry.payload }],
        parent: this.injector
      })
    };
  });

  readonly lockScreen = computed<Type<unknown> | null>(() =>
    this.locked() ? this.requireComponent(this.appLock.getConfig().lockScreen) : null
  );

  private requireComponent(component: Type<unknown> | null): Type<unknown> {
    if (!component) {
      throw new Error('[ng-app-lock] No component configured for the current route');
    }
    return component;
  }
}
