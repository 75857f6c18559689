import { InjectionToken, inject } from '@angular/core';

import type { AppLockHooks, AppLockPartialConfig } from '../models/app-lock-config';
import type { LockPresenter } from '../models/presentation';
import { PresentationStackService } from '../services/presentation-stack.service';

export const APP_LOCK_CONFIG = new InjectionToken<AppLockPartialConfig>('ng-app-lock-config');

export const APP_LOCK_HOOKS = new InjectionToken<AppLockHooks>('ng-app-lock-hooks', {
  providedIn: 'root',
  factory: () => ({})
});

export const APP_LOCK_PRESENTER = new InjectionToken<LockPresenter>('ng-app-lock-presenter', {
  providedIn: 'root',
  factory: () => inject(PresentationStackService)
});

/** Payload handed to `didUnlock` on launch, injectable from the unlocked content. */
export const APP_LOCK_PAYLOAD = new InjectionToken<unknown>('ng-app-lock-payload');
