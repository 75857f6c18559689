import { inject } from '@angular/core';
import type { CanActivateFn, ActivatedRouteSnapshot, RouterStateSnapshot } from '@angular/router';

import { AppLockService } from '../services/app-lock.service';

export interface AppLockRouteConfig {
  allowWhileLocked?: boolean;
}

export const APP_LOCK_ROUTE_KEY = 'appLock';

/** Refuses navigation into guarded routes while the lock screen is showing. */
export const AppLockGuard: CanActivateFn = (route: ActivatedRouteSnapshot, _state: RouterStateSnapshot) => {
  const appLock = inject(AppLockService);
  const override = route.data?.[APP_LOCK_ROUTE_KEY] as AppLockRouteConfig | undefined;

  if (override?.allowWhileLocked) {
    return true;
  }

  return !appLock.isShowingLockScreen;
};
