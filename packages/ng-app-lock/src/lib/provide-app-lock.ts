import { APP_INITIALIZER, EnvironmentProviders, Injector, Provider, makeEnvironmentProviders } from '@angular/core';

import type { AppLockHooks, AppLockPartialConfig } from './models/app-lock-config';
import { APP_LOCK_CONFIG, APP_LOCK_HOOKS } from './tokens/config.token';
import { AppLockService } from './services/app-lock.service';

export type AppLockConfigInput = AppLockPartialConfig | (() => AppLockPartialConfig);

export interface AppLockProviderOptions {
  hooks?: AppLockHooks;
}

function resolveConfig(input: AppLockConfigInput): AppLockPartialConfig {
  return typeof input === 'function' ? input() : input;
}

/**
 * Providers for the lock controller. The controller is created by an app initializer so that
 * lifecycle and activity listeners are attached before the first render.
 */
export function createAppLockProviders(config: AppLockConfigInput, options: AppLockProviderOptions = {}): Provider[] {
  const providers: Provider[] = [
    {
      provide: APP_LOCK_CONFIG,
      useFactory: () => resolveConfig(config)
    },
    AppLockService,
    {
      provide: APP_INITIALIZER,
      multi: true,
      deps: [Injector],
      useFactory: (injector: Injector) => () => {
        injector.get(AppLockService);
      }
    }
  ];

  if (options.hooks) {
    providers.push({ provide: APP_LOCK_HOOKS, useValue: options.hooks });
  }

  return providers;
}

export function provideAppLock(config: AppLockConfigInput, options?: AppLockProviderOptions): EnvironmentProviders {
  return makeEnvironmentProviders(createAppLockProviders(config, options));
}
