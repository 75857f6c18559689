import { Component } from '@angular/core';
import { TestBed } from '@angular/core/testing';

import type { AppLockHooks } from './models/app-lock-config';
import { AppLockConfigError } from './errors';
import { createAppLockProviders, provideAppLock } from './provide-app-lock';
import { AppLockService } from './services/app-lock.service';
import { APP_LOCK_CONFIG, APP_LOCK_HOOKS } from './tokens/config.token';

@Component({ standalone: true, template: '' })
class StubLockScreenComponent {}

@Component({ standalone: true, template: '' })
class StubContentComponent {}

const requiredConfig = {
  lockScreen: StubLockScreenComponent,
  contentBuilder: () => StubContentComponent,
  logging: 'silent' as const
};

describe('provideAppLock', () => {
  it('provides the controller with the given configuration', () => {
    TestBed.configureTestingModule({
      providers: [provideAppLock({ ...requiredConfig, backgroundLockLatencyMs: 30_000 })]
    });

    const service = TestBed.inject(AppLockService);

    expect(service.getConfig().backgroundLockLatencyMs).toBe(30_000);
    expect(service.isShowingLockScreen).toBe(true);
  });

  it('resolves configuration factories', () => {
    const factory = jest.fn(() => ({ ...requiredConfig, enabled: false }));
    TestBed.configureTestingModule({
      providers: [provideAppLock(factory)]
    });

    expect(TestBed.inject(APP_LOCK_CONFIG).enabled).toBe(false);
    expect(TestBed.inject(AppLockService).isShowingLockScreen).toBe(false);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('registers hooks when given', () => {
    const hooks: AppLockHooks = { onLock: jest.fn() };
    TestBed.configureTestingModule({
      providers: [provideAppLock(requiredConfig, { hooks })]
    });

    expect(TestBed.inject(APP_LOCK_HOOKS)).toBe(hooks);
  });

  it('only adds a hooks provider when hooks are given', () => {
    expect(createAppLockProviders(requiredConfig)).toHaveLength(3);
    expect(createAppLockProviders(requiredConfig, { hooks: {} })).toHaveLength(4);
  });

  it('fails at startup when the lock screen is missing', () => {
    TestBed.configureTestingModule({
      providers: [provideAppLock({ contentBuilder: () => StubContentComponent })]
    });

    expect(() => TestBed.inject(APP_LOCK_HOOKS)).toThrow(AppLockConfigError);
  });
});
