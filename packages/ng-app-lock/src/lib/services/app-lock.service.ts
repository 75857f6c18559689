import { DestroyRef, Injectable, NgZone, computed, inject, signal } from '@angular/core';
import type { Signal } from '@angular/core';
import { toObservable } from '@angular/core/rxjs-interop';
import { Subject, takeUntil } from 'rxjs';

import type { ActivityEvent } from '../models/activity-event';
import type { AppLockConfig, AppLockHooks, AppLockPartialConfig } from '../models/app-lock-config';
import type { AppLockEvent, AppLockEventType } from '../models/lock-event';
import type { AppLockState, LockReason, LockSessionSnapshot } from '../models/lock-state';
import type { LifecycleEvent, LifecycleState } from '../models/lifecycle-event';
import { LOCK_SCREEN_ROUTE, UNLOCKED_ROUTE, type LockPresenter, type LockRoute } from '../models/presentation';
import { APP_LOCK_CONFIG, APP_LOCK_HOOKS, APP_LOCK_PRESENTER } from '../tokens/config.token';
import { assertValidConfig, validateConfig, type ValidationIssue } from '../validation';
import { createLogger, type Logger } from '../utils/logging';
import { now } from '../utils/platform';
import { ActivityDomService } from './activity-dom.service';
import { ActivityRouterService } from './activity-router.service';
import { LifecycleDomService } from './lifecycle-dom.service';

type LockTimerKind = 'background' | 'inactivity';

type PresenterDirective = 'present' | 'replace' | 'dismiss';

type DirectiveOutcome<T> = { status: 'issued'; value: T } | { status: 'dropped' } | { status: 'failed' };

interface LockSession {
  enabled: boolean;
  hasUnlockedSinceLaunch: boolean;
  isLockScreenVisible: boolean;
  backgroundLockAt: number | null;
  inactivityLockAt: number | null;
  lastActivityAt: number | null;
  lifecycle: LifecycleState;
}

function deriveState(session: LockSession): AppLockState {
  if (!session.hasUnlockedSinceLaunch) {
    return 'LAUNCH_LOCKED';
  }
  if (session.isLockScreenVisible) {
    return 'LOCKED';
  }
  if (session.backgroundLockAt != null) {
    return 'PENDING_BACKGROUND_LOCK';
  }
  if (session.inactivityLockAt != null) {
    return 'PENDING_INACTIVITY_LOCK';
  }
  return 'UNLOCKED';
}

/**
 * Lock controller. Decides when the lock screen is presented or dismissed based on
 * lifecycle transitions, a background latency timer and an inactivity timer, and drives the
 * injected {@link LockPresenter} accordingly.
 */
@Injectable({ providedIn: 'root' })
export class AppLockService {
  private readonly destroyRef = inject(DestroyRef);
  private readonly zone = inject(NgZone);
  private readonly providedConfig = inject(APP_LOCK_CONFIG, { optional: true });
  private readonly hooks: AppLockHooks = inject(APP_LOCK_HOOKS, { optional: true }) ?? {};
  private presenter: LockPresenter | null = inject(APP_LOCK_PRESENTER, { optional: true });
  private readonly lifecycleSource = inject(LifecycleDomService, { optional: true });
  private readonly domActivity = inject(ActivityDomService, { optional: true });
  private readonly routerActivity = inject(ActivityRouterService, { optional: true });

  private readonly initialValidation = validateConfig(this.providedConfig);
  private readonly configSignal = signal<AppLockConfig>(assertValidConfig(this.initialValidation));
  private logger: Logger = createLogger(this.configSignal());

  private readonly sessionSignal = signal<LockSession>({
    enabled: this.configSignal().enabled,
    hasUnlockedSinceLaunch: !this.configSignal().enabled,
    isLockScreenVisible: false,
    backgroundLockAt: null,
    inactivityLockAt: null,
    lastActivityAt: null,
    lifecycle: this.lifecycleSource?.state ?? 'foreground'
  });

  private readonly timers = new Map<LockTimerKind, ReturnType<typeof globalThis.setTimeout>>();
  private readonly launchUnlockWaiters: (() => void)[] = [];
  private pendingPresentation: Promise<void> | null = null;
  private disposed = false;

  private readonly destroy$ = new Subject<void>();
  private readonly eventsSubject = new Subject<AppLockEvent>();
  private readonly activitySubject = new Subject<ActivityEvent>();
  private readonly lifecycleSubject = new Subject<LifecycleEvent>();

  /** Route shown before any directive has been issued. */
  readonly launchRoute: LockRoute = this.configSignal().enabled ? LOCK_SCREEN_ROUTE : UNLOCKED_ROUTE;

  private readonly snapshotSignal: Signal<LockSessionSnapshot> = computed(() => {
    const session = this.sessionSignal();
    const config = this.configSignal();
    return {
      ...session,
      state: deriveState(session),
      isShowingLockScreen: session.isLockScreenVisible || !session.hasUnlockedSinceLaunch,
      backgroundLockLatencyMs: config.backgroundLockLatencyMs,
      inactivityLockLatencyMs: config.inactivityLockLatencyMs
    };
  });

  readonly stateSignal: Signal<AppLockState> = computed(() => this.snapshotSignal().state);
  readonly isShowingLockScreenSignal: Signal<boolean> = computed(() => this.snapshotSignal().isShowingLockScreen);
  readonly enabledSignal: Signal<boolean> = computed(() => this.sessionSignal().enabled);

  readonly state$ = toObservable(this.stateSignal);
  readonly isShowingLockScreen$ = toObservable(this.isShowingLockScreenSignal);
  readonly events$ = this.eventsSubject.asObservable();
  readonly activity$ = this.activitySubject.asObservable();
  readonly lifecycle$ = this.lifecycleSubject.asObservable();

  constructor() {
    this.reportIssues(this.initialValidation.issues);

    this.lifecycleSource?.events$.pipe(takeUntil(this.destroy$)).subscribe(event => {
      this.zone.run(() => this.handleLifecycle(event));
    });
    this.domActivity?.events$.pipe(takeUntil(this.destroy$)).subscribe(activity => {
      this.zone.run(() => this.handleActivity(activity));
    });
    this.routerActivity?.events$.pipe(takeUntil(this.destroy$)).subscribe(activity => {
      this.zone.run(() => this.handleActivity(activity));
    });

    this.applySourceConfig(this.configSignal());
    this.setupInactivityTimer();

    this.destroyRef.onDestroy(() => {
      this.disposed = true;
      this.destroy$.next();
      this.destroy$.complete();
      this.clearAllTimers();
      this.presenter = null;
      this.eventsSubject.complete();
      this.activitySubject.complete();
      this.lifecycleSubject.complete();
    });
  }

  get isShowingLockScreen(): boolean {
    return this.isShowingLockScreenSignal();
  }

  onLifecycleChange(state: LifecycleState, meta?: Record<string, unknown>): void {
    this.handleLifecycle({ state, source: 'manual', at: now(), meta });
  }

  onUserActivity(meta?: Record<string, unknown>): void {
    this.handleActivity({ source: 'manual', at: now(), meta });
  }

  /**
   * Reports a successful unlock from the lock screen. The first call after launch replaces the
   * lock screen with the unlocked content built from `payload`; later calls dismiss the lock
   * screen that was presented on top of the content and ignore `payload`.
   */
  didUnlock(payload?: unknown): void {
    const session = this.sessionSignal();

    if (!session.hasUnlockedSinceLaunch) {
      this.patchSession({ hasUnlockedSinceLaunch: true });
      this.issue('replace', presenter => presenter.replace(UNLOCKED_ROUTE, payload));
      this.launchUnlockWaiters.splice(0).forEach(resolve => resolve());
      this.emitEvent('LaunchUnlocked');
    } else if (session.isLockScreenVisible) {
      this.patchSession({ isLockScreenVisible: false });
      this.pendingPresentation = null;
      this.issue('dismiss', presenter => presenter.dismiss());
      this.emitEvent('Unlocked');
    } else {
      this.logger.debug('didUnlock ignored: no lock screen is presented');
    }

    this.setupInactivityTimer();
  }

  setEnabled(enabled: boolean): void {
    const previous = this.sessionSignal().enabled;
    this.patchSession({ enabled });

    if (!enabled && this.cancelTimer('background')) {
      this.emitEvent('BackgroundLockCancelled', { reason: 'disabled' });
    }
    this.setupInactivityTimer();

    if (previous !== enabled) {
      this.emitEvent(enabled ? 'Enabled' : 'Disabled');
    }
  }

  enable(): void {
    this.setEnabled(true);
  }

  disable(): void {
    this.setEnabled(false);
  }

  /**
   * Presents the lock screen on demand. Resolves once the unlock that dismisses it happens.
   * Repeated calls while a lock screen is already showing reuse the pending result.
   */
  showLockScreen(): Promise<void> {
    return this.presentLock('manual');
  }

  setConfig(partial: AppLockPartialConfig): void {
    const result = validateConfig(partial, this.configSignal());
    const config = assertValidConfig(result);

    this.configSignal.set(config);
    this.logger = createLogger(config);
    this.reportIssues(result.issues);
    this.applySourceConfig(config);

    if (partial.enabled !== undefined) {
      this.setEnabled(partial.enabled);
    } else {
      this.setupInactivityTimer();
    }
    this.emitEvent('ConfigChanged', { issues: result.issues });
  }

  getSnapshot(): LockSessionSnapshot {
    return { ...this.snapshotSignal() };
  }

  getConfig(): AppLockConfig {
    return { ...this.configSignal() };
  }

  private handleLifecycle(event: LifecycleEvent): void {
    this.patchSession({ lifecycle: event.state });
    this.lifecycleSubject.next(event);

    if (event.state === 'foreground') {
      if (this.cancelTimer('background')) {
        this.emitEvent('BackgroundLockCancelled', { reason: 'foreground' });
      }
      return;
    }

    if (!this.sessionSignal().enabled || this.isShowingLockScreen) {
      return;
    }

    const latencyMs = this.configSignal().backgroundLockLatencyMs;
    this.armTimer('background', latencyMs);
    this.emitEvent('BackgroundLockArmed', { latencyMs });
  }

  private handleActivity(activity: ActivityEvent): void {
    this.patchSession({ lastActivityAt: activity.at });
    this.activitySubject.next(activity);
    if (typeof this.hooks.onActivity === 'function') {
      try {
        this.hooks.onActivity(activity);
      } catch (error) {
        this.logger.error('Error executing onActivity hook', error);
      }
    }
    this.setupInactivityTimer();
  }

  private setupInactivityTimer(): void {
    const wasArmed = this.cancelTimer('inactivity');
    const latencyMs = this.configSignal().inactivityLockLatencyMs;

    if (this.disposed || latencyMs == null || !this.sessionSignal().enabled || this.isShowingLockScreen) {
      return;
    }

    this.armTimer('inactivity', latencyMs);
    if (!wasArmed) {
      this.emitEvent('InactivityLockArmed', { latencyMs });
    }
  }

  private presentLock(reason: LockReason): Promise<void> {
    const session = this.sessionSignal();

    if (!session.hasUnlockedSinceLaunch) {
      return new Promise<void>(resolve => this.launchUnlockWaiters.push(resolve));
    }
    if (session.isLockScreenVisible && this.pendingPresentation) {
      return this.pendingPresentation;
    }

    this.cancelTimer('background');
    this.cancelTimer('inactivity');
    this.patchSession({ isLockScreenVisible: true });

    const outcome = this.issue('present', presenter => presenter.present(LOCK_SCREEN_ROUTE));

    if (outcome.status === 'dropped') {
      // torn down: the unlock this would wait for can no longer happen
      return new Promise<void>(() => undefined);
    }
    if (outcome.status === 'failed') {
      this.patchSession({ isLockScreenVisible: false });
      this.setupInactivityTimer();
      return Promise.resolve();
    }

    const presentation = outcome.value.catch((error: unknown) => {
      this.logger.warn('Lock screen presentation rejected', error);
    });
    this.pendingPresentation = presentation;
    this.emitEvent('Locked', { reason });
    return presentation;
  }

  private lockFromTimer(kind: LockTimerKind): void {
    if (!this.sessionSignal().enabled || this.isShowingLockScreen) {
      return;
    }
    void this.presentLock(kind);
  }

  private issue<T>(directive: PresenterDirective, work: (presenter: LockPresenter) => T): DirectiveOutcome<T> {
    const presenter = this.disposed ? null : this.presenter;
    if (!presenter) {
      this.logger.debug('Dropped ' + directive + ' directive: presenter unavailable');
      this.emitEvent('DirectiveDropped', { directive });
      return { status: 'dropped' };
    }
    try {
      return { status: 'issued', value: work(presenter) };
    } catch (error) {
      this.logger.warn('Presenter failed to handle ' + directive + ' directive', error);
      return { status: 'failed' };
    }
  }

  private armTimer(kind: LockTimerKind, delayMs: number): void {
    this.cancelTimer(kind);

    const deadline = now() + delayMs;
    this.zone.runOutsideAngular(() => {
      const handle = globalThis.setTimeout(() => {
        this.timers.delete(kind);
        this.setDeadline(kind, null);
        this.zone.run(() => this.lockFromTimer(kind));
      }, delayMs);
      this.timers.set(kind, handle);
    });
    this.setDeadline(kind, deadline);
  }

  private cancelTimer(kind: LockTimerKind): boolean {
    const handle = this.timers.get(kind);
    if (handle == null) {
      return false;
    }
    clearTimeout(handle);
    this.timers.delete(kind);
    this.setDeadline(kind, null);
    return true;
  }

  private clearAllTimers(): void {
    for (const handle of this.timers.values()) {
      clearTimeout(handle);
    }
    this.timers.clear();
  }

  private setDeadline(kind: LockTimerKind, at: number | null): void {
    this.patchSession(kind === 'background' ? { backgroundLockAt: at } : { inactivityLockAt: at });
  }

  private patchSession(partial: Partial<LockSession>): void {
    this.sessionSignal.update(session => ({ ...session, ...partial }));
  }

  private applySourceConfig(config: AppLockConfig): void {
    this.lifecycleSource?.updateConfig(config);
    this.domActivity?.updateConfig(config);
    this.routerActivity?.updateConfig(config);
  }

  private reportIssues(issues: readonly ValidationIssue[]): void {
    issues.forEach(issue => this.logger.warn('Invalid config field: ' + issue.field + ' - ' + issue.message));
  }

  private emitEvent(type: AppLockEventType, meta?: Record<string, unknown>): void {
    const snapshot = this.snapshotSignal();
    const event: AppLockEvent = {
      type,
      at: now(),
      state: snapshot.state,
      snapshot,
      meta
    };
    this.logger.debug('Event: ' + type, event);
    this.eventsSubject.next(event);

    const hookName = type === 'Locked' ? 'onLock' : type === 'Unlocked' || type === 'LaunchUnlocked' ? 'onUnlock' : null;
    const hook = hookName ? this.hooks[hookName] : undefined;
    if (hookName && typeof hook === 'function') {
      try {
        hook(event);
      } catch (error) {
        this.logger.error('Error executing ' + hookName + ' hook', error);
      }
    }
  }
}
