import type { LifecycleState } from './lifecycle-event';

export type AppLockState =
  | 'LAUNCH_LOCKED'
  | 'UNLOCKED'
  | 'LOCKED'
  | 'PENDING_BACKGROUND_LOCK'
  | 'PENDING_INACTIVITY_LOCK';

export type LockReason = 'manual' | 'background' | 'inactivity';

export interface LockSessionSnapshot {
  state: AppLockState;
  enabled: boolean;
  hasUnlockedSinceLaunch: boolean;
  isLockScreenVisible: boolean;
  isShowingLockScreen: boolean;
  backgroundLockLatencyMs: number;
  inactivityLockLatencyMs: number | null;
  backgroundLockAt: number | null;
  inactivityLockAt: number | null;
  lastActivityAt: number | null;
  lifecycle: LifecycleState;
}
