import type { AppLockState, LockSessionSnapshot } from './lock-state';

export type AppLockEventType =
  | 'Locked'
  | 'Unlocked'
  | 'LaunchUnlocked'
  | 'BackgroundLockArmed'
  | 'BackgroundLockCancelled'
  | 'InactivityLockArmed'
  | 'Enabled'
  | 'Disabled'
  | 'ConfigChanged'
  | 'DirectiveDropped';

export interface AppLockEvent {
  type: AppLockEventType;
  at: number;
  state: AppLockState;
  snapshot: LockSessionSnapshot;
  meta?: Record<string, unknown>;
}
