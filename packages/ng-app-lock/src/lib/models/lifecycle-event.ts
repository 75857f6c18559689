export type LifecycleState = 'foreground' | 'background';

export type LifecycleSource = 'dom' | 'manual';

export interface LifecycleEvent {
  state: LifecycleState;
  source: LifecycleSource;
  at: number;
  meta?: Record<string, unknown>;
}
