export type LockRoute = 'lock-screen' | 'unlocked';

export const LOCK_SCREEN_ROUTE: LockRoute = 'lock-screen';
export const UNLOCKED_ROUTE: LockRoute = 'unlocked';

/**
 * Navigation surface driven by the lock controller. Implementations own the actual view
 * stack; the controller only ever issues these three directives.
 */
export interface LockPresenter {
  /** Pushes `route`; the returned promise settles once that entry is popped or replaced. */
  present(route: LockRoute): Promise<void>;
  /** Swaps the top entry for `route` so it cannot be navigated back to. */
  replace(route: LockRoute, payload?: unknown): void;
  dismiss(): void;
}

export interface PresentationEntry {
  id: number;
  route: LockRoute;
  payload: unknown;
}
