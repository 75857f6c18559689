import { PLATFORM_ID, inject } from '@angular/core';
import { isPlatformBrowser } from '@angular/common';

import type { LifecycleState } from '../models/lifecycle-event';

/** Must run in an injection context. Without a platform id the host is assumed to be a browser. */
export function isBrowserPlatform(): boolean {
  return isPlatformBrowser(inject(PLATFORM_ID, { optional: true }) ?? 'browser');
}

export function now(): number {
  return Date.now();
}

export function lifecycleStateOf(doc: Document | null | undefined): LifecycleState {
  return doc?.visibilityState === 'hidden' ? 'background' : 'foreground';
}
