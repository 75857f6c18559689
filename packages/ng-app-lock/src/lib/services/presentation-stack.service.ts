import { Injectable, computed, signal } from '@angular/core';
import type { Signal } from '@angular/core';

import type { LockPresenter, LockRoute, PresentationEntry } from '../models/presentation';

/**
 * Default {@link LockPresenter}: an in-memory presentation stack rendered by
 * `AppLockComponent`. An empty stack means the launch route is on screen.
 */
@Injectable({ providedIn: 'root' })
export class PresentationStackService implements LockPresenter {
  private readonly entriesSignal = signal<readonly PresentationEntry[]>([]);
  private readonly settlers = new Map<number, () => void>();
  private nextId = 1;

  readonly entries: Signal<readonly PresentationEntry[]> = this.entriesSignal.asReadonly();
  readonly top: Signal<PresentationEntry | null> = computed(() => {
    const entries = this.entriesSignal();
    return entries.length > 0 ? entries[entries.length - 1] : null;
  });

  present(route: LockRoute): Promise<void> {
    const entry = this.createEntry(route, undefined);
    return new Promise<void>(resolve => {
      this.settlers.set(entry.id, resolve);
      this.entriesSignal.update(entries => [...entries, entry]);
    });
  }

  replace(route: LockRoute, payload?: unknown): void {
    const entries = this.entriesSignal();
    const previous = entries.length > 0 ? entries[entries.length - 1] : null;
    const next = this.createEntry(route, payload);

    this.entriesSignal.set(previous ? [...entries.slice(0, -1), next] : [next]);
    if (previous) {
      this.settle(previous.id);
    }
  }

  dismiss(): void {
    const entries = this.entriesSignal();
    if (entries.length === 0) {
      return;
    }
    const popped = entries[entries.length - 1];
    this.entriesSignal.set(entries.slice(0, -1));
    this.settle(popped.id);
  }

  private createEntry(route: LockRoute, payload: unknown): PresentationEntry {
    const entry: PresentationEntry = { id: this.nextId, route, payload };
    this.nextId += 1;
    return entry;
  }

  private settle(id: number): void {
    const resolve = this.settlers.get(id);
    if (!resolve) {
      return;
    }
    this.settlers.delete(id);
    resolve();
  }
}
