export type ActivitySource = 'dom' | 'router' | 'manual';

export interface ActivityEvent {
  source: ActivitySource;
  at: number;
  meta?: Record<string, unknown>;
}
