export * from './lib/models/activity-event';
export * from './lib/models/app-lock-config';
export * from './lib/models/lifecycle-event';
export * from './lib/models/lock-event';
export * from './lib/models/lock-state';
export * from './lib/models/presentation';
export * from './lib/defaults';
export * from './lib/errors';
export * from './lib/validation';
export * from './lib/tokens/config.token';
export * from './lib/provide-app-lock';
export * from './lib/services/app-lock.service';
export * from './lib/services/presentation-stack.service';
export * from './lib/services/lifecycle-dom.service';
export * from './lib/services/activity-dom.service';
export * from './lib/services/activity-router.service';
export * from './lib/components/app-lock.component';
export * from './lib/guards/app-lock.guard';
