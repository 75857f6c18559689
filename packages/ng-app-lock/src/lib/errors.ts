import type { ValidationIssue } from './validation';

export class AppLockConfigError extends Error {
  constructor(readonly issues: readonly ValidationIssue[]) {
    super(
      'Invalid app lock configuration: ' +
        issues.map(issue => issue.field + ' (' + issue.message + ')').join(', ')
    );
    this.name = 'AppLockConfigError';
  }
}
