// Error taxonomy surfaced to the presentation layer.
// `userMessage` is what a dashboard shows; `message` may carry detail for logs.

export type HubErrorCode =
  | 'validation_failed'
  | 'invalid_range'
  | 'invalid_transition'
  | 'already_applied'
  | 'task_full'
  | 'task_closed'
  | 'not_found'
  | 'forbidden'
  | 'rate_limited'
  | 'storage_unavailable';

export class HubError extends Error {
  constructor(
    public readonly code: HubErrorCode,
    message: string,
    public readonly userMessage: string = message,
  ) {
    super(message);
    this.name = 'HubError';
  }

  toJSON(): { error: HubErrorCode; message: string } {
    return { error: this.code, message: this.userMessage };
  }
}

export class ValidationError extends HubError {
  constructor(message: string, code: HubErrorCode = 'validation_failed') {
    super(code, message);
    this.name = 'ValidationError';
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(message = 'End date cannot be before start date.') {
    super(message, 'invalid_range');
    this.name = 'InvalidRangeError';
  }
}

export class InvalidTransitionError extends ValidationError {
  constructor(
    public readonly transition: string,
    message: string,
  ) {
    super(message, 'invalid_transition');
    this.name = 'InvalidTransitionError';
  }
}

export class DuplicateEngagementError extends HubError {
  constructor(taskId: number, volunteerId: number) {
    super(
      'already_applied',
      `volunteer ${volunteerId} already holds an engagement on task ${taskId}`,
      'You have already applied for this task.',
    );
    this.name = 'DuplicateEngagementError';
  }
}

export class CapacityExceededError extends HubError {
  constructor(taskId: number) {
    super('task_full', `task ${taskId} has no open slots`, 'This task has reached maximum volunteers.');
    this.name = 'CapacityExceededError';
  }
}

export class TaskClosedError extends HubError {
  constructor(taskId: number) {
    super('task_closed', `task ${taskId} is closed`, 'This task is closed.');
    this.name = 'TaskClosedError';
  }
}

export class NotFoundError extends HubError {
  constructor(entity: 'task' | 'engagement' | 'notification' | 'volunteer' | 'organization', id: number) {
    super('not_found', `${entity} ${id} not found`, 'This item is no longer available.');
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends HubError {
  constructor(detail: string) {
    super('forbidden', detail, 'You are not allowed to do that.');
    this.name = 'ForbiddenError';
  }
}

export class RateLimitError extends HubError {
  constructor(
    public readonly action: string,
    public readonly used: number,
    public readonly max: number,
    public readonly windowMinutes: number,
  ) {
    super(
      'rate_limited',
      `rate limit exceeded for ${action} (${used}/${max} in ${windowMinutes}m)`,
      `Too many requests. Please wait ${windowMinutes} minute(s) before trying again. (${used}/${max} requests used)`,
    );
    this.name = 'RateLimitError';
  }
}

export class TransientStorageError extends HubError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('storage_unavailable', detail, 'Something went wrong. Please try again later.');
    this.name = 'TransientStorageError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function isHubError(err: unknown): err is HubError {
  return err instanceof HubError;
}
