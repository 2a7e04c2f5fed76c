import { TransientStorageError } from './errors.js';
import { logEvent } from './events.js';

/** Retries once on a transient storage failure; any other error propagates untouched. */
export async function withRetry<T>(label: string, fn: () => T | Promise<T>, retries = 1): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientStorageError) || attempt >= retries) throw err;
      logEvent('storage.retry', { label, attempt: attempt + 1, error: err.message });
    }
  }
}
