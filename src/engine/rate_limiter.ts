import { RateLimitError } from './errors.js';
import type { RateLimitRule } from '../config.js';

export type RateLimitedAction =
  | 'create_task'
  | 'edit_task'
  | 'delete_task'
  | 'apply_task'
  | 'send_notification'
  | 'approve_volunteer';

export interface RateLimitStatus {
  count: number;
  max: number;
  windowMinutes: number;
  resetAt: Date | null;
}

/**
 * Sliding-window request counter keyed by (user, action). Each key keeps at most
 * `max_requests` timestamps, so memory stays bounded per active user.
 */
export class RateLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    private readonly rules: Readonly<Record<string, RateLimitRule>>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private key(userId: number, action: string) {
    return `${userId}:${action}`;
  }

  private recent(key: string, windowMs: number): number[] {
    const cutoff = this.now().getTime() - windowMs;
    const kept = (this.hits.get(key) ?? []).filter(ts => ts > cutoff);
    if (kept.length) this.hits.set(key, kept);
    else this.hits.delete(key);
    return kept;
  }

  /** Records one request, or throws RateLimitError when the window is full. Actions without a rule pass. */
  consume(userId: number, action: RateLimitedAction): void {
    const rule = this.rules[action];
    if (!rule) return;
    const key = this.key(userId, action);
    const kept = this.recent(key, rule.window_minutes * 60_000);
    if (kept.length >= rule.max_requests) {
      throw new RateLimitError(action, kept.length, rule.max_requests, rule.window_minutes);
    }
    this.hits.set(key, [...kept, this.now().getTime()]);
  }

  status(userId: number, action: RateLimitedAction): RateLimitStatus | null {
    const rule = this.rules[action];
    if (!rule) return null;
    const windowMs = rule.window_minutes * 60_000;
    const kept = this.recent(this.key(userId, action), windowMs);
    return {
      count: kept.length,
      max: rule.max_requests,
      windowMinutes: rule.window_minutes,
      resetAt: kept.length ? new Date(Math.min(...kept) + windowMs) : null,
    };
  }

  /** Clears one action for a user, or every action when none is given. */
  reset(userId: number, action?: RateLimitedAction) {
    if (action) { this.hits.delete(this.key(userId, action)); return; }
    for (const key of [...this.hits.keys()]) {
      if (key.startsWith(`${userId}:`)) this.hits.delete(key);
    }
  }
}
