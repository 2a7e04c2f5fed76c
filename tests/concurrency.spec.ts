import { describe, it, expect, beforeEach } from 'vitest';
import { heldLocks, taskLockKey, withLock } from '../src/engine/locks.js';
import { withRetry } from '../src/engine/retry.js';
import { TransientStorageError, ValidationError } from '../src/engine/errors.js';
import { clearEvents, getEvents } from '../src/engine/events.js';

beforeEach(() => {
  clearEvents();
});

describe('withLock', () => {
  it('runs calls on the same key one after another', async () => {
    const order: string[] = [];
    const step = (name: string, ms: number) => withLock(taskLockKey(1), async () => {
      order.push(`${name}:start`);
      await new Promise(r => setTimeout(r, ms));
      order.push(`${name}:end`);
      return name;
    });
    const results = await Promise.all([step('a', 20), step('b', 1)]);
    expect(results).toEqual(['a', 'b']);
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(heldLocks()).toBe(0);
  });

  it('releases the key when the holder throws', async () => {
    await expect(withLock('task:2', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(await withLock('task:2', async () => 'next')).toBe('next');
    expect(heldLocks()).toBe(0);
  });
});

describe('withRetry', () => {
  it('retries a busy store once', async () => {
    let calls = 0;
    const result = await withRetry('test.write', () => {
      calls++;
      if (calls === 1) throw new TransientStorageError('storage busy: database is locked');
      return 'ok';
    });
    expect(result).toBe('ok');
    expect(calls).toBe(2);
    expect(getEvents({ type: 'storage.retry' })).toHaveLength(1);
  });

  it('surfaces the second busy failure', async () => {
    let calls = 0;
    const attempt = withRetry('test.write', () => {
      calls++;
      throw new TransientStorageError('storage busy');
    });
    await expect(attempt).rejects.toMatchObject({ code: 'storage_unavailable', userMessage: 'Something went wrong. Please try again later.' });
    expect(calls).toBe(2);
  });

  it('does not retry other failures', async () => {
    let calls = 0;
    await expect(withRetry('test.write', () => {
      calls++;
      throw new ValidationError('Title is required.');
    })).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toBe(1);
  });
});
