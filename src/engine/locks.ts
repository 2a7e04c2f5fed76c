// In-process lock map: calls sharing a key run one after another.
// Cross-process exclusion comes from the store's BEGIN IMMEDIATE transactions.
const locks = new Map<string, Promise<void>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const held = new Promise<void>(r => { release = r; });
  const tail = prev.then(() => held);
  locks.set(key, tail);
  await prev;
  try {
    return await fn();
  } finally {
    release();
    if (locks.get(key) === tail) locks.delete(key);
  }
}

export function taskLockKey(taskId: number) {
  return `task:${taskId}`;
}

export function heldLocks() {
  return locks.size;
}
