import type { CacheShape } from '../config.js';
import type { InvalidationScope } from '../models/types.js';

/** Hook the lifecycle components call after every committed write. */
export interface CacheInvalidator {
  invalidate(scope: InvalidationScope): void;
}

export type CacheTag = `task:${number}` | `org:${number}` | `volunteer:${number}` | 'tasks:any';

interface Entry<T> {
  value: T;
  expiresAt: number;
  tags: ReadonlySet<CacheTag>;
}

export function tagsFor(scope: InvalidationScope): CacheTag[] {
  const tags: CacheTag[] = [];
  for (const id of scope.taskIds ?? []) tags.push(`task:${id}`);
  for (const id of scope.organizationIds ?? []) tags.push(`org:${id}`);
  for (const id of scope.volunteerIds ?? []) tags.push(`volunteer:${id}`);
  // any task change can alter every volunteer's list of available tasks
  if (scope.taskIds?.length) tags.push('tasks:any');
  return tags;
}

interface Evictable {
  evict(tags: ReadonlySet<CacheTag>): void;
  clear(): void;
  readonly size: number;
}

/** Entries of one query shape, sharing one TTL. */
export class CacheRegion<T> implements Evictable {
  private readonly entries = new Map<string, Entry<T>>();
  hits = 0;
  misses = 0;

  constructor(
    readonly shape: CacheShape,
    private readonly ttlMs: number,
    private readonly now: () => Date,
  ) {}

  get size() { return this.entries.size; }

  getOrLoad(key: string, tags: CacheTag[], load: () => T): T {
    const at = this.now().getTime();
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > at) {
      this.hits++;
      return hit.value;
    }
    this.misses++;
    const value = load();
    if (this.ttlMs > 0) this.entries.set(key, { value, expiresAt: at + this.ttlMs, tags: new Set(tags) });
    return value;
  }

  evict(tags: ReadonlySet<CacheTag>) {
    for (const [key, entry] of this.entries) {
      for (const tag of entry.tags) {
        if (tags.has(tag)) { this.entries.delete(key); break; }
      }
    }
  }

  clear() { this.entries.clear(); }
}

/**
 * Read-through cache. Each query shape gets a region with its own TTL; entries
 * carry the tags of the entities they were built from and are dropped when any
 * of those tags is invalidated.
 */
export class ReadCache implements CacheInvalidator {
  private readonly regions: Evictable[] = [];

  constructor(
    private readonly ttlSeconds: Readonly<Record<CacheShape, number>>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  region<T>(shape: CacheShape): CacheRegion<T> {
    const region = new CacheRegion<T>(shape, this.ttlSeconds[shape] * 1000, this.now);
    this.regions.push(region);
    return region;
  }

  invalidate(scope: InvalidationScope): void {
    const tags = new Set(tagsFor(scope));
    if (!tags.size) return;
    for (const r of this.regions) r.evict(tags);
  }

  clear() {
    for (const r of this.regions) r.clear();
  }

  size() {
    return this.regions.reduce((n, r) => n + r.size, 0);
  }
}
