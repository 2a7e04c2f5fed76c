import { loadConfig, loadPolicies } from './config.js';
import { openDb } from './adapters/db.js';
import { GeminiWageEstimator } from './agent/wage_estimator.js';
import { CapacityTracker } from './engine/capacity.js';
import { EngagementStateMachine } from './engine/engagement_machine.js';
import { NotificationDispatcher } from './engine/notifications.js';
import { HubQueries } from './engine/queries.js';
import { RateLimiter } from './engine/rate_limiter.js';
import { ReadCache } from './engine/read_cache.js';
import { TaskLifecycleManager } from './engine/task_lifecycle.js';
import type { HubConfig, Policies } from './config.js';
import type { VolunteerHubDb } from './adapters/db.js';
import type { WageEstimator } from './agent/wage_estimator.js';

export interface VolunteerHubOptions {
  config?: HubConfig;
  policies?: Policies;
  db?: VolunteerHubDb;
  /** null disables wage suggestions even when GEMINI_API_KEY is set. */
  estimator?: WageEstimator | null;
  now?: () => Date;
}

function defaultEstimator(config: HubConfig): WageEstimator | undefined {
  return config.GEMINI_API_KEY ? new GeminiWageEstimator(config) : undefined;
}

/** Wires the store, cache, rate limiter and lifecycle components into one in-process API. */
export function createVolunteerHub(options: VolunteerHubOptions = {}) {
  const config = options.config ?? loadConfig();
  const policies = options.policies ?? loadPolicies(config.POLICIES_PATH);
  const now = options.now ?? (() => new Date());
  const db = options.db ?? openDb(config.DATABASE_PATH, { busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS });
  const estimator = options.estimator === undefined ? defaultEstimator(config) : options.estimator ?? undefined;

  const cache = new ReadCache(policies.cache_ttl_seconds, now);
  const rateLimiter = new RateLimiter(policies.rate_limits, now);
  const capacity = new CapacityTracker(db);
  const notifications = new NotificationDispatcher(db, cache, now);
  const tasks = new TaskLifecycleManager({ db, capacity, notifications, invalidator: cache, rateLimiter, estimator, now });
  const engagements = new EngagementStateMachine({ db, capacity, lifecycle: tasks, notifications, invalidator: cache, rateLimiter, now });
  const queries = new HubQueries(db, capacity, cache);

  return {
    db,
    cache,
    rateLimiter,
    capacity,
    notifications,
    tasks,
    engagements,
    queries,

    // task lifecycle
    createTask: tasks.createTask.bind(tasks),
    editTask: tasks.editTask.bind(tasks),
    closeTask: tasks.closeTask.bind(tasks),
    reopenTask: tasks.reopenTask.bind(tasks),
    softDelete: tasks.softDelete.bind(tasks),
    suggestWageRate: tasks.suggestWageRate.bind(tasks),

    // engagement transitions
    apply: engagements.apply.bind(engagements),
    approve: engagements.approve.bind(engagements),
    reject: engagements.reject.bind(engagements),
    withdraw: engagements.withdraw.bind(engagements),
    complete: engagements.complete.bind(engagements),
    markNotCompleted: engagements.markNotCompleted.bind(engagements),
    remove: engagements.remove.bind(engagements),
    sendCertificate: engagements.sendCertificate.bind(engagements),

    // reads
    task: queries.task.bind(queries),
    engagement: queries.engagement.bind(queries),
    organizationTasks: queries.organizationTasks.bind(queries),
    taskVolunteers: queries.taskVolunteers.bind(queries),
    organizationVolunteers: queries.organizationVolunteers.bind(queries),
    organizationAnalytics: queries.organizationAnalytics.bind(queries),
    availableTasks: queries.availableTasks.bind(queries),
    volunteerEngagements: queries.volunteerEngagements.bind(queries),
    volunteerStats: queries.volunteerStats.bind(queries),
    unreadNotifications: queries.unreadNotifications.bind(queries),
    markNotificationRead: notifications.markRead.bind(notifications),

    close() { db.close(); },
  };
}

export type VolunteerHub = ReturnType<typeof createVolunteerHub>;

export { openDb } from './adapters/db.js';
export { loadConfig, loadPolicies, parsePolicies } from './config.js';
export { durationDays, engagementValue, taskValue } from './engine/value.js';
export { engagementLabel } from './engine/labels.js';
export { getEvents, clearEvents } from './engine/events.js';
export * from './engine/errors.js';
export type * from './models/types.js';
export type { HubConfig, Policies } from './config.js';
export type { TaskDraft, ApplicationInput } from './engine/schemas.js';
export type { TransitionOutcome } from './engine/engagement_machine.js';
export type { CapacityChange, TaskEditResult, TaskDeleteResult } from './engine/task_lifecycle.js';
export type { WageEstimator, WageEstimateRequest } from './agent/wage_estimator.js';
