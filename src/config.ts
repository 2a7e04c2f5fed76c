import './env_bootstrap.js';
import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

const flag = z
  .string()
  .optional()
  .transform(v => v !== undefined && v !== '' && v !== '0' && v.toLowerCase() !== 'false');

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('data/volunteer_hub.db'),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  GEMINI_API_KEY: z.string().optional().transform(v => (v ? v : undefined)),
  GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  DEBUG_LLM: flag,
  DEBUG_EVENTS: flag,
  POLICIES_PATH: z.string().min(1).default('config/policies.yaml'),
});

export type HubConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HubConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.issues.map(i => i.path.join('.') + ': ' + i.message).join('; ')}`);
  }
  return parsed.data;
}

const rateLimitSchema = z.object({
  max_requests: z.number().int().positive(),
  window_minutes: z.number().positive(),
});

const ttl = z.number().nonnegative();

const cacheTtlSchema = z.object({
  organization_tasks: ttl,
  task_volunteers: ttl,
  organization_volunteers: ttl,
  organization_analytics: ttl,
  available_tasks: ttl,
  volunteer_engagements: ttl,
  notifications: ttl,
});

export type CacheShape = keyof z.infer<typeof cacheTtlSchema>;

const policiesSchema = z.object({
  rate_limits: z.record(rateLimitSchema).default({}),
  cache_ttl_seconds: cacheTtlSchema,
});

export type RateLimitRule = z.infer<typeof rateLimitSchema>;
export type Policies = z.infer<typeof policiesSchema>;

export function parsePolicies(source: string): Policies {
  const parsed = policiesSchema.safeParse(yaml.parse(source));
  if (!parsed.success) {
    throw new Error(`Invalid policies: ${parsed.error.issues.map(i => i.path.join('.') + ': ' + i.message).join('; ')}`);
  }
  return parsed.data;
}

const cache = new Map<string, Policies>();

export function loadPolicies(file: string = loadConfig().POLICIES_PATH): Policies {
  const full = path.resolve(process.cwd(), file);
  const hit = cache.get(full);
  if (hit) return hit;
  const policies = parsePolicies(fs.readFileSync(full, 'utf8'));
  cache.set(full, policies);
  return policies;
}
