/**
 * Newswire Relay — Configuration
 *
 * Read once from the environment (.env via dotenv) and validated with zod.
 * Destinations are derived here and treated as read-only afterwards.
 */

import { z } from 'zod';
import type { Destination, Platform } from '../types';
import { PlatformSchema } from '../types';
import { logger } from './logger';

// ============================================================
// SCHEMA
// ============================================================

const csv = z
  .string()
  .default('')
  .transform(value => value.split(',').map(v => v.trim()).filter(Boolean));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  WEBHOOK_PORT: z.coerce.number().int().positive().default(8000),
  CALLBACK_URL: optionalString.pipe(z.string().url().optional()),
  WEBSUB_HUB_URL: z.string().url().default('https://push.superfeedr.com'),
  WEBSUB_HUB_USER: optionalString,
  WEBSUB_HUB_PASS: optionalString,
  WEBSUB_SECRET: optionalString,
  WEBSUB_LEASE_SECONDS: z.coerce.number().int().positive().default(86400),
  FEEDS: csv,

  STORAGE_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  DEDUP_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(3600),
  REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(10_000),
  PROCESS_DELAY_SECONDS: z.coerce.number().min(0).default(0),

  REPHRASE_API_KEYS: csv.pipe(z.array(z.string()).min(1, 'REPHRASE_API_KEYS needs at least one key')),
  REPHRASE_BASE_URL: optionalString,
  REPHRASE_MODEL: z.string().default('claude-3-5-haiku-latest'),
  REPHRASE_COOLDOWN_MS: z.coerce.number().int().positive().default(30_000),
  REPHRASE_MAX_COOLDOWN_MS: z.coerce.number().int().positive().default(600_000),
  REPHRASE_TONE: optionalString,

  PLATFORMS: z
    .string()
    .default('facebook')
    .transform(value => value.split(',').map(v => v.trim().toLowerCase()).filter(Boolean))
    .pipe(z.array(PlatformSchema)),
  FACEBOOK_PAGE_IDS: csv,
  FACEBOOK_PAGE_TOKENS: csv,
  FACEBOOK_GRAPH_VERSION: z.string().default('v19.0'),
  TWITTER_BEARER_TOKENS: csv,
  PUBLISH_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  PUBLISH_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export type RelayEnv = z.infer<typeof EnvSchema>;

export interface AppConfig {
  port: number;
  callbackUrl?: string;
  hub: {
    url: string;
    user?: string;
    password?: string;
    secret?: string;
    leaseSeconds: number;
  };
  feeds: string[];
  dedup: {
    ttlSeconds: number;
    sweepIntervalSeconds: number;
  };
  requestDeadlineMs: number;
  processDelaySeconds: number;
  rephrase: {
    apiKeys: string[];
    baseUrl?: string;
    model: string;
    cooldownMs: number;
    maxCooldownMs: number;
    toneHint?: string;
  };
  publish: {
    destinations: Destination[];
    maxRetries: number;
    concurrency: number;
    facebookGraphVersion: string;
  };
}

// ============================================================
// DESTINATIONS
// ============================================================

export function buildDestinations(env: Pick<
  RelayEnv,
  'PLATFORMS' | 'FACEBOOK_PAGE_IDS' | 'FACEBOOK_PAGE_TOKENS' | 'TWITTER_BEARER_TOKENS'
>): Destination[] {
  const platforms = new Set<Platform>(env.PLATFORMS);
  const destinations: Destination[] = [];

  if (platforms.has('facebook')) {
    if (env.FACEBOOK_PAGE_IDS.length !== env.FACEBOOK_PAGE_TOKENS.length) {
      logger.warn('FACEBOOK_PAGE_IDS and FACEBOOK_PAGE_TOKENS length mismatch; skipping Facebook', {
        ids: env.FACEBOOK_PAGE_IDS.length,
        tokens: env.FACEBOOK_PAGE_TOKENS.length,
      });
    } else {
      env.FACEBOOK_PAGE_IDS.forEach((pageId, i) => {
        destinations.push({
          platform: 'facebook',
          accountRef: pageId,
          credential: env.FACEBOOK_PAGE_TOKENS[i],
          enabled: true,
        });
      });
    }
  }

  if (platforms.has('twitter')) {
    env.TWITTER_BEARER_TOKENS.forEach((token, i) => {
      destinations.push({
        platform: 'twitter',
        accountRef: `twitter-${i + 1}`,
        credential: token,
        enabled: true,
      });
    });
  }

  return destinations;
}

// ============================================================
// LOADING
// ============================================================

/**
 * Validate an environment and shape it into the app config.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;

  return {
    port: e.WEBHOOK_PORT,
    callbackUrl: e.CALLBACK_URL,
    hub: {
      url: e.WEBSUB_HUB_URL,
      user: e.WEBSUB_HUB_USER,
      password: e.WEBSUB_HUB_PASS,
      secret: e.WEBSUB_SECRET,
      leaseSeconds: e.WEBSUB_LEASE_SECONDS,
    },
    feeds: e.FEEDS,
    dedup: {
      ttlSeconds: e.STORAGE_TTL_SECONDS,
      sweepIntervalSeconds: e.DEDUP_SWEEP_INTERVAL_SECONDS,
    },
    requestDeadlineMs: e.REQUEST_DEADLINE_MS,
    processDelaySeconds: e.PROCESS_DELAY_SECONDS,
    rephrase: {
      apiKeys: e.REPHRASE_API_KEYS,
      baseUrl: e.REPHRASE_BASE_URL,
      model: e.REPHRASE_MODEL,
      cooldownMs: e.REPHRASE_COOLDOWN_MS,
      maxCooldownMs: e.REPHRASE_MAX_COOLDOWN_MS,
      toneHint: e.REPHRASE_TONE,
    },
    publish: {
      destinations: buildDestinations(e),
      maxRetries: e.PUBLISH_MAX_RETRIES,
      concurrency: e.PUBLISH_CONCURRENCY,
      facebookGraphVersion: e.FACEBOOK_GRAPH_VERSION,
    },
  };
}

/**
 * The hub secret, for processes that receive or request signed pushes.
 */
export function requireHubSecret(config: Pick<AppConfig, 'hub'>): string {
  const secret = config.hub.secret;
  if (!secret) {
    throw new Error('WEBSUB_SECRET is required: pushes cannot be authenticated without it');
  }
  return secret;
}
