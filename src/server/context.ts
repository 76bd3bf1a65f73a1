/**
 * Newswire Relay — Runtime Wiring
 *
 * Builds the long-lived components from the validated config. Shared by the
 * server entry point and the operator scripts.
 */

import { SupabaseDedupRepository, type DedupRepository } from '../db/queries';
import { PublisherFanout } from '../delivery';
import { FacebookPublisher } from '../delivery/facebook';
import { DedupStore } from '../feeds';
import type { AppConfig } from '../lib/config';
import { RelayPipeline } from '../pipeline';
import { RephraseClient } from '../rephrase/client';
import { ApiKeyPool } from '../rephrase/key-pool';
import { AnthropicRephraseProvider, type RephraseProvider } from '../rephrase/provider';
import { SubscriptionManager } from '../websub/subscription';

export interface RelayContext {
  config: AppConfig;
  dedup: DedupStore;
  keyPool: ApiKeyPool;
  pipeline: RelayPipeline;
  subscriptions: SubscriptionManager;
}

export interface RelayOverrides {
  repository?: DedupRepository;
  provider?: RephraseProvider;
}

export function buildRelayContext(config: AppConfig, overrides: RelayOverrides = {}): RelayContext {
  const dedup = new DedupStore(overrides.repository ?? new SupabaseDedupRepository(), {
    ttlSeconds: config.dedup.ttlSeconds,
    sweepIntervalSeconds: config.dedup.sweepIntervalSeconds,
  });

  const keyPool = new ApiKeyPool(config.rephrase.apiKeys, {
    baseCooldownMs: config.rephrase.cooldownMs,
    maxCooldownMs: config.rephrase.maxCooldownMs,
  });

  const provider =
    overrides.provider ??
    new AnthropicRephraseProvider({
      model: config.rephrase.model,
      baseURL: config.rephrase.baseUrl,
    });

  const rephraser = new RephraseClient(keyPool, provider, {
    toneHint: config.rephrase.toneHint,
  });

  const fanout = new PublisherFanout({
    maxRetries: config.publish.maxRetries,
    concurrency: config.publish.concurrency,
    publishers: {
      facebook: new FacebookPublisher({ graphVersion: config.publish.facebookGraphVersion }),
    },
  });

  const pipeline = new RelayPipeline({
    dedup,
    rephraser,
    fanout,
    destinations: config.publish.destinations,
    processDelayMs: config.processDelaySeconds * 1000,
  });

  const subscriptions = new SubscriptionManager(
    {
      hubUrl: config.hub.url,
      user: config.hub.user,
      password: config.hub.password,
      secret: config.hub.secret,
      leaseSeconds: config.hub.leaseSeconds,
    },
    config.feeds
  );

  return { config, dedup, keyPool, pipeline, subscriptions };
}
