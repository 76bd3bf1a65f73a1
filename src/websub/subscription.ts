/**
 * Newswire Relay — WebSub Subscription Manager
 *
 * Sends subscribe/unsubscribe requests to the hub, answers the hub's
 * verification-of-intent GET, and tracks leases so subscriptions can be
 * renewed before they lapse.
 */

import pRetry, { AbortError } from 'p-retry';
import { systemClock, type Clock } from '../lib/clock';
import { isTransientStatus, SubscriptionError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type SubscriptionState = 'pending' | 'active' | 'pending_unsubscribe' | 'unsubscribed';

export interface SubscriptionRecord {
  topic: string;
  state: SubscriptionState;
  leaseSeconds?: number;
  /** Epoch ms at which the current lease ends. */
  expiresAt?: number;
}

export interface HubConfig {
  hubUrl: string;
  user?: string;
  password?: string;
  /** Shared secret handed to the hub; pushes are signed with it. */
  secret?: string;
  leaseSeconds?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  /** First retry delay; doubles on each further attempt. */
  retryDelayMs?: number;
  clock?: Clock;
}

export interface VerificationRequest {
  mode?: string;
  topic?: string;
  challenge?: string;
  leaseSeconds?: string;
}

export type ChallengeResult =
  | { ok: true; challenge: string }
  | { ok: false; status: 400 | 404; reason: string };

export interface RenewalReport {
  renewed: string[];
  failed: Array<{ topic: string; error: string }>;
}

// ============================================================
// MANAGER
// ============================================================

export class SubscriptionManager {
  private readonly subscriptions = new Map<string, SubscriptionRecord>();
  private readonly clock: Clock;
  private readonly logger = logger.child({ component: 'websub' });

  constructor(
    private readonly config: HubConfig,
    knownTopics: readonly string[] = []
  ) {
    this.clock = config.clock ?? systemClock;
    for (const topic of knownTopics) {
      this.subscriptions.set(topic, { topic, state: 'pending' });
    }
  }

  isKnownTopic(topic: string): boolean {
    const record = this.subscriptions.get(topic);
    return record !== undefined && record.state !== 'unsubscribed';
  }

  list(): SubscriptionRecord[] {
    return Array.from(this.subscriptions.values(), record => ({ ...record }));
  }

  /**
   * Ask the hub to subscribe `callbackUrl` to `topicUrl`. The hub confirms
   * later through verifyChallenge().
   */
  async subscribe(
    topicUrl: string,
    callbackUrl: string,
    options: { secret?: string; leaseSeconds?: number } = {}
  ): Promise<void> {
    if (!topicUrl || !callbackUrl) {
      throw new SubscriptionError('topicUrl and callbackUrl are required');
    }

    const leaseSeconds = options.leaseSeconds ?? this.config.leaseSeconds ?? 86400;
    const secret = options.secret ?? this.config.secret;

    const params = new URLSearchParams({
      'hub.mode': 'subscribe',
      'hub.topic': topicUrl,
      'hub.callback': callbackUrl,
      'hub.verify': 'async',
      'hub.lease_seconds': String(leaseSeconds),
    });
    if (secret) {
      params.set('hub.secret', secret);
    }

    await this.sendHubRequest(params, topicUrl);

    const existing = this.subscriptions.get(topicUrl);
    this.subscriptions.set(topicUrl, {
      topic: topicUrl,
      // A renewal keeps the current lease until the hub verifies the new one
      state: existing?.state === 'active' ? 'active' : 'pending',
      leaseSeconds,
      expiresAt: existing?.state === 'active' ? existing.expiresAt : undefined,
    });
    this.logger.info('Subscription requested', { topic: topicUrl, leaseSeconds });
  }

  async unsubscribe(topicUrl: string, callbackUrl: string): Promise<void> {
    const params = new URLSearchParams({
      'hub.mode': 'unsubscribe',
      'hub.topic': topicUrl,
      'hub.callback': callbackUrl,
    });

    await this.sendHubRequest(params, topicUrl);

    this.subscriptions.set(topicUrl, { topic: topicUrl, state: 'pending_unsubscribe' });
    this.logger.info('Unsubscription requested', { topic: topicUrl });
  }

  /**
   * Answer the hub's verification GET. The challenge must be echoed verbatim.
   */
  verifyChallenge(request: VerificationRequest): ChallengeResult {
    const { mode, topic, challenge } = request;

    if (mode !== 'subscribe' && mode !== 'unsubscribe') {
      return { ok: false, status: 400, reason: `Unsupported hub.mode: ${mode ?? '(missing)'}` };
    }
    if (!challenge) {
      return { ok: false, status: 400, reason: 'Missing hub.challenge' };
    }

    if (mode === 'unsubscribe') {
      const record = topic ? this.subscriptions.get(topic) : undefined;
      if (!topic || record?.state !== 'pending_unsubscribe') {
        return { ok: false, status: 404, reason: 'No pending unsubscription for topic' };
      }
      this.subscriptions.set(topic, { topic, state: 'unsubscribed' });
      this.logger.info('Unsubscription verified', { topic });
      return { ok: true, challenge };
    }

    if (topic === undefined) {
      this.logger.info('Subscription verified without topic');
      return { ok: true, challenge };
    }

    if (!this.isKnownTopic(topic)) {
      this.logger.warn('Verification for unknown topic', { topic });
      return { ok: false, status: 404, reason: 'Unknown topic' };
    }

    const lease = request.leaseSeconds ? parseInt(request.leaseSeconds, 10) : NaN;
    const record: SubscriptionRecord = { topic, state: 'active' };
    if (Number.isFinite(lease) && lease > 0) {
      record.leaseSeconds = lease;
      record.expiresAt = this.clock.now() + lease * 1000;
    }
    this.subscriptions.set(topic, record);

    this.logger.info('Subscription verified', { topic, leaseSeconds: record.leaseSeconds });
    return { ok: true, challenge };
  }

  /**
   * Re-subscribe every active topic whose lease ends within `withinSeconds`.
   */
  async renewExpiring(callbackUrl: string, withinSeconds: number): Promise<RenewalReport> {
    const deadline = this.clock.now() + withinSeconds * 1000;
    const report: RenewalReport = { renewed: [], failed: [] };

    for (const record of this.subscriptions.values()) {
      if (record.state !== 'active' || record.expiresAt === undefined || record.expiresAt > deadline) {
        continue;
      }

      try {
        await this.subscribe(record.topic, callbackUrl, { leaseSeconds: record.leaseSeconds });
        report.renewed.push(record.topic);
      } catch (error) {
        this.logger.error('Lease renewal failed', { topic: record.topic, error: errorMessage(error) });
        report.failed.push({ topic: record.topic, error: errorMessage(error) });
      }
    }

    return report;
  }

  // ============================================================
  // HUB TRANSPORT
  // ============================================================

  private authHeader(): string | undefined {
    const { user, password } = this.config;
    if (!user || !password) return undefined;
    return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
  }

  private async sendHubRequest(params: URLSearchParams, topic: string): Promise<void> {
    const maxAttempts = this.config.maxAttempts ?? 3;
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
    };
    const auth = this.authHeader();
    if (auth) headers.Authorization = auth;

    await pRetry(
      async attempt => {
        let res: Response;
        try {
          res = await fetch(this.config.hubUrl, {
            method: 'POST',
            headers,
            body: params.toString(),
            signal: AbortSignal.timeout(this.config.timeoutMs ?? 30_000),
          });
        } catch (error) {
          throw new SubscriptionError(`Hub request failed: ${errorMessage(error)}`);
        }

        if (res.ok) return;

        const body = (await res.text().catch(() => '')).slice(0, 500);
        const failure = new SubscriptionError(
          res.status === 401 ? 'Hub rejected credentials' : `Hub returned ${res.status}: ${body}`,
          res.status
        );

        if (!isTransientStatus(res.status)) {
          this.logger.error('Hub rejected request', { topic, attempt, status: res.status, body });
          throw new AbortError(failure);
        }
        throw failure;
      },
      {
        retries: Math.max(0, maxAttempts - 1),
        factor: 2,
        minTimeout: this.config.retryDelayMs ?? 1000,
        randomize: false,
        onFailedAttempt: error => {
          this.logger.warn('Hub request failed', {
            topic,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error: error.message,
          });
        },
      }
    );
  }
}
