/**
 * Tests for the WebSub webhook server
 *
 * - Verification of intent (GET /webhook)
 * - Signature authentication before parsing
 * - Push processing, dedup and the request deadline
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import type { PublisherFanout } from '../src/delivery';
import { DedupStore } from '../src/feeds/dedup';
import { generateContentHash } from '../src/feeds/normalizer';
import { ManualClock } from '../src/lib/clock';
import { AuthenticationError } from '../src/lib/errors';
import { RelayPipeline } from '../src/pipeline';
import type { RephraseClient } from '../src/rephrase/client';
import { authenticatePush, createApp, type WebhookDeps } from '../src/server/webhook';
import { signPayload } from '../src/websub/signature';
import { SubscriptionManager } from '../src/websub/subscription';
import { makeDestination, RSS_TWO_ITEMS } from './helpers/fixtures';
import { MemoryDedupRepository } from './helpers/memory-dedup-repository';

const TOPIC = 'https://news.example.com/feed.xml';
const SECRET = 'test-secret';

describe('webhook server', () => {
  let repository: MemoryDedupRepository;
  let rewrite: Mock<RephraseClient['rewrite']>;
  let publish: Mock<PublisherFanout['publish']>;
  let pipeline: RelayPipeline;
  let subscriptions: SubscriptionManager;

  function appWith(overrides: Partial<WebhookDeps> = {}) {
    return createApp({ subscriptions, pipeline, secret: SECRET, ...overrides });
  }

  function push(app: Express, body: string, contentType = 'application/rss+xml') {
    return request(app)
      .post('/webhook')
      .set('Content-Type', contentType)
      .set('X-Hub-Signature-256', signPayload(body, SECRET))
      .send(body);
  }

  beforeEach(() => {
    repository = new MemoryDedupRepository();
    const dedup = new DedupStore(repository, { ttlSeconds: 3600, clock: new ManualClock() });
    rewrite = vi.fn<RephraseClient['rewrite']>(async item => ({
      text: `Post: ${item.title}`,
      sourceItemId: item.id,
    }));
    publish = vi.fn<PublisherFanout['publish']>(async (_content, _item, targets) =>
      targets.map(destination => ({ destination, success: true, postId: 'p-1', attempts: 1 }))
    );
    pipeline = new RelayPipeline({
      dedup,
      rephraser: { rewrite },
      fanout: { publish },
      destinations: [makeDestination()],
    });
    subscriptions = new SubscriptionManager({ hubUrl: 'https://hub.example.com/' }, [TOPIC]);
  });

  // ============================================================
  // HEALTH
  // ============================================================

  describe('GET /health', () => {
    it('should return ok with a timestamp', async () => {
      const res = await request(appWith()).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(typeof res.body.timestamp).toBe('string');
    });
  });

  // ============================================================
  // VERIFICATION
  // ============================================================

  describe('GET /webhook', () => {
    it('should echo the challenge verbatim', async () => {
      const res = await request(appWith()).get('/webhook?hub.mode=subscribe&hub.challenge=abc123');

      expect(res.status).toBe(200);
      expect(res.text).toBe('abc123');
      expect(res.headers['content-type']).toMatch(/^text\/plain/);
    });

    it('should confirm a known topic', async () => {
      const res = await request(appWith())
        .get('/webhook')
        .query({
          'hub.mode': 'subscribe',
          'hub.topic': TOPIC,
          'hub.challenge': 'tok-1',
          'hub.lease_seconds': '86400',
        });

      expect(res.status).toBe(200);
      expect(res.text).toBe('tok-1');
      expect(subscriptions.list()[0].state).toBe('active');
    });

    it('should return 404 for an unknown topic', async () => {
      const res = await request(appWith())
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.topic': 'https://other.example.com/', 'hub.challenge': 'x' });

      expect(res.status).toBe(404);
    });

    it('should return 400 for an unsupported mode', async () => {
      const res = await request(appWith()).get('/webhook?hub.mode=denied&hub.challenge=x');
      expect(res.status).toBe(400);
    });

    it('should return 400 without a challenge', async () => {
      const res = await request(appWith()).get('/webhook?hub.mode=subscribe');
      expect(res.status).toBe(400);
    });
  });

  // ============================================================
  // CONTENT DISTRIBUTION
  // ============================================================

  describe('POST /webhook', () => {
    it('should process a two-item push and record both items', async () => {
      const res = await push(appWith(), RSS_TWO_ITEMS);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        received: 2,
        accepted: 2,
        duplicates: 0,
        completed: true,
        published: 2,
        deferred: 0,
      });
      expect([...repository.rows.keys()].sort()).toEqual(
        [
          'story-1',
          generateContentHash('Second story', 'Tue, 10 Mar 2026 09:30:00 GMT'),
        ].sort()
      );
      expect(publish).toHaveBeenCalledTimes(2);
    });

    it('should accept a sha1 signature', async () => {
      const res = await request(appWith())
        .post('/webhook')
        .set('Content-Type', 'application/rss+xml')
        .set('X-Hub-Signature', signPayload(RSS_TWO_ITEMS, SECRET, 'sha1'))
        .send(RSS_TWO_ITEMS);

      expect(res.status).toBe(200);
      expect(res.body.accepted).toBe(2);
    });

    it('should skip items on redelivery', async () => {
      const app = appWith();
      await push(app, RSS_TWO_ITEMS);
      const res = await push(app, RSS_TWO_ITEMS);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ received: 2, accepted: 0, duplicates: 2 });
      expect(publish).toHaveBeenCalledTimes(2);
    });

    it('should fan out once when the same push arrives concurrently', async () => {
      const app = appWith();

      const responses = await Promise.all([
        push(app, RSS_TWO_ITEMS),
        push(app, RSS_TWO_ITEMS),
        push(app, RSS_TWO_ITEMS),
      ]);

      expect(responses.map(r => r.status)).toEqual([200, 200, 200]);
      expect(responses.reduce((sum, r) => sum + Number(r.body.accepted), 0)).toBe(2);
      expect(publish).toHaveBeenCalledTimes(2);
    });

    it('should answer 400 for a payload with no feed root', async () => {
      const res = await push(appWith(), '<html><body>nope</body></html>', 'application/xml');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('No RSS or Atom root element found');
      expect(repository.rows.size).toBe(0);
    });

    it('should answer 413 for a body over the size limit', async () => {
      const res = await push(appWith({ maxPayload: '100b' }), RSS_TWO_ITEMS);

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'request entity too large' });
      expect(repository.rows.size).toBe(0);
    });

    it('should answer 500 when the dedup store is unavailable', async () => {
      vi.spyOn(repository, 'insert').mockRejectedValue(new Error('db down'));

      const res = await push(appWith(), RSS_TWO_ITEMS);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
      expect(rewrite).not.toHaveBeenCalled();
    });

    it('should publish every item on redelivery after a partial claim failure', async () => {
      const insert = repository.insert.bind(repository);
      vi.spyOn(repository, 'insert')
        .mockImplementationOnce(insert)
        .mockRejectedValueOnce(new Error('db down'));
      const app = appWith();

      const first = await push(app, RSS_TWO_ITEMS);
      expect(first.status).toBe(500);
      expect(repository.rows.size).toBe(0);

      const second = await push(app, RSS_TWO_ITEMS);
      expect(second.status).toBe(200);
      expect(second.body).toMatchObject({ accepted: 2, duplicates: 0, published: 2 });
      expect(publish.mock.calls.map(([, item]) => item.id)).toEqual([
        'story-1',
        generateContentHash('Second story', 'Tue, 10 Mar 2026 09:30:00 GMT'),
      ]);
    });

    it('should acknowledge at the deadline and finish in the background', async () => {
      let open: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        open = resolve;
      });
      rewrite.mockImplementation(async item => {
        await gate;
        return { text: 'Late post', sourceItemId: item.id };
      });

      const res = await push(appWith({ requestDeadlineMs: 20 }), RSS_TWO_ITEMS);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ received: 2, accepted: 2, duplicates: 0, completed: false });
      expect(repository.rows.size).toBe(2);
      expect(publish).not.toHaveBeenCalled();

      open();
      await vi.waitFor(() => expect(publish).toHaveBeenCalledTimes(2));
    });

    it('should reject an unsigned push with 401 before parsing', async () => {
      const parse = vi.fn(() => []);
      const res = await request(appWith({ parse }))
        .post('/webhook')
        .set('Content-Type', 'application/rss+xml')
        .send(RSS_TWO_ITEMS);

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Missing hub signature' });
      expect(parse).not.toHaveBeenCalled();
    });

    it('should reject a bad signature with 403 and mutate nothing', async () => {
      const res = await request(appWith())
        .post('/webhook')
        .set('Content-Type', 'application/rss+xml')
        .set('X-Hub-Signature-256', signPayload(RSS_TWO_ITEMS, 'wrong-secret'))
        .send(RSS_TWO_ITEMS);

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Invalid hub signature' });
      expect(repository.rows.size).toBe(0);
      expect(rewrite).not.toHaveBeenCalled();
    });
  });

  it('should refuse to build an app without a hub secret', () => {
    expect(() => appWith({ secret: '' })).toThrow('A hub secret is required to authenticate pushes');
  });
});

describe('authenticatePush', () => {
  const body = Buffer.from('<rss/>');

  it('should prefer the sha256 header', () => {
    expect(() =>
      authenticatePush(
        body,
        { signature: 'sha1=00', signature256: signPayload(body, SECRET) },
        SECRET
      )
    ).not.toThrow();
  });

  it('should throw AuthenticationError with the status to answer', () => {
    expect(() => authenticatePush(body, {}, SECRET)).toThrow(AuthenticationError);

    let caught: unknown;
    try {
      authenticatePush(body, { signature: 'sha256=00' }, SECRET);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AuthenticationError);
    expect(caught).toMatchObject({ status: 403 });
  });
});
