/**
 * Newswire Relay — WebSub Webhook Server
 *
 * Express app receiving hub traffic.
 *
 * Endpoints:
 * - GET  /webhook  — hub verification of intent (echoes hub.challenge)
 * - POST /webhook  — content distribution (signed RSS/Atom payload)
 * - GET  /health   — health check for monitoring
 *
 * Run with: npm run server
 */

import express, { NextFunction, Request, Response } from 'express';
import { nanoid } from 'nanoid';
import { parseItems } from '../feeds';
import { AuthenticationError, ParseError } from '../lib/errors';
import { errorMessage, logger, type Logger } from '../lib/logger';
import type { ItemOutcome, RelayPipeline } from '../pipeline';
import type { Item } from '../types';
import type { SubscriptionManager } from '../websub/subscription';
import { verifyHubSignature } from '../websub/signature';

// ============================================================
// TYPES
// ============================================================

export interface WebhookDeps {
  subscriptions: Pick<SubscriptionManager, 'verifyChallenge'>;
  pipeline: Pick<RelayPipeline, 'claimItems' | 'processAll'>;
  /** Every push must carry a valid hub signature made with this secret. */
  secret: string;
  /** How long a push may hold the hub before it is acknowledged. */
  requestDeadlineMs?: number;
  parse?: (raw: Buffer) => Item[];
  /** Largest accepted push body, in body-parser notation. */
  maxPayload?: string;
}

type ReceiverState = 'verifying' | 'receiving' | 'dispatching' | 'rejected' | 'idle';

const DEFAULT_DEADLINE_MS = 10_000;
const DEFAULT_MAX_PAYLOAD = '5mb';

// ============================================================
// HELPERS
// ============================================================

function queryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Check the push signature. Prefers X-Hub-Signature-256 when both are sent.
 * Throws AuthenticationError carrying the HTTP status to answer with.
 */
export function authenticatePush(
  rawBody: Buffer,
  headers: { signature?: string; signature256?: string },
  secret: string
): void {
  const signature = headers.signature256 ?? headers.signature;

  if (!signature) {
    throw new AuthenticationError('Missing hub signature', 401);
  }
  if (!verifyHubSignature(rawBody, signature, secret)) {
    throw new AuthenticationError('Invalid hub signature', 403);
  }
}

/**
 * Resolves with the outcomes, or null once the deadline passes first.
 */
async function settleWithin<T>(work: Promise<T>, deadlineMs: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<null>(resolve => {
    timer = setTimeout(() => resolve(null), deadlineMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function clientErrorStatus(err: Error): number | undefined {
  const status = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function countOutcomes(outcomes: readonly ItemOutcome[]): Record<ItemOutcome['status'], number> {
  const counts = { published: 0, deferred: 0, duplicate: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createApp(deps: WebhookDeps): express.Express {
  if (!deps.secret) {
    throw new Error('A hub secret is required to authenticate pushes');
  }

  const app = express();
  const deadlineMs = deps.requestDeadlineMs ?? DEFAULT_DEADLINE_MS;
  const parse = deps.parse ?? ((raw: Buffer) => parseItems(raw));

  const transition = (log: Logger, state: ReceiverState, context?: Record<string, unknown>) => {
    log.debug(`Receiver → ${state}`, context);
  };

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================================
  // VERIFICATION OF INTENT
  // ============================================================

  app.get('/webhook', (req: Request, res: Response) => {
    const log = logger.child({ requestId: nanoid(10) });
    transition(log, 'verifying');

    const result = deps.subscriptions.verifyChallenge({
      mode: queryValue(req.query['hub.mode']),
      topic: queryValue(req.query['hub.topic']),
      challenge: queryValue(req.query['hub.challenge']),
      leaseSeconds: queryValue(req.query['hub.lease_seconds']),
    });

    if (!result.ok) {
      log.warn('Verification rejected', { status: result.status, reason: result.reason });
      transition(log, 'idle');
      res.status(result.status).type('text/plain').send(result.reason);
      return;
    }

    transition(log, 'idle');
    res.status(200).type('text/plain').send(result.challenge);
  });

  // ============================================================
  // CONTENT DISTRIBUTION
  // ============================================================

  app.post(
    '/webhook',
    // Raw bytes for every content type: the signature covers the exact body
    express.raw({ type: () => true, limit: deps.maxPayload ?? DEFAULT_MAX_PAYLOAD }),
    async (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      const log = logger.child({ requestId: nanoid(10) });
      transition(log, 'receiving', { contentType: req.headers['content-type'] });

      try {
        const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

        authenticatePush(
          rawBody,
          {
            signature: req.get('x-hub-signature'),
            signature256: req.get('x-hub-signature-256'),
          },
          deps.secret
        );

        const items = parse(rawBody);

        // Dedup is committed before anything is acknowledged
        const { claimed, duplicates } = await deps.pipeline.claimItems(items);
        transition(log, claimed.length > 0 ? 'dispatching' : 'rejected', {
          received: items.length,
          claimed: claimed.length,
          duplicates: duplicates.length,
        });

        const work = deps.pipeline.processAll(claimed);
        const outcomes = await settleWithin(work, deadlineMs);

        if (outcomes === null) {
          log.warn('Request deadline reached; finishing in background', { deadlineMs });
          void work.then(late => {
            log.info('Background processing complete', countOutcomes(late));
          });
        }

        const counts = outcomes ? countOutcomes(outcomes) : undefined;
        log.info('Push processed', {
          received: items.length,
          duplicates: duplicates.length,
          ...counts,
          duration: `${Date.now() - startTime}ms`,
        });
        transition(log, 'idle');

        res.status(200).json({
          received: items.length,
          accepted: claimed.length,
          duplicates: duplicates.length,
          completed: outcomes !== null,
          ...(counts ? { published: counts.published, deferred: counts.deferred } : {}),
        });
      } catch (error) {
        if (error instanceof AuthenticationError) {
          log.warn('Push rejected', { reason: error.message });
          transition(log, 'rejected');
          res.status(error.status).json({ error: error.message });
          return;
        }
        if (error instanceof ParseError) {
          log.warn('Unparseable payload', { reason: error.message });
          transition(log, 'rejected');
          res.status(400).json({ error: error.message });
          return;
        }
        log.error('Push failed', { error: errorMessage(error) });
        next(error);
      }
    }
  );

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser errors (oversized or unreadable body) carry their own 4xx
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      logger.warn('Rejected request body', { status, error: err.message });
      res.status(status).json({ error: err.message });
      return;
    }

    logger.error('Unhandled error in webhook server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
