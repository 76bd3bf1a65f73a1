/**
 * Newswire Relay — Rephrase Client
 *
 * Rewrites a feed item into social-ready copy. Each attempt takes the next
 * available key; rate limits, server errors and network failures put that
 * key into cooldown and move on to the next one, at most once per key.
 */

import { isTransientStatus, RephraseError } from '../lib/errors';
import { errorMessage, logger, maskSecret } from '../lib/logger';
import type { Item, RephrasedContent } from '../types';
import type { ApiKeyPool } from './key-pool';
import { ProviderCallError, type RephraseProvider, type RephraseRequest } from './provider';

export interface RephraseClientOptions {
  maxTokens?: number;
  temperature?: number;
  toneHint?: string;
}

// ============================================================
// PROMPT CONSTRUCTION
// ============================================================

const SYSTEM_PROMPT = `You rewrite news items into social media posts.

RULES:
1. Keep it concise and engaging; one short paragraph.
2. Use emojis only if they fit the story.
3. Keep URLs intact.
4. Do not invent facts that are not in the item.
5. Reply with the post text only.`;

/**
 * Plain-text rendition of an item as sent to the model.
 */
export function buildSourceText(item: Item): string {
  const parts = [item.title, item.summary].filter(Boolean);
  if (item.link) {
    parts.push(`Read more: ${item.link}`);
  }
  return parts.join('\n\n');
}

export function buildUserPrompt(item: Item, toneHint?: string): string {
  const prompt = `Rewrite the following news article into a social media post.\n\n${buildSourceText(item)}`;
  return toneHint ? `Tone hint: ${toneHint}\n\n${prompt}` : prompt;
}

// ============================================================
// CLIENT
// ============================================================

type FailureKind = 'transient' | 'auth' | 'rejected';

function classify(error: unknown): { kind: FailureKind; status?: number } {
  if (!(error instanceof ProviderCallError) || error.status === undefined) {
    return { kind: 'transient' };
  }
  const { status } = error;
  if (status === 401 || status === 403) return { kind: 'auth', status };
  if (isTransientStatus(status)) return { kind: 'transient', status };
  return { kind: 'rejected', status };
}

export class RephraseClient {
  private readonly logger = logger.child({ component: 'rephrase' });
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly toneHint?: string;

  constructor(
    private readonly pool: ApiKeyPool,
    private readonly provider: RephraseProvider,
    options: RephraseClientOptions = {}
  ) {
    this.maxTokens = options.maxTokens ?? 220;
    this.temperature = options.temperature ?? 0.7;
    this.toneHint = options.toneHint;
  }

  /**
   * Rewrite one item.
   * Throws RephraseError when no key is usable or the backend refuses the request.
   */
  async rewrite(item: Item): Promise<RephrasedContent> {
    const request: RephraseRequest = {
      system: SYSTEM_PROMPT,
      prompt: buildUserPrompt(item, this.toneHint),
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    };

    let attempts = 0;

    while (attempts < this.pool.size) {
      const slot = this.pool.acquire();
      if (!slot) break;
      attempts++;

      let text: string;
      try {
        text = (await this.provider.complete(slot.apiKey, request)).trim();
      } catch (error) {
        const failure = classify(error);
        const context = {
          itemId: item.id,
          key: maskSecret(slot.apiKey),
          status: failure.status,
          error: errorMessage(error),
        };

        if (failure.kind === 'rejected') {
          this.logger.error('Rephrase request rejected', context);
          throw new RephraseError(
            `Rephrase backend rejected the request (status ${failure.status})`,
            attempts
          );
        }

        if (failure.kind === 'auth') {
          this.pool.markExhausted(slot);
          this.logger.warn('API key rejected, slot exhausted', context);
        } else {
          const cooldownMs = this.pool.reportTransientFailure(slot);
          this.logger.warn('Transient rephrase failure, rotating key', { ...context, cooldownMs });
        }
        continue;
      }

      this.pool.reportSuccess(slot);

      if (!text) {
        throw new RephraseError('Empty response from rephrase backend', attempts);
      }

      this.logger.info('Item rephrased', { itemId: item.id, attempts });
      return { text, sourceItemId: item.id };
    }

    throw new RephraseError(
      attempts === 0
        ? 'No API key available: all slots cooling down or exhausted'
        : `All API keys failed after ${attempts} attempts`,
      attempts
    );
  }
}
