/**
 * Newswire Relay — Rephrase Provider
 *
 * The text-generation backend behind the Rephrase Client. The client owns
 * key rotation, so providers make exactly one call per invocation and
 * report failures with the HTTP status they saw.
 */

import Anthropic from '@anthropic-ai/sdk';

export interface RephraseRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface RephraseProvider {
  complete(apiKey: string, request: RephraseRequest): Promise<string>;
}

/**
 * A failed backend call. `status` is absent for network errors and timeouts.
 */
export class ProviderCallError extends Error {
  override readonly name = 'ProviderCallError';

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

// ============================================================
// ANTHROPIC
// ============================================================

export interface AnthropicProviderConfig {
  model: string;
  /** Point the SDK at a compatible gateway instead of the public API. */
  baseURL?: string;
  timeoutMs?: number;
}

export class AnthropicRephraseProvider implements RephraseProvider {
  private readonly clients = new Map<string, Anthropic>();

  constructor(private readonly config: AnthropicProviderConfig) {}

  private clientFor(apiKey: string): Anthropic {
    let client = this.clients.get(apiKey);
    if (!client) {
      client = new Anthropic({
        apiKey,
        baseURL: this.config.baseURL,
        maxRetries: 0, // rotation and cooldown live in the key pool
        timeout: this.config.timeoutMs ?? 25_000,
      });
      this.clients.set(apiKey, client);
    }
    return client;
  }

  async complete(apiKey: string, request: RephraseRequest): Promise<string> {
    try {
      const response = await this.clientFor(apiKey).messages.create({
        model: this.config.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });

      const textContent = response.content.find(c => c.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        return '';
      }
      return textContent.text;
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new ProviderCallError(error.message, error.status);
      }
      throw error;
    }
  }
}
