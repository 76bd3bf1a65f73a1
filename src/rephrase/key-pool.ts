/**
 * Newswire Relay — API Key Pool
 *
 * Credential slots for the rephrasing backend. Each slot is available,
 * cooling down after a transient failure, or exhausted (rejected key).
 * All transitions are synchronous, so concurrent callers in one process can
 * never both take a slot whose cooldown has not elapsed.
 */

import { systemClock, type Clock } from '../lib/clock';
import { maskSecret } from '../lib/logger';

export type KeySlotState = 'available' | 'cooling_down' | 'exhausted';

export interface KeySlot {
  readonly index: number;
  readonly apiKey: string;
  state: KeySlotState;
  cooldownUntil: number;
  /** Consecutive transient failures; reset by a success. */
  failureCount: number;
}

export interface KeyPoolOptions {
  /** Cooldown after the first failure. */
  baseCooldownMs?: number;
  /** Upper bound for the doubled cooldown. */
  maxCooldownMs?: number;
  clock?: Clock;
}

export interface KeySlotSnapshot {
  index: number;
  key: string;
  state: KeySlotState;
  cooldownUntil: number;
  failureCount: number;
}

export class ApiKeyPool {
  private readonly slots: KeySlot[];
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly clock: Clock;
  private cursor = 0;

  constructor(apiKeys: readonly string[], options: KeyPoolOptions = {}) {
    const keys = apiKeys.map(k => k.trim()).filter(Boolean);
    if (keys.length === 0) {
      throw new Error('At least one API key is required');
    }

    this.slots = keys.map((apiKey, index) => ({
      index,
      apiKey,
      state: 'available',
      cooldownUntil: 0,
      failureCount: 0,
    }));
    this.baseCooldownMs = options.baseCooldownMs ?? 30_000;
    this.maxCooldownMs = options.maxCooldownMs ?? 600_000;
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.slots.length;
  }

  /**
   * Next available slot in round-robin order, or null when every slot is
   * cooling down or exhausted. Slots whose cooldown elapsed become available here.
   */
  acquire(): KeySlot | null {
    const now = this.clock.now();

    for (let offset = 0; offset < this.slots.length; offset++) {
      const slot = this.slots[(this.cursor + offset) % this.slots.length];

      if (slot.state === 'cooling_down' && slot.cooldownUntil <= now) {
        slot.state = 'available';
      }

      if (slot.state === 'available') {
        this.cursor = (slot.index + 1) % this.slots.length;
        return slot;
      }
    }

    return null;
  }

  reportSuccess(slot: KeySlot): void {
    slot.failureCount = 0;
    if (slot.state !== 'exhausted') {
      slot.state = 'available';
      slot.cooldownUntil = 0;
    }
  }

  /**
   * Put a slot into cooldown: base * 2^(failures - 1), capped.
   * Returns the cooldown applied.
   */
  reportTransientFailure(slot: KeySlot): number {
    if (slot.state === 'exhausted') return 0;

    slot.failureCount++;
    const cooldown = Math.min(
      this.baseCooldownMs * 2 ** (slot.failureCount - 1),
      this.maxCooldownMs
    );
    slot.state = 'cooling_down';
    slot.cooldownUntil = this.clock.now() + cooldown;
    return cooldown;
  }

  /**
   * The backend rejected the key itself; never use it again.
   */
  markExhausted(slot: KeySlot): void {
    slot.state = 'exhausted';
    slot.cooldownUntil = 0;
  }

  /**
   * Slot states with keys masked, for logs and health output.
   */
  snapshot(): KeySlotSnapshot[] {
    return this.slots.map(slot => ({
      index: slot.index,
      key: maskSecret(slot.apiKey),
      state: slot.state,
      cooldownUntil: slot.cooldownUntil,
      failureCount: slot.failureCount,
    }));
  }
}
