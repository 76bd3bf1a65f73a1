/**
 * In-process DedupRepository for tests. Each method yields once, so
 * concurrent callers interleave the way they would against a real database.
 */

import type { DedupRepository } from '../../src/db/queries';
import type { DedupRecord } from '../../src/types';

export class MemoryDedupRepository implements DedupRepository {
  readonly rows = new Map<string, DedupRecord>();

  async find(itemId: string): Promise<DedupRecord | null> {
    await Promise.resolve();
    const row = this.rows.get(itemId);
    return row ? { ...row } : null;
  }

  async insert(record: DedupRecord): Promise<boolean> {
    await Promise.resolve();
    if (this.rows.has(record.itemId)) return false;
    this.rows.set(record.itemId, { ...record });
    return true;
  }

  async upsert(record: DedupRecord): Promise<void> {
    await Promise.resolve();
    this.rows.set(record.itemId, { ...record });
  }

  async delete(itemId: string): Promise<void> {
    await Promise.resolve();
    this.rows.delete(itemId);
  }

  async deleteIfExpired(itemId: string, now: string): Promise<void> {
    await Promise.resolve();
    const row = this.rows.get(itemId);
    if (row && Date.parse(row.expiresAt) <= Date.parse(now)) {
      this.rows.delete(itemId);
    }
  }

  async deleteExpired(now: string): Promise<number> {
    await Promise.resolve();
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (Date.parse(row.expiresAt) <= Date.parse(now)) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
