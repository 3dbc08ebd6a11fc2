import { CacheEntry, GridCellKey } from './forecast-cache.interface';
import { serializeCellKey } from './grid-keyer';

/**
 * Grid cell -> payload map with expiry judged at read time.
 *
 * Expired entries stay in the map until the same cell is written again.
 * Every method runs synchronously, so no other task can interleave with a
 * lookup or an insert.
 */
export class CacheStore<TPayload> {
  private readonly entries = new Map<string, CacheEntry<TPayload>>();

  lookup(key: GridCellKey, now: number, ttlMs: number): TPayload | null {
    const entry = this.entries.get(serializeCellKey(key));
    if (!entry) {
      return null;
    }
    if (now - entry.storedAt >= ttlMs) {
      return null;
    }
    return entry.payload;
  }

  insert(key: GridCellKey, payload: TPayload, now: number): void {
    this.entries.set(serializeCellKey(key), {
      key: { ...key },
      payload,
      storedAt: now,
    });
  }

  size(): number {
    return this.entries.size;
  }

  liveSize(now: number, ttlMs: number): number {
    let live = 0;
    for (const entry of this.entries.values()) {
      if (now - entry.storedAt < ttlMs) {
        live++;
      }
    }
    return live;
  }
}
