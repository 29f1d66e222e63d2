import type { UrlRecord, UrlStore } from "./storage.js";

/**
 * Volatile store backed by a Map.
 *
 * Every method touches the map in a single synchronous step, so on the event loop
 * inserts never interleave and increments on a record never lose an update.
 * Stored records are frozen; an increment swaps in a new record, which keeps
 * every record a caller already holds at its point-in-time state.
 */
export class MemoryUrlStore implements UrlStore {
  private readonly map = new Map<string, UrlRecord>();

  async init(): Promise<void> {
    // nothing
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async insert(code: string, record: UrlRecord): Promise<void> {
    this.map.set(code, Object.freeze({ ...record }));
  }

  async insertIfAbsent(code: string, record: UrlRecord): Promise<boolean> {
    if (this.map.has(code)) return false;
    this.map.set(code, Object.freeze({ ...record }));
    return true;
  }

  async get(code: string): Promise<UrlRecord | null> {
    return this.map.get(code) ?? null;
  }

  async incrementAccess(code: string): Promise<boolean> {
    const rec = this.map.get(code);
    if (!rec) return false;
    this.map.set(code, Object.freeze({ ...rec, accessCount: rec.accessCount + 1 }));
    return true;
  }

  async listAll(): Promise<UrlRecord[]> {
    return Array.from(this.map.values());
  }

  async count(): Promise<number> {
    return this.map.size;
  }

  async totalClicks(): Promise<number> {
    let total = 0;
    for (const rec of this.map.values()) total += rec.accessCount;
    return total;
  }

  async close(): Promise<void> {
    this.map.clear();
  }
}
