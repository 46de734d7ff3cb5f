import type { IStateStore } from '../interfaces/state-store.js';

interface StateEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory TTL store for login attempts
 *
 * Expired entries are never returned and are swept periodically.
 */
export class MemoryStateStore<T> implements IStateStore<T> {
  private entries = new Map<string, StateEntry<T>>();
  private readonly cleanupInterval: NodeJS.Timeout;

  constructor(sweepIntervalMs: number = 60000) {
    this.cleanupInterval = setInterval(() => this.sweep(), sweepIntervalMs);

    // Prevent the interval from keeping the process alive
    this.cleanupInterval.unref();
  }

  async put(key: string, value: T, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async take(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    this.entries.delete(key);
    return entry.expiresAt <= Date.now() ? null : entry.value;
  }

  /**
   * Remove expired entries, returning how many were dropped
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  close(): void {
    clearInterval(this.cleanupInterval);
  }
}
