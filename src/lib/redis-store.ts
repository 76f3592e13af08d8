/**
 * Redis State Store Module
 * Dual implementation: RedisStateStore (production) / InMemoryStateStore (development)
 * Selected based on REDIS_URL environment variable
 */

import Redis from 'ioredis';
import { DEFAULT_REDIS_CONFIG, type IStateStore, type RedisConfig } from '@/types/redis';
import type { ReconcileCycleReport, ReconcileHistoryEntry } from '@/types/reconciler';

const HISTORY_DEFAULT_LIMIT = 10;

const KEYS = {
  reconcileHistory: 'reconcile:history',
  lastCycle: 'reconcile:last-cycle',
} as const;

// ============================================================
// Redis Implementation
// ============================================================

export class RedisStateStore implements IStateStore {
  private client: Redis;
  private prefix: string;
  private historyMax: number;

  constructor(config: RedisConfig) {
    this.prefix = config.keyPrefix;
    this.historyMax = config.historyMax;
    this.client = new Redis(config.url, {
      connectTimeout: config.connectTimeout,
      maxRetriesPerRequest: config.maxRetries,
      retryStrategy(times: number) {
        if (times > config.maxRetries) return null;
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      console.info('[State Store] Redis connected');
    });

    this.client.on('error', (err: Error) => {
      console.error('[State Store] Redis error:', err.message);
    });

    this.client.connect().catch((err: Error) => {
      console.error('[State Store] Initial connection failed:', err.message);
    });
  }

  private key(name: string): string {
    return `${this.prefix}${name}`;
  }

  async addReconcileHistory(entry: ReconcileHistoryEntry): Promise<void> {
    const key = this.key(KEYS.reconcileHistory);
    await this.client.lpush(key, JSON.stringify(entry));
    await this.client.ltrim(key, 0, this.historyMax - 1);
  }

  async getReconcileHistory(limit: number = HISTORY_DEFAULT_LIMIT): Promise<ReconcileHistoryEntry[]> {
    const items = await this.client.lrange(this.key(KEYS.reconcileHistory), 0, limit - 1);
    return items.map((item) => JSON.parse(item) as ReconcileHistoryEntry);
  }

  async clearReconcileHistory(): Promise<void> {
    await this.client.del(this.key(KEYS.reconcileHistory));
  }

  async getLastCycleReport(): Promise<ReconcileCycleReport | null> {
    const raw = await this.client.get(this.key(KEYS.lastCycle));
    return raw ? (JSON.parse(raw) as ReconcileCycleReport) : null;
  }

  async setLastCycleReport(report: ReconcileCycleReport): Promise<void> {
    await this.client.set(this.key(KEYS.lastCycle), JSON.stringify(report));
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

// ============================================================
// InMemory Implementation
// ============================================================

export class InMemoryStateStore implements IStateStore {
  private history: ReconcileHistoryEntry[] = [];
  private lastCycle: ReconcileCycleReport | null = null;
  private historyMax: number;

  constructor(historyMax: number = DEFAULT_REDIS_CONFIG.historyMax) {
    this.historyMax = historyMax;
  }

  async addReconcileHistory(entry: ReconcileHistoryEntry): Promise<void> {
    this.history.unshift(entry);
    if (this.history.length > this.historyMax) {
      this.history = this.history.slice(0, this.historyMax);
    }
  }

  async getReconcileHistory(limit: number = HISTORY_DEFAULT_LIMIT): Promise<ReconcileHistoryEntry[]> {
    return this.history.slice(0, limit);
  }

  async clearReconcileHistory(): Promise<void> {
    this.history = [];
  }

  async getLastCycleReport(): Promise<ReconcileCycleReport | null> {
    return this.lastCycle;
  }

  async setLastCycleReport(report: ReconcileCycleReport): Promise<void> {
    this.lastCycle = report;
  }

  async disconnect(): Promise<void> {
    // No-op for in-memory
  }
}

// ============================================================
// Factory: Store Singleton
// ============================================================

let store: IStateStore | undefined;

/**
 * Get the state store singleton.
 * Uses Redis if REDIS_URL is set, otherwise falls back to InMemory
 */
export function getStore(historyMax: number = DEFAULT_REDIS_CONFIG.historyMax): IStateStore {
  if (store) return store;

  const redisUrl = process.env.REDIS_URL;

  if (redisUrl) {
    console.info('[State Store] Using Redis:', redisUrl.replace(/\/\/.*@/, '//<credentials>@'));
    store = new RedisStateStore({ ...DEFAULT_REDIS_CONFIG, url: redisUrl, historyMax });
  } else {
    console.info('[State Store] Using InMemory (set REDIS_URL for persistence)');
    store = new InMemoryStateStore(historyMax);
  }

  return store;
}

/**
 * Reset store singleton (for testing and shutdown)
 */
export async function resetStore(): Promise<void> {
  if (store) {
    await store.disconnect();
    store = undefined;
  }
}
