/**
 * State Store Types
 * Strategy interface for the Redis / InMemory history store
 */

import type { ReconcileCycleReport, ReconcileHistoryEntry } from './reconciler';

// ============================================================
// Store Interface
// ============================================================

/**
 * Implemented by RedisStateStore (production) and InMemoryStateStore (development).
 * Nothing here feeds back into decisions; it is an audit trail only.
 */
export interface IStateStore {
  // --- Reconcile History (newest first, capped) ---
  addReconcileHistory(entry: ReconcileHistoryEntry): Promise<void>;
  getReconcileHistory(limit?: number): Promise<ReconcileHistoryEntry[]>;
  clearReconcileHistory(): Promise<void>;

  // --- Last Cycle Report ---
  getLastCycleReport(): Promise<ReconcileCycleReport | null>;
  setLastCycleReport(report: ReconcileCycleReport): Promise<void>;

  disconnect(): Promise<void>;
}

// ============================================================
// Configuration
// ============================================================

export interface RedisConfig {
  /** Redis connection URL (e.g., redis://localhost:6379) */
  url: string;
  keyPrefix: string;
  connectTimeout: number;
  maxRetries: number;
  /** Upper bound on stored history entries */
  historyMax: number;
}

export const DEFAULT_REDIS_CONFIG: Omit<RedisConfig, 'url'> = {
  keyPrefix: 'd8r:',
  connectTimeout: 5000,
  maxRetries: 3,
  historyMax: 50,
};
