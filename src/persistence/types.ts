import type { ReleaseOutcome } from '../types.js';

export interface IdempotencyStore {
  checkAndMark(key: string): Promise<{ status: 'new' | 'duplicate_recent'; firstSeenAt?: Date }>;
  /** Forget a key so a redelivery is processed again. */
  forget(key: string): Promise<void>;
  getStats(): { size: number; maxSize: number; ttlMs: number; type: 'redis' | 'memory' };
}

export interface DistributedSemaphore {
  tryAcquire(): Promise<boolean>;
  release(): Promise<void>;
  getInFlight(): Promise<number>;
  getPeak(): number;
  getAvailable(): Promise<number>;
}

export interface OutcomeStore {
  append(outcome: ReleaseOutcome): Promise<void>;
  getRecent(limit?: number): Promise<ReleaseOutcome[]>;
  getStats(): Promise<{ count: number; maxSize: number; type: 'memory' | 'redis' }>;
}
