import { logger } from '../config/logger.js';
import { PersistenceError, describeError } from '../errors.js';
import type { JoinCandidate, JoinRecord } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { pairKey, type JoinStore } from './join-store.js';

export type AdmissionDecision =
  | { outcome: 'admitted'; record: JoinRecord }
  | { outcome: 'duplicate'; reason: 'already_notified' | 'already_tracked' }
  | { outcome: 'deferred'; error: PersistenceError };

export interface DedupGuardOptions {
  windowMs: number;
  clock?: Clock;
}

/**
 * Single admission point for candidates from every source. Check and insert run
 * under one per-pair lock, so racing sources for the same pair admit exactly once.
 */
export class DeduplicationGuard {
  private readonly locks = new KeyedMutex();
  private readonly clock: Clock;

  constructor(private readonly store: JoinStore, private readonly options: DedupGuardOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get windowMs(): number {
    return this.options.windowMs;
  }

  windowStart(): Date {
    return new Date(this.clock.now().getTime() - this.options.windowMs);
  }

  async admit(candidate: JoinCandidate): Promise<AdmissionDecision> {
    const { subject_id: subjectId, community_id: communityId } = candidate;

    return this.locks.runExclusive(pairKey(subjectId, communityId), async () => {
      const since = this.windowStart();
      try {
        return await this.store.withPairLock(subjectId, communityId, async (tx): Promise<AdmissionDecision> => {
          if (await tx.findActiveMarker(subjectId, communityId, since)) {
            return { outcome: 'duplicate', reason: 'already_notified' };
          }
          if (await tx.findTrackedRecord(subjectId, communityId, since)) {
            return { outcome: 'duplicate', reason: 'already_tracked' };
          }
          const record = await tx.insertRecord(candidate);
          return { outcome: 'admitted', record };
        });
      } catch (error) {
        const failure =
          error instanceof PersistenceError
            ? error
            : new PersistenceError(`Admission failed: ${describeError(error)}`, error);
        logger.error('Candidate admission deferred', {
          subjectId,
          communityId,
          source: candidate.source,
          error: failure.message,
        });
        return { outcome: 'deferred', error: failure };
      }
    });
  }
}
