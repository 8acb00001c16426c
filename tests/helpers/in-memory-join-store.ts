import { PersistenceError } from '../../src/errors';
import type {
  DeliveryUpdate,
  JoinStore,
  JoinStoreTransaction,
  PurgeResult,
} from '../../src/services/join-store';
import { isDispatchable, pairKey, toConfidence } from '../../src/services/join-store';
import type { JoinCandidate, JoinRecord, NotificationMarker } from '../../src/types/models';
import { KeyedMutex } from '../../src/utils/keyed-mutex';

export type StoreOperation =
  | 'withPairLock'
  | 'insertMarker'
  | 'findActiveMarker'
  | 'getRecord'
  | 'updateDelivery'
  | 'listDispatchable'
  | 'purgeOlderThan';

/**
 * Join store held in memory. Writes made in a pair transaction apply only when
 * the work resolves. `failNext` makes the next call of an operation throw.
 */
export class InMemoryJoinStore implements JoinStore {
  records: JoinRecord[] = [];
  markers: NotificationMarker[] = [];
  private readonly locks = new KeyedMutex();
  private readonly failures = new Map<StoreOperation, number>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  failNext(operation: StoreOperation, times = 1): void {
    this.failures.set(operation, (this.failures.get(operation) ?? 0) + times);
  }

  private maybeFail(operation: StoreOperation): void {
    const remaining = this.failures.get(operation) ?? 0;
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1);
      throw new PersistenceError(`${operation} unavailable`);
    }
  }

  async withPairLock<T>(
    subjectId: string,
    communityId: string,
    work: (tx: JoinStoreTransaction) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(pairKey(subjectId, communityId), async () => {
      this.maybeFail('withPairLock');
      // Yield so concurrent callers interleave up to the lock
      await Promise.resolve();

      const newRecords: JoinRecord[] = [];
      const newMarkers: NotificationMarker[] = [];
      const notified: string[] = [];

      const tx: JoinStoreTransaction = {
        findActiveMarker: async (s, c, since) => findMarker([...this.markers, ...newMarkers], s, c, since),
        findTrackedRecord: async (s, c, since) =>
          [...this.records, ...newRecords].find(
            (r) => r.subject_id === s && r.community_id === c && r.observed_at.getTime() >= since.getTime()
          ) ?? null,
        insertRecord: async (candidate) => {
          const record = this.buildRecord(candidate);
          newRecords.push(record);
          return record;
        },
        insertMarker: async (marker) => {
          this.maybeFail('insertMarker');
          newMarkers.push({ ...marker });
        },
        markNotified: async (recordId) => {
          notified.push(recordId);
        },
      };

      const result = await work(tx);

      this.records.push(...newRecords);
      this.markers.push(...newMarkers);
      for (const id of notified) {
        this.patch(id, { notified: true, delivery_status: 'sent', next_attempt_at: null, last_error: null });
      }
      return result;
    });
  }

  async findActiveMarker(subjectId: string, communityId: string, since: Date): Promise<NotificationMarker | null> {
    this.maybeFail('findActiveMarker');
    return findMarker(this.markers, subjectId, communityId, since);
  }

  async getRecord(recordId: string): Promise<JoinRecord | null> {
    this.maybeFail('getRecord');
    const record = this.records.find((r) => r.id === recordId);
    return record ? { ...record } : null;
  }

  async updateDelivery(recordId: string, update: DeliveryUpdate): Promise<void> {
    this.maybeFail('updateDelivery');
    this.patch(recordId, update);
  }

  async listDispatchable(now: Date, limit: number): Promise<JoinRecord[]> {
    this.maybeFail('listDispatchable');
    return this.records
      .filter((r) => isDispatchable(r, now))
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async purgeOlderThan(cutoff: Date): Promise<PurgeResult> {
    this.maybeFail('purgeOlderThan');
    const markersBefore = this.markers.length;
    const recordsBefore = this.records.length;
    this.markers = this.markers.filter((m) => m.sent_at.getTime() >= cutoff.getTime());
    this.records = this.records.filter(
      (r) => r.observed_at.getTime() >= cutoff.getTime() || r.delivery_status === 'pending' || r.delivery_status === 'retrying'
    );
    return { records: recordsBefore - this.records.length, markers: markersBefore - this.markers.length };
  }

  addRecord(candidate: JoinCandidate): JoinRecord {
    const record = this.buildRecord(candidate);
    this.records.push(record);
    return { ...record };
  }

  record(recordId: string): JoinRecord {
    const record = this.records.find((r) => r.id === recordId);
    if (!record) {
      throw new Error(`No record ${recordId}`);
    }
    return { ...record };
  }

  private patch(recordId: string, update: Partial<JoinRecord>): void {
    this.records = this.records.map((r) => (r.id === recordId ? { ...r, ...update } : r));
  }

  private buildRecord(candidate: JoinCandidate): JoinRecord {
    return {
      id: `record-${this.nextId++}`,
      subject_id: candidate.subject_id,
      community_id: candidate.community_id,
      community_name: candidate.community_name ?? null,
      observed_at: candidate.observed_at,
      source: candidate.source,
      confidence: toConfidence(candidate.source),
      subject: { ...candidate.subject },
      notified: false,
      delivery_status: 'pending',
      attempt_count: 0,
      next_attempt_at: null,
      last_error: null,
      created_at: this.now(),
    };
  }
}

function findMarker(
  markers: NotificationMarker[],
  subjectId: string,
  communityId: string,
  since: Date
): NotificationMarker | null {
  return (
    markers.find(
      (m) => m.subject_id === subjectId && m.community_id === communityId && m.sent_at.getTime() >= since.getTime()
    ) ?? null
  );
}
