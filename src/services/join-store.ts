import type {
  CandidateSource,
  Confidence,
  DeliveryStatus,
  JoinCandidate,
  JoinRecord,
  NotificationMarker,
  SubjectSnapshot,
} from '../types/models.js';

export interface DeliveryUpdate {
  delivery_status: DeliveryStatus;
  attempt_count: number;
  next_attempt_at: Date | null;
  last_error: string | null;
}

export interface PurgeResult {
  records: number;
  markers: number;
}

/**
 * Reads and writes made while holding the lock of one (subject, community) pair.
 * Everything done through one transaction commits or rolls back together.
 */
export interface JoinStoreTransaction {
  findActiveMarker(subjectId: string, communityId: string, since: Date): Promise<NotificationMarker | null>;
  findTrackedRecord(subjectId: string, communityId: string, since: Date): Promise<JoinRecord | null>;
  insertRecord(candidate: JoinCandidate): Promise<JoinRecord>;
  insertMarker(marker: NotificationMarker): Promise<void>;
  markNotified(recordId: string): Promise<void>;
}

/**
 * Durable join records and notification markers. Every method throws
 * PersistenceError when storage is unreachable.
 */
export interface JoinStore {
  withPairLock<T>(
    subjectId: string,
    communityId: string,
    work: (tx: JoinStoreTransaction) => Promise<T>
  ): Promise<T>;
  findActiveMarker(subjectId: string, communityId: string, since: Date): Promise<NotificationMarker | null>;
  getRecord(recordId: string): Promise<JoinRecord | null>;
  updateDelivery(recordId: string, update: DeliveryUpdate): Promise<void>;
  /** Pending records, and retrying records whose next attempt is due, oldest first. */
  listDispatchable(now: Date, limit: number): Promise<JoinRecord[]>;
  purgeOlderThan(cutoff: Date): Promise<PurgeResult>;
}

const DELIVERY_STATUSES: readonly DeliveryStatus[] = ['pending', 'retrying', 'sent', 'filtered', 'failed'];
const CANDIDATE_SOURCES: readonly CandidateSource[] = [
  'event_stream',
  'heuristic:count_delta',
  'heuristic:activity_pattern',
  'heuristic:presence_delta',
];

export function isDeliveryStatus(value: string): value is DeliveryStatus {
  return DELIVERY_STATUSES.some((status) => status === value);
}

export function isCandidateSource(value: string): value is CandidateSource {
  return CANDIDATE_SOURCES.some((source) => source === value);
}

export function isDispatchable(record: JoinRecord, now: Date): boolean {
  if (record.delivery_status === 'pending') {
    return true;
  }
  if (record.delivery_status !== 'retrying') {
    return false;
  }
  return record.next_attempt_at === null || record.next_attempt_at.getTime() <= now.getTime();
}

/** Snapshot as stored in JSON: dates come back as strings. */
export function reviveSnapshot(raw: unknown): SubjectSnapshot {
  const snapshot: SubjectSnapshot = {};
  if (typeof raw !== 'object' || raw === null) {
    return snapshot;
  }
  const fields = new Map<string, unknown>(Object.entries(raw));

  const text = (key: string): string | undefined => {
    const value = fields.get(key);
    return typeof value === 'string' ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = fields.get(key);
    return typeof value === 'boolean' ? value : undefined;
  };

  const username = text('username');
  if (username !== undefined) snapshot.username = username;
  const displayName = text('display_name');
  if (displayName !== undefined) snapshot.display_name = displayName;
  const avatarUrl = text('avatar_url');
  if (avatarUrl !== undefined) snapshot.avatar_url = avatarUrl;

  const createdRaw = fields.get('account_created_at');
  if (typeof createdRaw === 'string' || createdRaw instanceof Date) {
    const createdAt = new Date(createdRaw);
    if (!Number.isNaN(createdAt.getTime())) snapshot.account_created_at = createdAt;
  }

  const isBot = bool('is_bot');
  if (isBot !== undefined) snapshot.is_bot = isBot;
  const isSystem = bool('is_system');
  if (isSystem !== undefined) snapshot.is_system = isSystem;
  const synthetic = bool('synthetic');
  if (synthetic !== undefined) snapshot.synthetic = synthetic;

  return snapshot;
}

export function toConfidence(source: CandidateSource): Confidence {
  return source === 'event_stream' ? 'confirmed' : 'inferred';
}

export function pairKey(subjectId: string, communityId: string): string {
  return `${subjectId}:${communityId}`;
}
