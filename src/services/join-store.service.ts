import type { PoolClient } from 'pg';
import { query, withTransaction } from '../db/client.js';
import { logger } from '../config/logger.js';
import { PersistenceError, describeError } from '../errors.js';
import type { JoinCandidate, JoinRecord, NotificationMarker } from '../types/models.js';
import {
  isCandidateSource,
  isDeliveryStatus,
  pairKey,
  reviveSnapshot,
  toConfidence,
  type DeliveryUpdate,
  type JoinStore,
  type JoinStoreTransaction,
  type PurgeResult,
} from './join-store.js';

interface JoinRecordRow {
  id: string;
  subject_id: string;
  community_id: string;
  community_name: string | null;
  observed_at: Date;
  source: string;
  subject: unknown;
  notified: boolean;
  delivery_status: string;
  attempt_count: number;
  next_attempt_at: Date | null;
  last_error: string | null;
  created_at: Date;
}

interface MarkerRow {
  subject_id: string;
  community_id: string;
  sent_at: Date;
  join_record_id: string | null;
}

const RECORD_COLUMNS = `id, subject_id, community_id, community_name, observed_at, source, subject,
  notified, delivery_status, attempt_count, next_attempt_at, last_error, created_at`;

function mapRecord(row: JoinRecordRow): JoinRecord {
  if (!isCandidateSource(row.source) || !isDeliveryStatus(row.delivery_status)) {
    throw new PersistenceError(`Join record ${row.id} has an unknown source or status`);
  }
  return {
    id: row.id,
    subject_id: row.subject_id,
    community_id: row.community_id,
    community_name: row.community_name,
    observed_at: row.observed_at,
    source: row.source,
    confidence: toConfidence(row.source),
    subject: reviveSnapshot(row.subject),
    notified: row.notified,
    delivery_status: row.delivery_status,
    attempt_count: row.attempt_count,
    next_attempt_at: row.next_attempt_at,
    last_error: row.last_error,
    created_at: row.created_at,
  };
}

function mapMarker(row: MarkerRow): NotificationMarker {
  return {
    subject_id: row.subject_id,
    community_id: row.community_id,
    sent_at: row.sent_at,
    join_record_id: row.join_record_id,
  };
}

async function persistence<T>(what: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`${what}: ${describeError(error)}`, error);
  }
}

class PgJoinStoreTransaction implements JoinStoreTransaction {
  constructor(private readonly client: PoolClient) {}

  async findActiveMarker(subjectId: string, communityId: string, since: Date): Promise<NotificationMarker | null> {
    const result = await this.client.query<MarkerRow>(
      `SELECT subject_id, community_id, sent_at, join_record_id
       FROM notification_markers
       WHERE subject_id = $1 AND community_id = $2 AND sent_at >= $3
       ORDER BY sent_at DESC
       LIMIT 1`,
      [subjectId, communityId, since]
    );
    const row = result.rows[0];
    return row ? mapMarker(row) : null;
  }

  async findTrackedRecord(subjectId: string, communityId: string, since: Date): Promise<JoinRecord | null> {
    const result = await this.client.query<JoinRecordRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM join_records
       WHERE subject_id = $1 AND community_id = $2 AND observed_at >= $3
       ORDER BY observed_at DESC
       LIMIT 1`,
      [subjectId, communityId, since]
    );
    const row = result.rows[0];
    return row ? mapRecord(row) : null;
  }

  async insertRecord(candidate: JoinCandidate): Promise<JoinRecord> {
    const result = await this.client.query<JoinRecordRow>(
      `INSERT INTO join_records (subject_id, community_id, community_name, observed_at, source, confidence, subject)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${RECORD_COLUMNS}`,
      [
        candidate.subject_id,
        candidate.community_id,
        candidate.community_name ?? null,
        candidate.observed_at,
        candidate.source,
        candidate.confidence,
        JSON.stringify(candidate.subject),
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new PersistenceError('Insert returned no join record');
    }
    return mapRecord(row);
  }

  async insertMarker(marker: NotificationMarker): Promise<void> {
    await this.client.query(
      `INSERT INTO notification_markers (subject_id, community_id, sent_at, join_record_id)
       VALUES ($1, $2, $3, $4)`,
      [marker.subject_id, marker.community_id, marker.sent_at, marker.join_record_id]
    );
  }

  async markNotified(recordId: string): Promise<void> {
    await this.client.query(
      `UPDATE join_records
       SET notified = TRUE, delivery_status = 'sent', next_attempt_at = NULL, last_error = NULL, updated_at = NOW()
       WHERE id = $1`,
      [recordId]
    );
  }
}

export class PgJoinStore implements JoinStore {
  async withPairLock<T>(
    subjectId: string,
    communityId: string,
    work: (tx: JoinStoreTransaction) => Promise<T>
  ): Promise<T> {
    return persistence(`Pair transaction ${pairKey(subjectId, communityId)}`, () =>
      withTransaction(async (client) => {
        // Serializes admit and mark for the pair across processes until commit
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [pairKey(subjectId, communityId)]);
        return work(new PgJoinStoreTransaction(client));
      })
    );
  }

  async findActiveMarker(subjectId: string, communityId: string, since: Date): Promise<NotificationMarker | null> {
    return persistence('Marker lookup', async () => {
      const result = await query<MarkerRow>(
        `SELECT subject_id, community_id, sent_at, join_record_id
         FROM notification_markers
         WHERE subject_id = $1 AND community_id = $2 AND sent_at >= $3
         ORDER BY sent_at DESC
         LIMIT 1`,
        [subjectId, communityId, since]
      );
      const row = result.rows[0];
      return row ? mapMarker(row) : null;
    });
  }

  async getRecord(recordId: string): Promise<JoinRecord | null> {
    return persistence(`Load join record ${recordId}`, async () => {
      const result = await query<JoinRecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM join_records WHERE id = $1`,
        [recordId]
      );
      const row = result.rows[0];
      return row ? mapRecord(row) : null;
    });
  }

  async updateDelivery(recordId: string, update: DeliveryUpdate): Promise<void> {
    await persistence(`Update delivery of ${recordId}`, async () => {
      await query(
        `UPDATE join_records
         SET delivery_status = $2, attempt_count = $3, next_attempt_at = $4, last_error = $5, updated_at = NOW()
         WHERE id = $1`,
        [recordId, update.delivery_status, update.attempt_count, update.next_attempt_at, update.last_error]
      );
    });
  }

  async listDispatchable(now: Date, limit: number): Promise<JoinRecord[]> {
    return persistence('List dispatchable records', async () => {
      const result = await query<JoinRecordRow>(
        `SELECT ${RECORD_COLUMNS}
         FROM join_records
         WHERE delivery_status = 'pending'
            OR (delivery_status = 'retrying' AND (next_attempt_at IS NULL OR next_attempt_at <= $1))
         ORDER BY created_at ASC
         LIMIT $2`,
        [now, limit]
      );
      return result.rows.map(mapRecord);
    });
  }

  async purgeOlderThan(cutoff: Date): Promise<PurgeResult> {
    return persistence('Purge old join data', () =>
      withTransaction(async (client) => {
        const markers = await client.query(
          `DELETE FROM notification_markers WHERE sent_at < $1`,
          [cutoff]
        );
        // Undelivered records stay until they settle
        const records = await client.query(
          `DELETE FROM join_records
           WHERE observed_at < $1 AND delivery_status IN ('sent', 'filtered', 'failed')`,
          [cutoff]
        );
        const purged = { records: records.rowCount ?? 0, markers: markers.rowCount ?? 0 };
        logger.info('Purged old join data', { cutoff: cutoff.toISOString(), ...purged });
        return purged;
      })
    );
  }
}
