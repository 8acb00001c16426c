import { query, withTransaction } from '../db/client.js';
import { logger } from '../config/logger.js';
import { PersistenceError, describeError } from '../errors.js';
import {
  CommunityDetectionState,
  type DetectionStateEntry,
  type DetectionStateStore,
} from '../detection/detection-state.js';

export class PgDetectionStateStore implements DetectionStateStore {
  async load(communityId: string): Promise<CommunityDetectionState> {
    try {
      const result = await query<DetectionStateEntry>(
        `SELECT community_id, strategy_name, field_name, last_value, updated_at
         FROM detection_state
         WHERE community_id = $1`,
        [communityId]
      );
      return new CommunityDetectionState(communityId, result.rows);
    } catch (error) {
      throw new PersistenceError(`Failed to load detection state for ${communityId}`, error);
    }
  }

  async save(state: CommunityDetectionState): Promise<void> {
    const entries = state.entries();
    if (entries.length === 0) {
      return;
    }

    try {
      await withTransaction(async (client) => {
        for (const entry of entries) {
          await client.query(
            `INSERT INTO detection_state (community_id, strategy_name, field_name, last_value, updated_at)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (community_id, strategy_name, field_name) DO UPDATE
             SET last_value = EXCLUDED.last_value, updated_at = EXCLUDED.updated_at`,
            [entry.community_id, entry.strategy_name, entry.field_name, entry.last_value, entry.updated_at]
          );
        }
      });
    } catch (error) {
      throw new PersistenceError(`Failed to save detection state for ${state.communityId}`, error);
    }
  }

  async discard(communityId: string): Promise<void> {
    try {
      const result = await query(`DELETE FROM detection_state WHERE community_id = $1`, [communityId]);
      logger.info('Detection state discarded', { communityId, rows: result.rowCount });
    } catch (error) {
      logger.error('Failed to discard detection state', { communityId, error: describeError(error) });
      throw new PersistenceError(`Failed to discard detection state for ${communityId}`, error);
    }
  }
}
