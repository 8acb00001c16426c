import { query } from '../db/client.js';
import { logger } from '../config/logger.js';
import { PersistenceError } from '../errors.js';
import type { CommunityTarget, MonitoringMode } from '../types/models.js';

export interface CommunityRegistry {
  upsert(id: string, displayName: string, mode: MonitoringMode, excluded: boolean): Promise<CommunityTarget>;
  setExcluded(id: string, excluded: boolean): Promise<void>;
  list(): Promise<CommunityTarget[]>;
}

/**
 * Mode for a community: the event stream where it reaches, heuristics otherwise,
 * both when heuristics are asked to double-check the stream.
 */
export function resolveMonitoringMode(hasEventStream: boolean, heuristicOnEventStream: boolean): MonitoringMode {
  if (!hasEventStream) {
    return 'heuristic';
  }
  return heuristicOnEventStream ? 'both' : 'event_stream';
}

interface CommunityRow {
  id: string;
  display_name: string;
  monitoring_mode: string;
  excluded: boolean;
  created_at: Date;
  updated_at: Date;
}

function isMonitoringMode(value: string): value is MonitoringMode {
  return value === 'event_stream' || value === 'heuristic' || value === 'both';
}

function mapCommunity(row: CommunityRow): CommunityTarget {
  if (!isMonitoringMode(row.monitoring_mode)) {
    throw new PersistenceError(`Community ${row.id} has unknown mode ${row.monitoring_mode}`);
  }
  return { ...row, monitoring_mode: row.monitoring_mode };
}

export class PgCommunityRegistry implements CommunityRegistry {
  async upsert(id: string, displayName: string, mode: MonitoringMode, excluded: boolean): Promise<CommunityTarget> {
    try {
      const result = await query<CommunityRow>(
        `INSERT INTO communities (id, display_name, monitoring_mode, excluded)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (id) DO UPDATE
         SET display_name = EXCLUDED.display_name,
             monitoring_mode = EXCLUDED.monitoring_mode,
             excluded = EXCLUDED.excluded,
             updated_at = NOW()
         RETURNING id, display_name, monitoring_mode, excluded, created_at, updated_at`,
        [id, displayName, mode, excluded]
      );
      const row = result.rows[0];
      if (!row) {
        throw new PersistenceError(`Upsert returned no community ${id}`);
      }
      return mapCommunity(row);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Failed to upsert community ${id}`, error);
    }
  }

  async setExcluded(id: string, excluded: boolean): Promise<void> {
    try {
      await query(
        `UPDATE communities SET excluded = $2, updated_at = NOW() WHERE id = $1`,
        [id, excluded]
      );
      logger.info('Community exclusion updated', { communityId: id, excluded });
    } catch (error) {
      throw new PersistenceError(`Failed to update community ${id}`, error);
    }
  }

  async list(): Promise<CommunityTarget[]> {
    try {
      const result = await query<CommunityRow>(
        `SELECT id, display_name, monitoring_mode, excluded, created_at, updated_at
         FROM communities
         ORDER BY display_name ASC`
      );
      return result.rows.map(mapCommunity);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('Failed to list communities', error);
    }
  }
}
