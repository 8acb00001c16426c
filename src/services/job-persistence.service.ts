/**
 * Job Persistence Service
 *
 * Saves and loads job state so jobs keep their configuration and running state
 * across restarts.
 */

import { query } from '../db/client.js';
import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';

export interface JobState {
  job_name: string;
  is_running: boolean;
  is_paused: boolean;
  config: unknown;
  stats: unknown;
  last_started_at: Date | null;
  last_stopped_at: Date | null;
  last_run_at: Date | null;
}

export interface JobStatePersistence {
  loadState(jobName: string): Promise<JobState | null>;
  saveRunningState(jobName: string, isRunning: boolean, isPaused?: boolean): Promise<void>;
  saveConfig(jobName: string, config: object): Promise<void>;
  saveStats(jobName: string, stats: object): Promise<void>;
  ensureJobState(jobName: string, defaultConfig: object): Promise<void>;
}

export class JobPersistenceService {
  /**
   * Load job state from database
   */
  static async loadState(jobName: string): Promise<JobState | null> {
    try {
      const result = await query<JobState>(
        `SELECT job_name, is_running, is_paused, config, stats, last_started_at, last_stopped_at, last_run_at
         FROM job_state WHERE job_name = $1`,
        [jobName]
      );
      return result.rows[0] ?? null;
    } catch (error) {
      logger.error('Failed to load job state', { jobName, error: describeError(error) });
      return null;
    }
  }

  /**
   * Save job running state
   */
  static async saveRunningState(
    jobName: string,
    isRunning: boolean,
    isPaused: boolean = false
  ): Promise<void> {
    try {
      const timestamp = isRunning ? 'last_started_at = NOW()' : 'last_stopped_at = NOW()';

      await query(
        `UPDATE job_state SET
          is_running = $2,
          is_paused = $3,
          ${timestamp}
         WHERE job_name = $1`,
        [jobName, isRunning, isPaused]
      );

      logger.info('Job running state saved', { jobName, isRunning, isPaused });
    } catch (error) {
      logger.error('Failed to save job running state', { jobName, error: describeError(error) });
    }
  }

  static async saveConfig(jobName: string, config: object): Promise<void> {
    try {
      await query(
        `UPDATE job_state SET config = $2 WHERE job_name = $1`,
        [jobName, JSON.stringify(config)]
      );

      logger.info('Job config saved', { jobName, config });
    } catch (error) {
      logger.error('Failed to save job config', { jobName, error: describeError(error) });
    }
  }

  static async saveStats(jobName: string, stats: object): Promise<void> {
    try {
      await query(
        `UPDATE job_state SET stats = $2, last_run_at = NOW() WHERE job_name = $1`,
        [jobName, JSON.stringify(stats)]
      );
    } catch (error) {
      logger.error('Failed to save job stats', { jobName, error: describeError(error) });
    }
  }

  /**
   * Ensure job state record exists (upsert)
   */
  static async ensureJobState(jobName: string, defaultConfig: object): Promise<void> {
    try {
      await query(
        `INSERT INTO job_state (job_name, config)
         VALUES ($1, $2)
         ON CONFLICT (job_name) DO NOTHING`,
        [jobName, JSON.stringify(defaultConfig)]
      );
    } catch (error) {
      logger.error('Failed to ensure job state', { jobName, error: describeError(error) });
    }
  }
}

/** True when the job has no record of ever being started or stopped. */
export function isFreshJobState(state: JobState | null): boolean {
  return !state || (state.last_started_at === null && state.last_stopped_at === null);
}
