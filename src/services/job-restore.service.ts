/**
 * Job Restore Service
 *
 * Initializes job state records and restores running jobs on worker startup.
 */

import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';

export interface RestorableJob {
  init(): Promise<void>;
  restore(): Promise<boolean>;
  halt(): Promise<void>;
}

export interface NamedJob {
  name: string;
  job: RestorableJob;
}

export class JobRestoreService {
  constructor(private readonly jobs: NamedJob[]) {}

  /**
   * Create missing job state records
   */
  async initializeAllJobs(): Promise<void> {
    logger.info('Initializing job state records in database');

    try {
      await Promise.all(this.jobs.map(({ job }) => job.init()));
      logger.info('All job state records initialized');
    } catch (error) {
      logger.error('Error initializing job state records', { error: describeError(error) });
    }
  }

  /**
   * Restore all jobs to their previous running state
   */
  async restoreAllJobs(): Promise<{
    restored: string[];
    skipped: string[];
    failed: string[];
  }> {
    logger.info('Restoring job states from database');

    const restored: string[] = [];
    const skipped: string[] = [];
    const failed: string[] = [];

    await this.initializeAllJobs();

    for (const { name, job } of this.jobs) {
      try {
        const wasRestored = await job.restore();
        if (wasRestored) {
          restored.push(name);
          logger.info(`Job restored: ${name}`);
        } else {
          skipped.push(name);
          logger.debug(`Job not restored (was stopped): ${name}`);
        }
      } catch (error) {
        failed.push(name);
        logger.error(`Failed to restore job: ${name}`, { error: describeError(error) });
      }
    }

    logger.info('Job restoration complete', {
      restored: restored.length,
      skipped: skipped.length,
      failed: failed.length,
    });

    return { restored, skipped, failed };
  }

  /**
   * Halt timers without touching persisted state, so the next startup restores them
   */
  async haltAllJobs(): Promise<void> {
    logger.info('Halting all jobs');
    await Promise.all(this.jobs.map(({ job }) => job.halt()));
    logger.info('All jobs halted');
  }
}
