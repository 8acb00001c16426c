import { z } from 'zod';
import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';
import {
  JobPersistenceService,
  isFreshJobState,
  type JobStatePersistence,
} from '../services/job-persistence.service.js';
import type { JoinStore, PurgeResult } from '../services/join-store.js';
import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Background job that purges settled join records and expired notification markers.
 */

const JOB_NAME = 'retention';
const DAY_MS = 24 * 60 * 60 * 1000;

const configSchema = z.object({
  intervalHours: z.number().positive(),
  retentionDays: z.number().int().positive(),
  enabled: z.boolean(),
});

export type RetentionConfig = z.infer<typeof configSchema>;

export interface RetentionDeps {
  store: Pick<JoinStore, 'purgeOlderThan'>;
  /** Nothing younger than the dedup window is ever purged. */
  windowMs: number;
  persistence?: JobStatePersistence;
  clock?: Clock;
}

export class RetentionJob {
  private isRunning = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private readonly persistence: JobStatePersistence;
  private readonly clock: Clock;
  private config: RetentionConfig;

  private stats = {
    lastRun: null as Date | null,
    totalRuns: 0,
    totalRecordsPurged: 0,
    totalMarkersPurged: 0,
  };

  constructor(private readonly deps: RetentionDeps, config: RetentionConfig) {
    this.config = config;
    this.persistence = deps.persistence ?? JobPersistenceService;
    this.clock = deps.clock ?? systemClock;
  }

  async init(): Promise<void> {
    await this.persistence.ensureJobState(JOB_NAME, this.config);
  }

  async restore(): Promise<boolean> {
    const state = await this.persistence.loadState(JOB_NAME);
    if (state) {
      const config = configSchema.partial().safeParse(state.config);
      if (config.success) {
        this.config = { ...this.config, ...config.data };
      }
    }

    if (isFreshJobState(state) || state?.is_running) {
      await this.start();
      return this.isRunning;
    }
    return false;
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      isProcessing: this.isProcessing,
      config: this.config,
      stats: this.stats,
    };
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Retention job is already running');
      return;
    }
    if (!this.config.enabled) {
      logger.warn('Retention job is disabled');
      return;
    }

    this.isRunning = true;
    await this.persistence.saveRunningState(JOB_NAME, true, false);
    logger.info('Starting retention job', this.config);

    void this.runPurge();
    this.intervalId = setInterval(() => {
      void this.runPurge();
    }, this.config.intervalHours * 60 * 60 * 1000);
  }

  async stop(): Promise<void> {
    this.clearTimer();
    this.isRunning = false;
    await this.persistence.saveRunningState(JOB_NAME, false, false);
    logger.info('Retention job stopped');
  }

  async halt(): Promise<void> {
    this.clearTimer();
    logger.info('Retention job halted (state preserved)');
  }

  cutoff(): Date {
    const keepMs = Math.max(this.config.retentionDays * DAY_MS, this.deps.windowMs);
    return new Date(this.clock.now().getTime() - keepMs);
  }

  async runPurge(): Promise<PurgeResult | null> {
    if (this.isProcessing) {
      return null;
    }
    this.isProcessing = true;
    try {
      const purged = await this.deps.store.purgeOlderThan(this.cutoff());
      this.stats.lastRun = this.clock.now();
      this.stats.totalRuns++;
      this.stats.totalRecordsPurged += purged.records;
      this.stats.totalMarkersPurged += purged.markers;
      await this.persistence.saveStats(JOB_NAME, this.stats);
      return purged;
    } catch (error) {
      logger.error('Retention purge failed', { error: describeError(error) });
      return null;
    } finally {
      this.isProcessing = false;
    }
  }

  private clearTimer(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}
