import { z } from 'zod';
import type { CommunityTransport } from '../api/community/types.js';
import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';
import type { DetectionStateStore } from '../detection/detection-state.js';
import type { HeuristicDetector } from '../detection/heuristic-detector.js';
import { resolveMonitoringMode, type CommunityRegistry } from '../services/community-registry.service.js';
import type { RetryPolicy } from '../services/delivery-state.js';
import type { EventStreamAccess } from '../services/event-stream-listener.js';
import {
  JobPersistenceService,
  isFreshJobState,
  type JobStatePersistence,
} from '../services/job-persistence.service.js';
import type { JoinPipeline } from '../services/join-pipeline.service.js';
import { includesHeuristic, type CommunityTarget } from '../types/models.js';
import { CommunityPoller, type PollSummary } from './community-poller.js';

/**
 * Background job that discovers communities, picks each one's monitoring mode,
 * and keeps one heuristic poller running per community that needs it.
 */

const JOB_NAME = 'community-monitor';

const configSchema = z.object({
  pollIntervalSeconds: z.number().int().positive(),
  discoveryIntervalMinutes: z.number().int().positive(),
  enabled: z.boolean(),
});

export type CommunityMonitorConfig = z.infer<typeof configSchema>;

const statsSchema = z.object({
  totalDiscoveries: z.number(),
  failedDiscoveries: z.number(),
  totalPolls: z.number(),
  totalCandidates: z.number(),
  totalAdmitted: z.number(),
  totalDuplicates: z.number(),
  totalDeferred: z.number(),
  totalHeartbeats: z.number(),
});

export interface CommunityMonitorDeps {
  transport: Pick<CommunityTransport, 'listCommunities'>;
  registry: CommunityRegistry;
  detector: Pick<HeuristicDetector, 'poll'>;
  stateStore: DetectionStateStore;
  pipeline: Pick<JoinPipeline, 'submit'>;
  access: Pick<EventStreamAccess, 'has'>;
  excludedIds: string[];
  heuristicOnEventStream: boolean;
  pollBackoff: RetryPolicy;
  persistence?: JobStatePersistence;
}

export class CommunityMonitorJob {
  private isRunning = false;
  private isPaused = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private readonly pollers = new Map<string, CommunityPoller>();
  private readonly discarded = new Set<string>();
  private readonly persistence: JobStatePersistence;
  private config: CommunityMonitorConfig;

  private stats = {
    lastDiscovery: null as Date | null,
    totalDiscoveries: 0,
    failedDiscoveries: 0,
    totalPolls: 0,
    totalCandidates: 0,
    totalAdmitted: 0,
    totalDuplicates: 0,
    totalDeferred: 0,
    totalHeartbeats: 0,
  };

  constructor(private readonly deps: CommunityMonitorDeps, config: CommunityMonitorConfig) {
    this.config = config;
    this.persistence = deps.persistence ?? JobPersistenceService;
  }

  /**
   * Initialize job state in database (on first run)
   */
  async init(): Promise<void> {
    await this.persistence.ensureJobState(JOB_NAME, this.config);
  }

  /**
   * Restore job state from database. A job that was never started starts now;
   * one an operator stopped stays stopped.
   */
  async restore(): Promise<boolean> {
    const state = await this.persistence.loadState(JOB_NAME);

    if (state) {
      const config = configSchema.partial().safeParse(state.config);
      if (config.success) {
        this.config = { ...this.config, ...config.data };
      }
      const stats = statsSchema.partial().safeParse(state.stats);
      if (stats.success) {
        this.stats = { ...this.stats, ...stats.data };
      }
    }

    if (isFreshJobState(state) || (state?.is_running && !state.is_paused)) {
      logger.info('Restoring community monitor job to running state');
      await this.start();
      return this.isRunning;
    }
    if (state?.is_running && state.is_paused) {
      logger.info('Restoring community monitor job to paused state');
      this.isRunning = true;
      this.isPaused = true;
      return true;
    }
    return false;
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      isPaused: this.isPaused,
      isProcessing: this.isProcessing,
      activePollers: [...this.pollers.keys()],
      config: this.config,
      stats: this.stats,
    };
  }

  async updateConfig(config: Partial<CommunityMonitorConfig>): Promise<void> {
    const wasRunning = this.isRunning && !this.isPaused;

    if (wasRunning) {
      await this.stop();
    }

    this.config = { ...this.config, ...config };
    await this.persistence.saveConfig(JOB_NAME, this.config);
    logger.info('Community monitor job config updated', { config: this.config });

    if (wasRunning && this.config.enabled) {
      await this.start();
    }
  }

  async start(): Promise<void> {
    if (this.isRunning && !this.isPaused) {
      logger.warn('Community monitor job is already running');
      return;
    }
    if (!this.config.enabled) {
      logger.warn('Community monitor job is disabled');
      return;
    }

    logger.info('Starting community monitor job', {
      pollIntervalSeconds: this.config.pollIntervalSeconds,
      discoveryIntervalMinutes: this.config.discoveryIntervalMinutes,
    });

    this.isRunning = true;
    this.isPaused = false;
    await this.persistence.saveRunningState(JOB_NAME, true, false);

    await this.runDiscovery();

    this.intervalId = setInterval(() => {
      if (!this.isPaused) {
        void this.runDiscovery();
      }
    }, this.config.discoveryIntervalMinutes * 60 * 1000);
  }

  /**
   * Pause polling. In-flight polls finish; nothing new starts until resume.
   */
  async pause(): Promise<void> {
    if (!this.isRunning) {
      logger.warn('Community monitor job is not running');
      return;
    }
    this.isPaused = true;
    await this.stopPollers();
    await this.persistence.saveRunningState(JOB_NAME, true, true);
    logger.info('Community monitor job paused');
  }

  async resume(): Promise<void> {
    if (!this.isRunning) {
      logger.warn('Community monitor job is not running');
      return;
    }
    this.isPaused = false;
    await this.persistence.saveRunningState(JOB_NAME, true, false);
    await this.runDiscovery();
    logger.info('Community monitor job resumed');
  }

  async stop(): Promise<void> {
    this.clearTimer();
    await this.stopPollers();
    this.isRunning = false;
    this.isPaused = false;
    await this.persistence.saveRunningState(JOB_NAME, false, false);
    logger.info('Community monitor job stopped');
  }

  /**
   * Stop timers and pollers without updating the database, so the next start restores the job
   */
  async halt(): Promise<void> {
    this.clearTimer();
    await this.stopPollers();
    logger.info('Community monitor job halted (state preserved)');
  }

  /**
   * List visible communities, record each with its mode, and bring pollers in line.
   * Communities no longer visible are soft-excluded.
   */
  async runDiscovery(): Promise<CommunityTarget[]> {
    if (this.isProcessing) {
      logger.warn('Community discovery is already processing');
      return [];
    }

    this.isProcessing = true;
    try {
      const result = await this.deps.transport.listCommunities();
      if (result.status !== 'ok') {
        this.stats.failedDiscoveries++;
        logger.warn('Community discovery failed', { status: result.status });
        return [];
      }

      const targets: CommunityTarget[] = [];
      const seen = new Set<string>();

      for (const summary of result.data) {
        seen.add(summary.id);
        const mode = resolveMonitoringMode(this.deps.access.has(summary.id), this.deps.heuristicOnEventStream);
        const excluded = this.deps.excludedIds.includes(summary.id);
        try {
          targets.push(await this.deps.registry.upsert(summary.id, summary.name, mode, excluded));
        } catch (error) {
          logger.error('Failed to record community', { communityId: summary.id, error: describeError(error) });
        }
      }

      for (const known of await this.deps.registry.list()) {
        if (seen.has(known.id) || known.excluded) {
          continue;
        }
        await this.deps.registry.setExcluded(known.id, true);
        targets.push({ ...known, excluded: true });
      }

      await this.reconcile(targets);

      this.stats.lastDiscovery = new Date();
      this.stats.totalDiscoveries++;
      await this.persistence.saveStats(JOB_NAME, this.stats);

      logger.info('Community discovery complete', {
        communities: result.data.length,
        heuristicPollers: this.pollers.size,
      });
      return targets;
    } catch (error) {
      this.stats.failedDiscoveries++;
      logger.error('Community discovery error', { error: describeError(error) });
      return [];
    } finally {
      this.isProcessing = false;
    }
  }

  /**
   * Start pollers for communities that need heuristics, stop the rest. An excluded
   * community's detection state is discarded with its poller.
   */
  async reconcile(targets: CommunityTarget[]): Promise<void> {
    for (const target of targets) {
      const wanted = !target.excluded && includesHeuristic(target.monitoring_mode) && !this.isPaused;
      const poller = this.pollers.get(target.id);

      if (wanted && !poller) {
        const created = new CommunityPoller(target, {
          detector: this.deps.detector,
          stateStore: this.deps.stateStore,
          pipeline: this.deps.pipeline,
          intervalMs: this.config.pollIntervalSeconds * 1000,
          backoff: this.deps.pollBackoff,
          onSummary: (summary) => this.recordSummary(summary),
        });
        this.pollers.set(target.id, created);
        created.start();
        logger.info('Heuristic polling started', { communityId: target.id, mode: target.monitoring_mode });
      } else if (wanted && poller) {
        poller.updateTarget(target);
      } else if (!wanted && poller) {
        this.pollers.delete(target.id);
        await poller.stop();
        logger.info('Heuristic polling stopped', { communityId: target.id, mode: target.monitoring_mode });
      }

      if (!target.excluded) {
        this.discarded.delete(target.id);
      } else if (!this.discarded.has(target.id)) {
        try {
          await this.deps.stateStore.discard(target.id);
          this.discarded.add(target.id);
        } catch (error) {
          logger.warn('Could not discard detection state', { communityId: target.id, error: describeError(error) });
        }
      }
    }
  }

  private recordSummary(summary: PollSummary): void {
    this.stats.totalPolls++;
    this.stats.totalCandidates += summary.candidates;
    this.stats.totalAdmitted += summary.admitted;
    this.stats.totalDuplicates += summary.duplicates;
    this.stats.totalDeferred += summary.deferred;
    if (summary.heartbeat) {
      this.stats.totalHeartbeats++;
    }
  }

  private async stopPollers(): Promise<void> {
    const pollers = [...this.pollers.values()];
    this.pollers.clear();
    await Promise.all(pollers.map((poller) => poller.stop()));
  }

  private clearTimer(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}
