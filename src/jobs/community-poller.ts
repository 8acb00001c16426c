import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';
import type { DetectionStateStore } from '../detection/detection-state.js';
import type { HeuristicDetector } from '../detection/heuristic-detector.js';
import {
  INITIAL_RETRY_STATE,
  backoffDelayMs,
  transition,
  type RetryPolicy,
  type RetryState,
} from '../services/delivery-state.js';
import type { JoinPipeline } from '../services/join-pipeline.service.js';
import type { CommunityTarget } from '../types/models.js';

export interface PollSummary {
  communityId: string;
  candidates: number;
  admitted: number;
  duplicates: number;
  deferred: number;
  heartbeat: boolean;
}

export interface CommunityPollerDeps {
  detector: Pick<HeuristicDetector, 'poll'>;
  stateStore: DetectionStateStore;
  pipeline: Pick<JoinPipeline, 'submit'>;
  intervalMs: number;
  /** Backoff after consecutive failed polls; attempt limit is ignored. */
  backoff: RetryPolicy;
  onSummary?: (summary: PollSummary) => void;
}

/**
 * The single task that polls one community. Owns that community's detection
 * state: loads it, lets the detector update it, and saves it after the poll.
 */
export class CommunityPoller {
  private stopping = false;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private failures: RetryState = INITIAL_RETRY_STATE;

  constructor(private target: CommunityTarget, private readonly deps: CommunityPollerDeps) {}

  get communityId(): string {
    return this.target.id;
  }

  start(): void {
    this.stopping = false;
    this.schedule(0);
  }

  updateTarget(target: CommunityTarget): void {
    this.target = target;
  }

  /**
   * Finish any poll in flight, submissions included, then stop. No poll starts
   * after this resolves.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.current;
  }

  /**
   * The state is saved only when every candidate was admitted or dropped as a
   * duplicate. After a deferral the old baselines stay, so the next poll derives
   * the same candidates again.
   */
  async pollOnce(): Promise<PollSummary> {
    const state = await this.deps.stateStore.load(this.target.id);
    const result = await this.deps.detector.poll(this.target, state);

    const summary: PollSummary = {
      communityId: this.target.id,
      candidates: result.candidates.length,
      admitted: 0,
      duplicates: 0,
      deferred: 0,
      heartbeat: result.heartbeat !== null,
    };

    for (const candidate of result.candidates) {
      const decision = await this.deps.pipeline.submit(candidate);
      if (decision.outcome === 'admitted') summary.admitted++;
      else if (decision.outcome === 'duplicate') summary.duplicates++;
      else summary.deferred++;
    }

    if (summary.deferred > 0) {
      logger.warn('Candidates deferred, keeping detection state for the next poll', {
        communityId: this.target.id,
        deferred: summary.deferred,
      });
    } else {
      await this.deps.stateStore.save(state);
    }

    return summary;
  }

  nextDelayMs(): number {
    if (this.failures.status !== 'retrying') {
      return this.deps.intervalMs;
    }
    return Math.max(this.deps.intervalMs, backoffDelayMs(this.failures.attempt, this.deps.backoff));
  }

  private schedule(delayMs: number): void {
    if (this.stopping) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.runCycle().finally(() => {
        this.current = null;
        this.schedule(this.nextDelayMs());
      });
    }, delayMs);
  }

  async runCycle(): Promise<void> {
    try {
      const summary = await this.pollOnce();
      this.failures = INITIAL_RETRY_STATE;
      this.deps.onSummary?.(summary);
    } catch (error) {
      const next = transition(this.failures, 'transient_failure', this.deps.backoff);
      this.failures = next.status === 'failed' ? { status: 'retrying', attempt: next.attempt } : next;
      logger.error('Community poll failed', {
        communityId: this.target.id,
        consecutiveFailures: this.failures.status === 'retrying' ? this.failures.attempt : 1,
        error: describeError(error),
      });
    }
  }
}
