import type { CommunityTransport } from '../api/community/types.js';
import { logger } from '../config/logger.js';
import { PermissionError, TransientRemoteError, describeError } from '../errors.js';
import type {
  CandidateStrategy,
  CommunityTarget,
  HeartbeatMarker,
  InferredCandidate,
} from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { CommunityDetectionState } from './detection-state.js';
import { PollSession, RemoteCallGate } from './remote-gate.js';
import { HeartbeatCheck } from './strategies/heartbeat.js';
import type { DetectionStrategy } from './strategies/strategy.js';

export type StrategyOutcome =
  | { strategy: CandidateStrategy; status: 'candidates'; count: number }
  | { strategy: CandidateStrategy; status: 'no_signal' }
  | { strategy: CandidateStrategy; status: 'permission_denied' | 'transient_error' | 'invalid_data'; reason: string };

export interface PollResult {
  community_id: string;
  candidates: InferredCandidate[];
  heartbeat: HeartbeatMarker | null;
  outcomes: StrategyOutcome[];
}

export interface HeuristicDetectorOptions {
  heartbeatStaleMs: number;
  clock?: Clock;
  gate?: RemoteCallGate;
}

/**
 * Runs every strategy against one community, in priority order, each isolated from
 * the others' failures. Mutates the passed state in place; the caller persists it
 * after every poll whether or not anything was found.
 */
export class HeuristicDetector {
  private readonly clock: Clock;
  private readonly heartbeat: HeartbeatCheck;
  readonly gate: RemoteCallGate;

  constructor(
    private readonly transport: CommunityTransport,
    private readonly strategies: DetectionStrategy[],
    options: HeuristicDetectorOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.gate = options.gate ?? new RemoteCallGate(this.clock);
    this.heartbeat = new HeartbeatCheck(options.heartbeatStaleMs);
  }

  async poll(target: CommunityTarget, state: CommunityDetectionState): Promise<PollResult> {
    const session = new PollSession(target.id, this.transport, this.gate);
    const emitted = new Map<CandidateStrategy, number>();
    const candidates: InferredCandidate[] = [];
    const outcomes: StrategyOutcome[] = [];

    for (const strategy of this.strategies) {
      const now = this.clock.now();
      try {
        const found = await strategy.detect({ target, state, session, now, emitted });
        emitted.set(strategy.name, found.length);
        candidates.push(...found);
        outcomes.push(
          found.length > 0
            ? { strategy: strategy.name, status: 'candidates', count: found.length }
            : { strategy: strategy.name, status: 'no_signal' }
        );
      } catch (error) {
        outcomes.push(this.describeFailure(target, strategy.name, error));
      }
    }

    const heartbeat = this.heartbeat.check(state, this.clock.now(), candidates.length > 0);
    if (heartbeat) {
      logger.info('No join signals within stale period', {
        communityId: target.id,
        silentForMs: heartbeat.silent_for_ms,
      });
    }

    return { community_id: target.id, candidates, heartbeat, outcomes };
  }

  private describeFailure(
    target: CommunityTarget,
    strategy: CandidateStrategy,
    error: unknown
  ): StrategyOutcome {
    const reason = describeError(error);
    const meta = { communityId: target.id, strategy, reason };

    if (error instanceof PermissionError) {
      logger.debug('Strategy lacks access this poll', meta);
      return { strategy, status: 'permission_denied', reason };
    }
    if (error instanceof TransientRemoteError) {
      logger.warn('Strategy remote call failed', meta);
      return { strategy, status: 'transient_error', reason };
    }
    logger.warn('Strategy failed on unexpected data', meta);
    return { strategy, status: 'invalid_data', reason };
  }
}
