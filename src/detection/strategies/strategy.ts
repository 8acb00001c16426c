import type { CandidateStrategy, CommunityTarget, InferredCandidate } from '../../types/models.js';
import type { CommunityDetectionState } from '../detection-state.js';
import type { PollSession } from '../remote-gate.js';

export interface StrategyContext {
  target: CommunityTarget;
  state: CommunityDetectionState;
  session: PollSession;
  now: Date;
  /** Candidates yielded so far this poll, by strategy. */
  emitted: ReadonlyMap<CandidateStrategy, number>;
}

/**
 * One independent join signal. Implementations throw PermissionError or
 * TransientRemoteError on remote failure; the detector turns either into "no signal".
 */
export interface DetectionStrategy {
  readonly name: CandidateStrategy;
  detect(context: StrategyContext): Promise<InferredCandidate[]>;
}

export function placeholderSubjectId(
  strategy: CandidateStrategy,
  communityId: string,
  field: string,
  ordinal: number
): string {
  return `synthetic:${strategy}:${communityId}:${field}:${ordinal}`;
}

/** Population counts arrive as numbers, occasionally as numeric strings. */
export function readCount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  return null;
}

/**
 * One placeholder candidate per unit of growth, numbered by the population they bring it to.
 */
export function placeholderCandidates(
  strategy: CandidateStrategy,
  context: StrategyContext,
  field: string,
  previous: number,
  current: number
): InferredCandidate[] {
  const candidates: InferredCandidate[] = [];
  for (let ordinal = previous + 1; ordinal <= current; ordinal++) {
    candidates.push({
      subject_id: placeholderSubjectId(strategy, context.target.id, field, ordinal),
      community_id: context.target.id,
      community_name: context.target.display_name,
      observed_at: context.now,
      confidence: 'inferred',
      source: `heuristic:${strategy}`,
      subject: { synthetic: true },
    });
  }
  return candidates;
}
