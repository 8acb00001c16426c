import { logger } from '../../config/logger.js';
import type { InferredCandidate } from '../../types/models.js';
import {
  placeholderCandidates,
  readCount,
  type DetectionStrategy,
  type StrategyContext,
} from './strategy.js';

/** Checked in order; the first field that grew yields the candidates. */
export const MEMBER_COUNT_FIELDS = ['approximate_member_count', 'member_count', 'members'] as const;

/**
 * Compares population counts against the stored baseline. A missing or corrupt
 * baseline is re-seeded from the current value and yields nothing.
 */
export class CountDeltaStrategy implements DetectionStrategy {
  readonly name = 'count_delta' as const;

  async detect(context: StrategyContext): Promise<InferredCandidate[]> {
    const metadata = await context.session.community();
    let candidates: InferredCandidate[] = [];

    for (const field of MEMBER_COUNT_FIELDS) {
      const current = readCount(metadata.populations[field]);
      if (current === null) {
        continue;
      }

      const previous = context.state.getCount(this.name, field);
      context.state.set(this.name, field, current, context.now);

      if (previous === null) {
        logger.debug('Count baseline seeded', { communityId: context.target.id, field, current });
        continue;
      }

      if (current > previous && candidates.length === 0) {
        candidates = placeholderCandidates(this.name, context, field, previous, current);
        logger.info('Member count increased', {
          communityId: context.target.id,
          field,
          previous,
          current,
        });
      }
    }

    return candidates;
  }
}
