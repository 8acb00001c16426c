import type { InferredCandidate } from '../../types/models.js';
import {
  placeholderCandidates,
  readCount,
  type DetectionStrategy,
  type StrategyContext,
} from './strategy.js';

export const PRESENCE_COUNT_FIELD = 'approximate_presence_count';

/**
 * Online-count growth as a weak join signal. Only yields when the member count
 * said nothing this poll, since a join usually raises both.
 */
export class PresenceDeltaStrategy implements DetectionStrategy {
  readonly name = 'presence_delta' as const;

  async detect(context: StrategyContext): Promise<InferredCandidate[]> {
    const metadata = await context.session.community();
    const current = readCount(metadata.populations[PRESENCE_COUNT_FIELD]);
    if (current === null) {
      return [];
    }

    const previous = context.state.getCount(this.name, PRESENCE_COUNT_FIELD);
    context.state.set(this.name, PRESENCE_COUNT_FIELD, current, context.now);

    if (previous === null || current <= previous) {
      return [];
    }
    if ((context.emitted.get('count_delta') ?? 0) > 0) {
      return [];
    }
    return placeholderCandidates(this.name, context, PRESENCE_COUNT_FIELD, previous, current);
  }
}
