import type { HeartbeatMarker } from '../../types/models.js';
import type { CommunityDetectionState } from '../detection-state.js';

const LAST_SIGNAL_FIELD = 'last_signal_at';

/**
 * Emits a liveness marker when no strategy produced a candidate for longer than
 * the stale period. The marker is never a join.
 */
export class HeartbeatCheck {
  constructor(private readonly staleMs: number) {}

  check(state: CommunityDetectionState, now: Date, producedCandidates: boolean): HeartbeatMarker | null {
    const last = state.getCount('heartbeat', LAST_SIGNAL_FIELD);

    if (producedCandidates || last === null) {
      state.set('heartbeat', LAST_SIGNAL_FIELD, now.getTime(), now);
      return null;
    }

    const silentFor = now.getTime() - last;
    if (silentFor < this.staleMs) {
      return null;
    }

    state.set('heartbeat', LAST_SIGNAL_FIELD, now.getTime(), now);
    return { community_id: state.communityId, emitted_at: now, silent_for_ms: silentFor };
  }
}
