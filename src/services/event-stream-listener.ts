import { logger } from '../config/logger.js';
import type { ConfirmedCandidate, SubjectSnapshot } from '../types/models.js';

export interface JoinedMember extends SubjectSnapshot {
  id: string;
  username: string;
}

/**
 * Turns authoritative member-join events into confirmed candidates. No retry or
 * backoff lives here: the stream either delivered the event or it did not.
 */
export class EventStreamListener {
  onMemberJoined(
    communityId: string,
    member: JoinedMember,
    observedAt: Date,
    communityName?: string
  ): ConfirmedCandidate {
    const { id, ...subject } = member;
    const candidate: ConfirmedCandidate = {
      subject_id: id,
      community_id: communityId,
      observed_at: observedAt,
      confidence: 'confirmed',
      source: 'event_stream',
      subject,
    };
    if (communityName !== undefined) {
      candidate.community_name = communityName;
    }
    logger.debug('Member joined', { communityId, subjectId: id });
    return candidate;
  }
}

/**
 * Communities whose join events currently reach us. Written by the gateway
 * binding, read when choosing each community's monitoring mode.
 */
export class EventStreamAccess {
  private readonly communities = new Set<string>();

  grant(communityId: string): void {
    this.communities.add(communityId);
  }

  revoke(communityId: string): void {
    this.communities.delete(communityId);
  }

  has(communityId: string): boolean {
    return this.communities.has(communityId);
  }

  get size(): number {
    return this.communities.size;
  }
}
