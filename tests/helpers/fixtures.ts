import type { ApiMessage } from '../../src/api/community/types';
import type { CommunityTarget, ConfirmedCandidate, InferredCandidate } from '../../src/types/models';

const PLATFORM_EPOCH_MS = 1420070400000n;
export const DAY_MS = 24 * 60 * 60 * 1000;

/** Platform ID whose embedded creation time is `at`; `sequence` keeps IDs from one instant apart. */
export function snowflakeAt(at: Date, sequence = 0): string {
  return (((BigInt(at.getTime()) - PLATFORM_EPOCH_MS) << 22n) + BigInt(sequence)).toString();
}

export function target(id = '400000000000000001', overrides: Partial<CommunityTarget> = {}): CommunityTarget {
  return {
    id,
    display_name: 'Test Community',
    monitoring_mode: 'heuristic',
    excluded: false,
    created_at: new Date('2026-01-01T00:00:00.000Z'),
    updated_at: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function confirmedCandidate(
  subjectId: string,
  observedAt: Date,
  overrides: Partial<ConfirmedCandidate> = {}
): ConfirmedCandidate {
  return {
    subject_id: subjectId,
    community_id: '400000000000000001',
    community_name: 'Test Community',
    observed_at: observedAt,
    confidence: 'confirmed',
    source: 'event_stream',
    subject: { username: 'alice' },
    ...overrides,
  };
}

export function inferredCandidate(
  subjectId: string,
  observedAt: Date,
  overrides: Partial<InferredCandidate> = {}
): InferredCandidate {
  return {
    subject_id: subjectId,
    community_id: '400000000000000001',
    community_name: 'Test Community',
    observed_at: observedAt,
    confidence: 'inferred',
    source: 'heuristic:activity_pattern',
    subject: { username: 'alice' },
    ...overrides,
  };
}

export function message(
  id: string,
  sentAt: Date,
  author: { id: string; username: string; bot?: boolean },
  content: string,
  type = 0
): ApiMessage {
  return {
    id,
    type,
    content,
    timestamp: sentAt.toISOString(),
    author: { id: author.id, username: author.username, bot: author.bot },
  };
}
