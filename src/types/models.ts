// Domain model types

export type MonitoringMode = 'event_stream' | 'heuristic' | 'both';

export interface CommunityTarget {
  id: string;
  display_name: string;
  monitoring_mode: MonitoringMode;
  excluded: boolean;
  created_at: Date;
  updated_at: Date;
}

export function includesHeuristic(mode: MonitoringMode): boolean {
  return mode === 'heuristic' || mode === 'both';
}

export type StrategyName = 'count_delta' | 'activity_pattern' | 'presence_delta' | 'heartbeat';

/** Strategies that can yield join candidates; heartbeat only proves liveness. */
export type CandidateStrategy = Exclude<StrategyName, 'heartbeat'>;

export type CandidateSource = 'event_stream' | `heuristic:${CandidateStrategy}`;

export type Confidence = 'confirmed' | 'inferred';

/**
 * Best-effort identity of the joining member. Every field may be absent for
 * inferred candidates; `synthetic` marks placeholder identities with no real account behind them.
 */
export interface SubjectSnapshot {
  username?: string;
  display_name?: string;
  account_created_at?: Date;
  avatar_url?: string;
  is_bot?: boolean;
  is_system?: boolean;
  synthetic?: boolean;
}

interface CandidateBase {
  subject_id: string;
  community_id: string;
  community_name?: string;
  observed_at: Date;
}

export interface ConfirmedCandidate extends CandidateBase {
  confidence: 'confirmed';
  source: 'event_stream';
  subject: SubjectSnapshot & { username: string };
}

export interface InferredCandidate extends CandidateBase {
  confidence: 'inferred';
  source: `heuristic:${CandidateStrategy}`;
  subject: SubjectSnapshot;
}

export type JoinCandidate = ConfirmedCandidate | InferredCandidate;

export type DeliveryStatus = 'pending' | 'retrying' | 'sent' | 'filtered' | 'failed';

export interface JoinRecord {
  id: string;
  subject_id: string;
  community_id: string;
  community_name: string | null;
  observed_at: Date;
  source: CandidateSource;
  confidence: Confidence;
  subject: SubjectSnapshot;
  notified: boolean;
  delivery_status: DeliveryStatus;
  attempt_count: number;
  next_attempt_at: Date | null;
  last_error: string | null;
  created_at: Date;
}

export interface NotificationMarker {
  subject_id: string;
  community_id: string;
  sent_at: Date;
  /** Null once the record it was written for has been purged. */
  join_record_id: string | null;
}

export type DeliveryOutcome = 'sent' | 'filtered' | 'failed';

/** Liveness proof for a community's poll loop; never a join event. */
export interface HeartbeatMarker {
  community_id: string;
  emitted_at: Date;
  silent_for_ms: number;
}
