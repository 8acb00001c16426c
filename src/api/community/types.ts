/**
 * Contract consumed from the community platform. Every remote outcome is a value,
 * so callers can tell forbidden, not-found and rate-limited apart without catching.
 */
export type TransportResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'not_found' }
  | { status: 'forbidden' }
  | { status: 'rate_limited'; retryAfterMs: number }
  | { status: 'transient_error'; message: string };

export type TransportFailure = Exclude<TransportResult<never>, { status: 'ok' }>;

export interface CommunitySummary {
  id: string;
  name: string;
}

export interface CommunityMetadata {
  id: string;
  name: string;
  /** Raw top-level fields of the community payload; population counts are looked up here by name. */
  populations: Record<string, unknown>;
}

export interface ChannelSummary {
  id: string;
  name: string;
  type: number;
}

export interface ApiUser {
  id: string;
  username: string;
  global_name?: string | null;
  avatar?: string | null;
  bot?: boolean;
  system?: boolean;
}

export interface ApiMessage {
  id: string;
  type: number;
  content: string;
  timestamp: string;
  author: ApiUser;
}

export interface SentMessage {
  id: string;
  channel_id: string;
}

export interface CommunityTransport {
  listCommunities(): Promise<TransportResult<CommunitySummary[]>>;
  getCommunity(communityId: string): Promise<TransportResult<CommunityMetadata>>;
  listChannels(communityId: string): Promise<TransportResult<ChannelSummary[]>>;
  getRecentMessages(channelId: string, limit: number): Promise<TransportResult<ApiMessage[]>>;
  sendDirectMessage(recipientId: string, content: string): Promise<TransportResult<SentMessage>>;
}

export const TEXT_CHANNEL_TYPE = 0;
/** System message emitted by the platform when a member joins. */
export const MEMBER_JOIN_MESSAGE_TYPE = 7;
