import type {
  ApiMessage,
  ChannelSummary,
  CommunityMetadata,
  CommunityTransport,
  TransportResult,
} from '../api/community/types.js';
import { logger } from '../config/logger.js';
import { PermissionError, TransientRemoteError } from '../errors.js';
import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Backoff shared by every detector remote call. A rate-limit response pauses the
 * detector path only; dispatch has its own budget and is never held up here.
 */
export class RemoteCallGate {
  private pausedUntil = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  pause(ms: number): void {
    const until = this.clock.now().getTime() + ms;
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
      logger.warn('Detector remote calls paused', { pauseMs: ms });
    }
  }

  remainingMs(): number {
    return Math.max(0, this.pausedUntil - this.clock.now().getTime());
  }

  async wait(): Promise<void> {
    const remaining = this.remainingMs();
    if (remaining > 0) {
      await this.clock.sleep(remaining);
    }
  }
}

/**
 * Remote reads for one community during one poll. Metadata is fetched at most once
 * and shared between the strategies that need it.
 */
export class PollSession {
  private metadata: Promise<CommunityMetadata> | null = null;

  constructor(
    readonly communityId: string,
    private readonly transport: CommunityTransport,
    private readonly gate: RemoteCallGate
  ) {}

  community(): Promise<CommunityMetadata> {
    if (!this.metadata) {
      this.metadata = this.call(`community ${this.communityId}`, () =>
        this.transport.getCommunity(this.communityId)
      );
    }
    return this.metadata;
  }

  channels(): Promise<ChannelSummary[]> {
    return this.call(`channels of ${this.communityId}`, () =>
      this.transport.listChannels(this.communityId)
    );
  }

  recentMessages(channelId: string, limit: number): Promise<ApiMessage[]> {
    return this.call(`messages of channel ${channelId}`, () =>
      this.transport.getRecentMessages(channelId, limit)
    );
  }

  private async call<T>(what: string, request: () => Promise<TransportResult<T>>): Promise<T> {
    await this.gate.wait();
    const result = await request();

    switch (result.status) {
      case 'ok':
        return result.data;
      case 'forbidden':
      case 'not_found':
        throw new PermissionError(`${result.status} reading ${what}`, result.status);
      case 'rate_limited':
        this.gate.pause(result.retryAfterMs);
        throw new TransientRemoteError(`Rate limited reading ${what}`, result.retryAfterMs);
      case 'transient_error':
        throw new TransientRemoteError(`${result.message} reading ${what}`);
    }
  }
}
