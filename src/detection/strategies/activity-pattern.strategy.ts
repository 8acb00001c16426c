import { TEXT_CHANNEL_TYPE, type ApiMessage, type ChannelSummary } from '../../api/community/types.js';
import { logger } from '../../config/logger.js';
import { PermissionError } from '../../errors.js';
import type { InferredCandidate } from '../../types/models.js';
import { compareSnowflakes } from '../../utils/snowflake.js';
import { classifyJoinSignal, type JoinSignalOptions } from '../join-message.js';
import { snapshotFromAuthor, toMessageView } from '../message-view.js';
import type { DetectionStrategy, StrategyContext } from './strategy.js';

const ONBOARDING_CHANNEL_NAMES = /welcome|general|chat|lobby|main|join|new|member|intro/i;

export interface ActivityPatternOptions {
  maxChannels: number;
  messageLimit: number;
  lookbackMs: number;
  newAccountMaxAgeMs: number;
}

/** Text channels worth scanning, onboarding-looking names first. */
export function selectChannels(channels: ChannelSummary[], maxChannels: number): ChannelSummary[] {
  const text = channels.filter((channel) => channel.type === TEXT_CHANNEL_TYPE);
  const preferred = text.filter((channel) => ONBOARDING_CHANNEL_NAMES.test(channel.name));
  const rest = text.filter((channel) => !ONBOARDING_CHANNEL_NAMES.test(channel.name));
  return [...preferred, ...rest].slice(0, maxChannels);
}

function cursorField(channelId: string): string {
  return `last_message_id:${channelId}`;
}

/**
 * Scans recent messages for system join announcements and introductions from new
 * accounts. Each channel keeps a cursor so a message is judged once per completed scan.
 */
export class ActivityPatternStrategy implements DetectionStrategy {
  readonly name = 'activity_pattern' as const;

  constructor(private readonly options: ActivityPatternOptions) {}

  async detect(context: StrategyContext): Promise<InferredCandidate[]> {
    const channels = selectChannels(await context.session.channels(), this.options.maxChannels);
    const signalOptions: JoinSignalOptions = {
      now: context.now,
      lookbackMs: this.options.lookbackMs,
      newAccountMaxAgeMs: this.options.newAccountMaxAgeMs,
    };

    const byAuthor = new Map<string, InferredCandidate>();
    // Cursors move only when every channel was read, so a failed scan is judged again next poll
    const cursors = new Map<string, string>();

    for (const channel of channels) {
      let messages: ApiMessage[];
      try {
        messages = await context.session.recentMessages(channel.id, this.options.messageLimit);
      } catch (error) {
        if (error instanceof PermissionError) {
          logger.debug('Channel not readable, skipping', {
            communityId: context.target.id,
            channelId: channel.id,
            status: error.status,
          });
          continue;
        }
        throw error;
      }

      const cursor = context.state.get(this.name, cursorField(channel.id));
      const views = messages
        .map(toMessageView)
        .sort((a, b) => compareSnowflakes(a.id, b.id));

      for (const view of views) {
        if (cursor !== undefined && compareSnowflakes(view.id, cursor) <= 0) {
          continue;
        }
        const signal = classifyJoinSignal(view, signalOptions);
        if (!signal || byAuthor.has(view.author.id)) {
          continue;
        }
        logger.debug('Join signal in channel', {
          communityId: context.target.id,
          channelId: channel.id,
          authorId: view.author.id,
          signal,
        });
        byAuthor.set(view.author.id, {
          subject_id: view.author.id,
          community_id: context.target.id,
          community_name: context.target.display_name,
          observed_at: view.sentAt ?? context.now,
          confidence: 'inferred',
          source: `heuristic:${this.name}`,
          subject: snapshotFromAuthor(view),
        });
      }

      const newest = views[views.length - 1];
      if (newest) {
        cursors.set(channel.id, newest.id);
      }
    }

    for (const [channelId, newestId] of cursors) {
      context.state.set(this.name, cursorField(channelId), newestId, context.now);
    }
    return [...byAuthor.values()];
  }
}
