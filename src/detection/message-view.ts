import type { ApiMessage } from '../api/community/types.js';
import type { SubjectSnapshot } from '../types/models.js';
import { snowflakeToDate } from '../utils/snowflake.js';

/** Platform-neutral view of a channel message, as the join predicates see it. */
export interface MessageView {
  id: string;
  type: number;
  content: string;
  sentAt: Date | null;
  author: {
    id: string;
    username: string;
    displayName: string | null;
    avatarUrl: string | null;
    createdAt: Date | null;
    isBot: boolean;
    isSystem: boolean;
  };
}

const AVATAR_CDN = 'https://cdn.discordapp.com/avatars';

export function toMessageView(message: ApiMessage): MessageView {
  const sentAt = new Date(message.timestamp);
  const { author } = message;

  return {
    id: message.id,
    type: message.type,
    content: message.content ?? '',
    sentAt: Number.isNaN(sentAt.getTime()) ? null : sentAt,
    author: {
      id: author.id,
      username: author.username,
      displayName: author.global_name ?? null,
      avatarUrl: author.avatar ? `${AVATAR_CDN}/${author.id}/${author.avatar}.png` : null,
      createdAt: snowflakeToDate(author.id),
      isBot: author.bot === true,
      isSystem: author.system === true,
    },
  };
}

export function snapshotFromAuthor(view: MessageView): SubjectSnapshot {
  const snapshot: SubjectSnapshot = {
    username: view.author.username,
    is_bot: view.author.isBot,
    is_system: view.author.isSystem,
  };
  if (view.author.displayName) snapshot.display_name = view.author.displayName;
  if (view.author.avatarUrl) snapshot.avatar_url = view.author.avatarUrl;
  if (view.author.createdAt) snapshot.account_created_at = view.author.createdAt;
  return snapshot;
}
