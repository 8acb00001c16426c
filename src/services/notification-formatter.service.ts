import type { JoinRecord } from '../types/models.js';
import type { DeliverableSubject } from './delivery-filter.js';

export type MessageFormat = 'basic' | 'detailed';

export const MAX_MESSAGE_LENGTH = 2000;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AccountAge {
  totalDays: number;
  years: number;
  months: number;
  days: number;
  formatted: string;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/** Age in whole days, split on 365-day years and 30-day months. */
export function calculateAccountAge(createdAt: Date, now: Date): AccountAge {
  const totalDays = Math.max(0, Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS));
  const years = Math.floor(totalDays / 365);
  const months = Math.floor((totalDays % 365) / 30);
  const days = (totalDays % 365) % 30;

  const parts: string[] = [];
  if (years > 0) parts.push(plural(years, 'year'));
  if (months > 0) parts.push(plural(months, 'month'));
  if (days > 0 || parts.length === 0) parts.push(plural(days, 'day'));

  let formatted: string;
  if (parts.length === 1) {
    formatted = parts[0] ?? '';
  } else if (parts.length === 2) {
    formatted = `${parts[0]} and ${parts[1]}`;
  } else {
    formatted = `${parts.slice(0, -1).join(', ')}, and ${parts[parts.length - 1]}`;
  }

  return { totalDays, years, months, days, formatted };
}

/** YYYY-MM-DD HH:MM UTC */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function truncate(message: string, max: number = MAX_MESSAGE_LENGTH): string {
  return message.length <= max ? message : `${message.slice(0, max - 3)}...`;
}

function sourceLabel(record: JoinRecord): string {
  return record.source === 'event_stream' ? 'Event Stream' : 'Heuristic';
}

export class NotificationFormatter {
  constructor(private readonly format: MessageFormat) {}

  formatJoin(record: JoinRecord, subject: DeliverableSubject, now: Date): string {
    const message =
      this.format === 'detailed'
        ? this.detailed(record, subject, now)
        : this.basic(record, subject, now);
    return truncate(message);
  }

  formatDeliveryFailure(record: JoinRecord, reason: string): string {
    const who = record.subject.username ?? record.subject_id;
    const where = record.community_name ?? record.community_id;
    return truncate(
      `Could not deliver join notification for ${who} in ${where} after ${record.attempt_count} attempts: ${reason}`
    );
  }

  private basic(record: JoinRecord, subject: DeliverableSubject, now: Date): string {
    const age = calculateAccountAge(subject.accountCreatedAt, now);
    const server = record.community_name ?? record.community_id;
    return `user ${subject.username} with account age ${age.formatted} has joined the server ${server}`;
  }

  private detailed(record: JoinRecord, subject: DeliverableSubject, now: Date): string {
    const age = calculateAccountAge(subject.accountCreatedAt, now);
    const lines = [
      `**New Member Joined** (${sourceLabel(record)})`,
      '',
      `**Server:** ${record.community_name ?? 'Unknown Server'} (ID: ${record.community_id})`,
      '',
      `**Username:** ${subject.username}`,
    ];

    if (subject.displayName && subject.displayName !== subject.username) {
      lines.push(`**Display Name:** ${subject.displayName}`);
    }
    lines.push(`**User ID:** ${subject.id}`);
    lines.push(`**Account Age:** ${age.formatted}`);
    lines.push(`**Created:** ${formatUtc(subject.accountCreatedAt)}`);
    lines.push(`**Joined Server:** ${formatUtc(record.observed_at)}`);
    if (record.confidence === 'inferred') {
      lines.push('**Confidence:** inferred');
    }
    if (subject.isBot) {
      lines.push('', 'Bot account');
    }
    if (subject.avatarUrl) {
      lines.push('', subject.avatarUrl);
    }

    return lines.join('\n');
  }
}
