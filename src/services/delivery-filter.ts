import { DataValidityError } from '../errors.js';
import type { JoinRecord } from '../types/models.js';
import { isSnowflake, snowflakeToDate } from '../utils/snowflake.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DeliveryFilterOptions {
  ignoreBots: boolean;
  /** 0 disables the age filter. */
  minAccountAgeDays: number;
}

export interface DeliverableSubject {
  id: string;
  username: string;
  displayName: string | null;
  avatarUrl: string | null;
  accountCreatedAt: Date;
  isBot: boolean;
}

/**
 * Throws DataValidityError for records that should be marked filtered instead of
 * sent: placeholder identities, missing username or unknown account age, and
 * accounts excluded by the configured filters.
 */
export function assertDeliverable(
  record: JoinRecord,
  options: DeliveryFilterOptions,
  now: Date
): DeliverableSubject {
  const { subject } = record;

  if (subject.synthetic === true || !isSnowflake(record.subject_id)) {
    throw new DataValidityError('placeholder identity');
  }
  const username = subject.username?.trim();
  if (!username) {
    throw new DataValidityError('missing username');
  }
  const accountCreatedAt = subject.account_created_at ?? snowflakeToDate(record.subject_id);
  if (!accountCreatedAt) {
    throw new DataValidityError('unknown account age');
  }
  if (subject.is_system === true) {
    throw new DataValidityError('system account');
  }
  const isBot = subject.is_bot === true;
  if (isBot && options.ignoreBots) {
    throw new DataValidityError('bot account');
  }
  if (options.minAccountAgeDays > 0) {
    const ageDays = (now.getTime() - accountCreatedAt.getTime()) / DAY_MS;
    if (ageDays < options.minAccountAgeDays) {
      throw new DataValidityError(`account younger than ${options.minAccountAgeDays} days`);
    }
  }

  return {
    id: record.subject_id,
    username,
    displayName: subject.display_name ?? null,
    avatarUrl: subject.avatar_url ?? null,
    accountCreatedAt,
    isBot,
  };
}
