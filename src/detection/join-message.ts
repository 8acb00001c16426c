import { MEMBER_JOIN_MESSAGE_TYPE } from '../api/community/types.js';
import type { MessageView } from './message-view.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Short greetings and first-visit phrases typical of a member's opening message
const INTRODUCTORY_PHRASES = [
  'just joined',
  'new here',
  'first time',
  'nice to meet',
  'glad to be here',
  'happy to be here',
  'excited to join',
  'thanks for having me',
  'just got here',
  'brand new',
  'where do i start',
  'im new',
  "i'm new",
  'first day',
  'just found this',
  'hello everyone',
  'hi everyone',
  'hey everyone',
];

const SHORT_GREETINGS = /^(hi|hello|hey|hiya|sup|yo)\b[\s!.,]*(all|guys|everyone|folks|there)?[\s!.,]*$/;

export const MAX_INTRODUCTION_LENGTH = 100;

export type JoinSignal = 'system_join' | 'introduction';

export interface JoinSignalOptions {
  now: Date;
  /** Messages older than this are ignored. */
  lookbackMs: number;
  /** Authors whose accounts are older than this are not low-tenure. */
  newAccountMaxAgeMs: number;
}

export function isSystemJoinAnnouncement(message: MessageView): boolean {
  return message.type === MEMBER_JOIN_MESSAGE_TYPE;
}

export function isIntroductoryText(content: string): boolean {
  const text = content.trim().toLowerCase();
  if (text.length === 0 || text.length > MAX_INTRODUCTION_LENGTH) {
    return false;
  }
  if (SHORT_GREETINGS.test(text)) {
    return true;
  }
  return INTRODUCTORY_PHRASES.some((phrase) => text.includes(phrase));
}

export function isLowTenureAuthor(message: MessageView, now: Date, maxAgeMs: number): boolean {
  const createdAt = message.author.createdAt;
  if (!createdAt) {
    return false;
  }
  const age = now.getTime() - createdAt.getTime();
  return age >= 0 && age <= maxAgeMs;
}

export function isRecent(message: MessageView, now: Date, lookbackMs: number): boolean {
  if (!message.sentAt) {
    return false;
  }
  return now.getTime() - message.sentAt.getTime() <= lookbackMs;
}

/**
 * Classify a message as evidence that its author just joined, or null.
 * System join announcements count regardless of tenure; introductions only from new accounts.
 */
export function classifyJoinSignal(message: MessageView, options: JoinSignalOptions): JoinSignal | null {
  if (!isRecent(message, options.now, options.lookbackMs)) {
    return null;
  }
  if (isSystemJoinAnnouncement(message)) {
    return 'system_join';
  }
  if (message.author.isBot || message.author.isSystem) {
    return null;
  }
  if (
    isIntroductoryText(message.content) &&
    isLowTenureAuthor(message, options.now, options.newAccountMaxAgeMs)
  ) {
    return 'introduction';
  }
  return null;
}

export function daysToMs(days: number): number {
  return days * DAY_MS;
}
