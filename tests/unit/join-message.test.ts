import {
  classifyJoinSignal,
  daysToMs,
  isIntroductoryText,
  type JoinSignalOptions,
} from '../../src/detection/join-message';
import type { MessageView } from '../../src/detection/message-view';

const now = new Date('2026-03-01T12:00:00.000Z');
const options: JoinSignalOptions = {
  now,
  lookbackMs: 10 * 60 * 1000,
  newAccountMaxAgeMs: daysToMs(7),
};

function view(overrides: {
  type?: number;
  content?: string;
  secondsAgo?: number;
  accountAgeDays?: number | null;
  isBot?: boolean;
}): MessageView {
  const accountAgeDays = overrides.accountAgeDays === undefined ? 2 : overrides.accountAgeDays;
  return {
    id: '1',
    type: overrides.type ?? 0,
    content: overrides.content ?? '',
    sentAt: new Date(now.getTime() - (overrides.secondsAgo ?? 60) * 1000),
    author: {
      id: '2',
      username: 'newcomer',
      displayName: null,
      avatarUrl: null,
      createdAt: accountAgeDays === null ? null : new Date(now.getTime() - daysToMs(accountAgeDays)),
      isBot: overrides.isBot ?? false,
      isSystem: false,
    },
  };
}

describe('join message classification', () => {
  describe('isIntroductoryText', () => {
    it('should accept short greetings', () => {
      expect(isIntroductoryText('hey')).toBe(true);
      expect(isIntroductoryText('Hello there!')).toBe(true);
      expect(isIntroductoryText('hi everyone')).toBe(true);
    });

    it('should accept first-visit phrases', () => {
      expect(isIntroductoryText('Just joined, excited to be here')).toBe(true);
      expect(isIntroductoryText("I'm new, where do I start?")).toBe(true);
    });

    it('should reject ordinary conversation', () => {
      expect(isIntroductoryText('Can someone help me configure the webhook')).toBe(false);
      expect(isIntroductoryText('yo dawg')).toBe(false);
      expect(isIntroductoryText('')).toBe(false);
    });

    it('should reject long messages even with an introductory phrase', () => {
      expect(isIntroductoryText(`new here ${'x'.repeat(100)}`)).toBe(false);
    });
  });

  describe('classifyJoinSignal', () => {
    it('should report system join announcements regardless of tenure', () => {
      expect(classifyJoinSignal(view({ type: 7, accountAgeDays: 400 }), options)).toBe('system_join');
    });

    it('should ignore messages outside the lookback', () => {
      expect(classifyJoinSignal(view({ type: 7, secondsAgo: 20 * 60 }), options)).toBeNull();
    });

    it('should report introductions from new accounts', () => {
      expect(classifyJoinSignal(view({ content: 'hi everyone!' }), options)).toBe('introduction');
    });

    it('should not report introductions from established accounts', () => {
      expect(classifyJoinSignal(view({ content: 'hi everyone!', accountAgeDays: 400 }), options)).toBeNull();
    });

    it('should not report introductions when account age is unknown', () => {
      expect(classifyJoinSignal(view({ content: 'hi everyone!', accountAgeDays: null }), options)).toBeNull();
    });

    it('should not report bots', () => {
      expect(classifyJoinSignal(view({ content: 'hello', isBot: true }), options)).toBeNull();
    });
  });
});
