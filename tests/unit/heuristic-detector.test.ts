import { CommunityDetectionState } from '../../src/detection/detection-state';
import { HeuristicDetector } from '../../src/detection/heuristic-detector';
import { daysToMs } from '../../src/detection/join-message';
import { ActivityPatternStrategy } from '../../src/detection/strategies/activity-pattern.strategy';
import { CountDeltaStrategy } from '../../src/detection/strategies/count-delta.strategy';
import { PresenceDeltaStrategy } from '../../src/detection/strategies/presence-delta.strategy';
import { FakeTransport, ok } from '../helpers/fake-transport';
import { message, snowflakeAt, target } from '../helpers/fixtures';
import { ManualClock } from '../helpers/manual-clock';

const COMMUNITY = '400000000000000001';
const STALE_MS = 5 * 60 * 1000;

describe('HeuristicDetector', () => {
  let transport: FakeTransport;
  let clock: ManualClock;
  let detector: HeuristicDetector;
  let state: CommunityDetectionState;

  beforeEach(() => {
    transport = new FakeTransport();
    clock = new ManualClock();
    state = new CommunityDetectionState(COMMUNITY);
    detector = new HeuristicDetector(
      transport,
      [
        new CountDeltaStrategy(),
        new ActivityPatternStrategy({
          maxChannels: 3,
          messageLimit: 50,
          lookbackMs: 10 * 60 * 1000,
          newAccountMaxAgeMs: daysToMs(7),
        }),
        new PresenceDeltaStrategy(),
      ],
      { heartbeatStaleMs: STALE_MS, clock }
    );
  });

  it('should keep other strategies running when one lacks access', async () => {
    const now = clock.now();
    const joiner = { id: snowflakeAt(new Date(now.getTime() - 1000)), username: 'joiner' };
    transport.getCommunity.mockResolvedValue({ status: 'forbidden' });
    transport.listChannels.mockResolvedValue(ok([{ id: '500000000000000002', name: 'welcome', type: 0 }]));
    transport.getRecentMessages.mockResolvedValue(
      ok([message(snowflakeAt(now), now, joiner, '', 7)])
    );

    const result = await detector.poll(target(COMMUNITY), state);

    expect(result.candidates.map((c) => c.subject_id)).toEqual([joiner.id]);
    expect(result.outcomes.map((o) => [o.strategy, o.status])).toEqual([
      ['count_delta', 'permission_denied'],
      ['activity_pattern', 'candidates'],
      ['presence_delta', 'permission_denied'],
    ]);
    expect(transport.getCommunity).toHaveBeenCalledTimes(1);
  });

  it('should pause detector calls after a rate-limit response', async () => {
    transport.getCommunity.mockResolvedValue({ status: 'rate_limited', retryAfterMs: 5000 });

    const result = await detector.poll(target(COMMUNITY), state);

    expect(result.outcomes[0]).toEqual({
      strategy: 'count_delta',
      status: 'transient_error',
      reason: `Rate limited reading community ${COMMUNITY}`,
    });
    // The channel listing waited out the pause before calling
    expect(clock.sleeps).toEqual([5000]);
    expect(detector.gate.remainingMs()).toBe(0);
  });

  it('should yield candidates from a member count increase on the next poll', async () => {
    transport.setPopulations({ approximate_member_count: 10, approximate_presence_count: 4 });
    await detector.poll(target(COMMUNITY), state);

    transport.setPopulations({ approximate_member_count: 11, approximate_presence_count: 5 });
    const result = await detector.poll(target(COMMUNITY), state);

    expect(result.candidates.map((c) => c.source)).toEqual(['heuristic:count_delta']);
    expect(result.outcomes.map((o) => o.status)).toEqual(['candidates', 'no_signal', 'no_signal']);
  });

  it('should update state on every poll even without candidates', async () => {
    transport.setPopulations({ approximate_member_count: 10 });

    const result = await detector.poll(target(COMMUNITY), state);

    expect(result.candidates).toEqual([]);
    expect(state.getCount('count_delta', 'approximate_member_count')).toBe(10);
    expect(state.getCount('heartbeat', 'last_signal_at')).toBe(clock.now().getTime());
  });

  it('should emit a heartbeat marker after the stale period without signals', async () => {
    const first = await detector.poll(target(COMMUNITY), state);
    expect(first.heartbeat).toBeNull();

    clock.advance(STALE_MS + 1000);
    const second = await detector.poll(target(COMMUNITY), state);
    expect(second.heartbeat).toEqual({
      community_id: COMMUNITY,
      emitted_at: clock.now(),
      silent_for_ms: STALE_MS + 1000,
    });
    expect(second.candidates).toEqual([]);

    const third = await detector.poll(target(COMMUNITY), state);
    expect(third.heartbeat).toBeNull();
  });
});
