import type { ErrorChannel } from '../../src/services/error-channel.service';
import { NotificationDispatcher } from '../../src/services/notification-dispatcher.service';
import { NotificationFormatter } from '../../src/services/notification-formatter.service';
import { TokenBucket } from '../../src/services/token-bucket';
import type { JoinRecord } from '../../src/types/models';
import { FakeTransport } from '../helpers/fake-transport';
import { DAY_MS, confirmedCandidate, inferredCandidate, snowflakeAt } from '../helpers/fixtures';
import { InMemoryJoinStore } from '../helpers/in-memory-join-store';
import { ManualClock } from '../helpers/manual-clock';

const TARGET = '900000000000000001';
const WINDOW_MS = 24 * 60 * 60 * 1000;

async function flush(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

describe('NotificationDispatcher', () => {
  let clock: ManualClock;
  let store: InMemoryJoinStore;
  let transport: FakeTransport;
  let bucket: TokenBucket;
  let errorChannel: { reportDeliveryFailure: jest.Mock<Promise<void>, [JoinRecord, string]> };
  let dispatcher: NotificationDispatcher;
  let subjectId: string;

  function createDispatcher(): NotificationDispatcher {
    const channel: ErrorChannel = errorChannel;
    return new NotificationDispatcher(store, transport, bucket, new NotificationFormatter('basic'), channel, {
      targetId: TARGET,
      windowMs: WINDOW_MS,
      retryPolicy: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitterFactor: 0 },
      tokenDeadlineMs: 500,
      filters: { ignoreBots: true, minAccountAgeDays: 0 },
      sweepIntervalMs: 60000,
      clock,
    });
  }

  beforeEach(() => {
    clock = new ManualClock();
    store = new InMemoryJoinStore(() => clock.now());
    transport = new FakeTransport();
    bucket = new TokenBucket({ capacity: 10, refillAmount: 1, refillIntervalMs: 1000, clock });
    errorChannel = { reportDeliveryFailure: jest.fn<Promise<void>, [JoinRecord, string]>(async () => undefined) };
    dispatcher = createDispatcher();
    subjectId = snowflakeAt(new Date(clock.now().getTime() - 100 * DAY_MS));
  });

  it('should send once and write one marker stamped at the successful attempt', async () => {
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    transport.failSends(
      { status: 'transient_error', message: 'HTTP 502' },
      { status: 'rate_limited', retryAfterMs: 2000 }
    );

    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('failed');
    expect(store.record(id)).toMatchObject({
      delivery_status: 'retrying',
      attempt_count: 1,
      next_attempt_at: new Date(clock.now().getTime() + 1000),
      last_error: 'HTTP 502',
    });

    clock.advance(1000);
    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('failed');
    expect(store.record(id)).toMatchObject({ delivery_status: 'retrying', attempt_count: 2 });

    clock.advance(2000);
    const successAt = clock.now();
    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('sent');

    expect(store.markers).toEqual([
      { subject_id: subjectId, community_id: '400000000000000001', sent_at: successAt, join_record_id: id },
    ]);
    expect(store.record(id)).toMatchObject({ delivery_status: 'sent', notified: true });
    expect(transport.sent).toEqual([
      {
        recipientId: TARGET,
        content: 'user alice with account age 3 months and 10 days has joined the server Test Community',
      },
    ]);
    expect(errorChannel.reportDeliveryFailure).not.toHaveBeenCalled();
  });

  it('should mark the record failed and report it once attempts run out', async () => {
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    const failure = { status: 'transient_error' as const, message: 'HTTP 502' };
    transport.failSends(failure, failure, failure);

    for (let attempt = 0; attempt < 3; attempt++) {
      await dispatcher.dispatch(store.record(id));
      clock.advance(60000);
    }

    expect(store.record(id)).toMatchObject({
      delivery_status: 'failed',
      attempt_count: 3,
      next_attempt_at: null,
      notified: false,
    });
    expect(store.markers).toHaveLength(0);
    expect(errorChannel.reportDeliveryFailure).toHaveBeenCalledTimes(1);
    const [reported, reason] = errorChannel.reportDeliveryFailure.mock.calls[0] ?? [];
    expect(reported?.attempt_count).toBe(3);
    expect(reason).toBe('HTTP 502');
  });

  it('should filter placeholder identities without sending', async () => {
    const { id } = store.addRecord(
      inferredCandidate(`synthetic:count_delta:400000000000000001:members:11`, clock.now(), {
        source: 'heuristic:count_delta',
        subject: { synthetic: true },
      })
    );

    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('filtered');

    expect(store.record(id)).toMatchObject({ delivery_status: 'filtered', last_error: 'placeholder identity' });
    expect(transport.sendDirectMessage).not.toHaveBeenCalled();
  });

  it('should filter a record whose pair was notified within the window', async () => {
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    store.markers.push({
      subject_id: subjectId,
      community_id: '400000000000000001',
      sent_at: new Date(clock.now().getTime() - 1000),
      join_record_id: null,
    });

    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('filtered');
    expect(transport.sendDirectMessage).not.toHaveBeenCalled();
  });

  it('should retry only the marker write when it fails after a send', async () => {
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    store.failNext('insertMarker');
    const sentAt = clock.now();

    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('sent');
    expect(store.markers).toHaveLength(0);
    expect(store.record(id).delivery_status).toBe('pending');
    expect(dispatcher.getStats().pendingMarks).toBe(1);

    clock.advance(5000);
    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('sent');

    expect(transport.sendDirectMessage).toHaveBeenCalledTimes(1);
    expect(store.markers).toEqual([
      { subject_id: subjectId, community_id: '400000000000000001', sent_at: sentAt, join_record_id: id },
    ]);
    expect(dispatcher.getStats().pendingMarks).toBe(0);
  });

  it('should count an elapsed rate budget deadline as a failed attempt', async () => {
    bucket = new TokenBucket({ capacity: 1, refillAmount: 1, refillIntervalMs: 1000, clock });
    bucket.tryAcquire();
    dispatcher = createDispatcher();
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));

    await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('failed');

    expect(store.record(id)).toMatchObject({
      delivery_status: 'retrying',
      attempt_count: 1,
      last_error: 'rate budget deadline elapsed',
    });
    expect(transport.sendDirectMessage).not.toHaveBeenCalled();
  });

  it('should recover undelivered records after a restart, in admission order', async () => {
    const bob = snowflakeAt(new Date(clock.now().getTime() - 50 * DAY_MS));
    const first = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    const second = store.addRecord(confirmedCandidate(bob, clock.now(), { subject: { username: 'bob' } }));
    const notDue = store.addRecord(confirmedCandidate(snowflakeAt(clock.now()), clock.now()));
    await store.updateDelivery(notDue.id, {
      delivery_status: 'retrying',
      attempt_count: 1,
      next_attempt_at: new Date(clock.now().getTime() + 60000),
      last_error: 'HTTP 502',
    });

    const restarted = createDispatcher();
    await expect(restarted.recover()).resolves.toBe(2);

    await expect(restarted.processNext()).resolves.toBe('sent');
    await expect(restarted.processNext()).resolves.toBe('sent');
    await expect(restarted.processNext()).resolves.toBeNull();

    expect(transport.sent.map((m) => m.content.split(' ')[1])).toEqual(['alice', 'bob']);
    expect(store.record(first.id).delivery_status).toBe('sent');
    expect(store.record(second.id).delivery_status).toBe('sent');
    expect(store.record(notDue.id).delivery_status).toBe('retrying');
  });

  it('should deliver enqueued records from its background loop', async () => {
    await dispatcher.start();
    const record = store.addRecord(confirmedCandidate(subjectId, clock.now()));

    dispatcher.enqueue(record);
    await flush();
    await dispatcher.stop();

    expect(store.record(record.id).delivery_status).toBe('sent');
    expect(transport.sent).toHaveLength(1);
  });

  it('should leave the record untouched when the store cannot be read before sending', async () => {
    const { id } = store.addRecord(confirmedCandidate(subjectId, clock.now()));
    store.failNext('findActiveMarker', 5);

    for (let cycle = 0; cycle < 5; cycle++) {
      await expect(dispatcher.dispatch(store.record(id))).resolves.toBe('failed');
    }

    expect(store.record(id)).toMatchObject({ delivery_status: 'pending', attempt_count: 0, last_error: null });
    expect(transport.sent).toHaveLength(0);
    expect(errorChannel.reportDeliveryFailure).not.toHaveBeenCalled();

    await expect(dispatcher.sweep()).resolves.toBe(1);
    await expect(dispatcher.processNext()).resolves.toBe('sent');
    expect(store.record(id).delivery_status).toBe('sent');
  });
});
