import type { CommunityTransport, TransportFailure } from '../api/community/types.js';
import { logger } from '../config/logger.js';
import { DataValidityError, PersistenceError, describeError } from '../errors.js';
import type { DeliveryOutcome, JoinRecord } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { assertDeliverable, type DeliverableSubject, type DeliveryFilterOptions } from './delivery-filter.js';
import {
  backoffDelayMs,
  transition,
  type RetryPolicy,
  type RetryState,
} from './delivery-state.js';
import type { ErrorChannel } from './error-channel.service.js';
import { isDispatchable, type JoinStore } from './join-store.js';
import type { NotificationFormatter } from './notification-formatter.service.js';
import type { TokenBucket } from './token-bucket.js';

export interface NotificationDispatcherOptions {
  targetId: string;
  windowMs: number;
  retryPolicy: RetryPolicy;
  tokenDeadlineMs: number;
  filters: DeliveryFilterOptions;
  sweepIntervalMs: number;
  /** Records read per recovery or sweep. */
  batchSize?: number;
  clock?: Clock;
  random?: () => number;
}

export interface DispatcherStats {
  queued: number;
  sent: number;
  filtered: number;
  failed: number;
  retriesScheduled: number;
  pendingMarks: number;
}

function stateOf(record: JoinRecord): RetryState {
  switch (record.delivery_status) {
    case 'pending':
      return { status: 'pending' };
    case 'retrying':
      return { status: 'retrying', attempt: record.attempt_count };
    case 'failed':
      return { status: 'failed', attempt: record.attempt_count };
    case 'sent':
      return { status: 'sent' };
    case 'filtered':
      return { status: 'filtered' };
  }
}

function describeFailure(failure: TransportFailure): string {
  switch (failure.status) {
    case 'rate_limited':
      return `rate limited (retry after ${failure.retryAfterMs}ms)`;
    case 'transient_error':
      return failure.message;
    default:
      return failure.status;
  }
}

/**
 * Delivers admitted records to the operator one at a time, in admission order.
 * Every send takes a token from the shared budget; failures are rescheduled with
 * backoff until the attempt limit, then reported on the error channel.
 */
export class NotificationDispatcher {
  private readonly queue: string[] = [];
  private readonly queued = new Set<string>();
  /** Sends that went out but whose marker write failed, by record id. */
  private readonly confirmedSends = new Map<string, Date>();
  private readonly clock: Clock;
  private readonly stats = { sent: 0, filtered: 0, failed: 0, retriesScheduled: 0 };

  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(
    private readonly store: JoinStore,
    private readonly transport: CommunityTransport,
    private readonly bucket: TokenBucket,
    private readonly formatter: NotificationFormatter,
    private readonly errorChannel: ErrorChannel,
    private readonly options: NotificationDispatcherOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  enqueue(record: JoinRecord): void {
    if (this.queued.has(record.id)) {
      return;
    }
    this.queued.add(record.id);
    this.queue.push(record.id);
    this.wake?.();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const recovered = await this.recover();
    logger.info('Notification dispatcher started', { recovered });

    this.running = true;
    this.loop = this.run();
    this.sweepTimer = setInterval(() => {
      void this.sweep();
    }, this.options.sweepIntervalMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.wake?.();
    await this.loop;
    this.loop = null;
    logger.info('Notification dispatcher stopped', { unsentInQueue: this.queue.length });
  }

  /**
   * Re-queue persisted records still awaiting delivery. Called on startup so a
   * restart never loses admitted records.
   */
  async recover(): Promise<number> {
    return this.sweep();
  }

  async sweep(): Promise<number> {
    if (this.sweeping) {
      return 0;
    }
    this.sweeping = true;
    try {
      const records = await this.store.listDispatchable(this.clock.now(), this.options.batchSize ?? 500);
      const before = this.queue.length;
      records.forEach((record) => this.enqueue(record));
      return this.queue.length - before;
    } catch (error) {
      logger.error('Dispatch sweep failed', { error: describeError(error) });
      return 0;
    } finally {
      this.sweeping = false;
    }
  }

  /** Process the oldest queued record, if any. */
  async processNext(): Promise<DeliveryOutcome | null> {
    const id = this.queue.shift();
    if (id === undefined) {
      return null;
    }
    this.queued.delete(id);

    let record: JoinRecord | null;
    try {
      record = await this.store.getRecord(id);
    } catch (error) {
      logger.error('Could not load queued record, leaving it for the sweep', { recordId: id, error: describeError(error) });
      return null;
    }
    if (!record || !isDispatchable(record, this.clock.now())) {
      return null;
    }
    return this.dispatch(record);
  }

  async dispatch(record: JoinRecord): Promise<DeliveryOutcome> {
    const now = this.clock.now();

    let subject: DeliverableSubject;
    try {
      subject = assertDeliverable(record, this.options.filters, now);
    } catch (error) {
      if (error instanceof DataValidityError) {
        return this.markFiltered(record, error.message);
      }
      throw error;
    }

    let sentAt = this.confirmedSends.get(record.id);
    if (!sentAt) {
      const windowStart = new Date(now.getTime() - this.options.windowMs);
      try {
        if (await this.store.findActiveMarker(record.subject_id, record.community_id, windowStart)) {
          return this.markFiltered(record, 'already notified');
        }
      } catch (error) {
        // No attempt used: the record keeps its state and the next sweep picks it up
        logger.error('Marker lookup failed, leaving record for the sweep', {
          recordId: record.id,
          error: describeError(error),
        });
        return 'failed';
      }

      if (!(await this.bucket.acquire(this.options.tokenDeadlineMs))) {
        return this.handleFailure(record, 'rate budget deadline elapsed');
      }

      const result = await this.transport.sendDirectMessage(
        this.options.targetId,
        this.formatter.formatJoin(record, subject, now)
      );
      if (result.status !== 'ok') {
        return this.handleFailure(record, describeFailure(result));
      }
      sentAt = this.clock.now();
    }

    return this.markSent(record, sentAt);
  }

  getStats(): DispatcherStats {
    return {
      queued: this.queue.length,
      ...this.stats,
      pendingMarks: this.confirmedSends.size,
    };
  }

  private async markSent(record: JoinRecord, sentAt: Date): Promise<DeliveryOutcome> {
    const windowStart = new Date(sentAt.getTime() - this.options.windowMs);
    try {
      await this.store.withPairLock(record.subject_id, record.community_id, async (tx) => {
        const existing = await tx.findActiveMarker(record.subject_id, record.community_id, windowStart);
        if (!existing) {
          await tx.insertMarker({
            subject_id: record.subject_id,
            community_id: record.community_id,
            sent_at: sentAt,
            join_record_id: record.id,
          });
        }
        await tx.markNotified(record.id);
      });
    } catch (error) {
      // Delivered already: retry only the marker write on a later cycle, never the send
      this.confirmedSends.set(record.id, sentAt);
      logger.error('Notification sent but marker write failed', {
        recordId: record.id,
        error: describeError(error),
      });
      this.stats.sent++;
      return 'sent';
    }

    this.confirmedSends.delete(record.id);
    this.stats.sent++;
    logger.info('Join notification sent', {
      recordId: record.id,
      subjectId: record.subject_id,
      communityId: record.community_id,
      source: record.source,
    });
    return 'sent';
  }

  private async markFiltered(record: JoinRecord, reason: string): Promise<DeliveryOutcome> {
    const next = transition(stateOf(record), 'filtered', this.options.retryPolicy);
    try {
      await this.store.updateDelivery(record.id, {
        delivery_status: next.status,
        attempt_count: record.attempt_count,
        next_attempt_at: null,
        last_error: reason,
      });
    } catch (error) {
      this.logPersistence(record, error);
    }
    this.stats.filtered++;
    logger.info('Join notification filtered', { recordId: record.id, subjectId: record.subject_id, reason });
    return 'filtered';
  }

  private async handleFailure(record: JoinRecord, reason: string): Promise<DeliveryOutcome> {
    const next = transition(stateOf(record), 'transient_failure', this.options.retryPolicy);
    if (next.status !== 'retrying' && next.status !== 'failed') {
      return 'failed';
    }

    const nextAttemptAt =
      next.status === 'retrying'
        ? new Date(this.clock.now().getTime() + backoffDelayMs(next.attempt, this.options.retryPolicy, this.options.random))
        : null;

    try {
      await this.store.updateDelivery(record.id, {
        delivery_status: next.status,
        attempt_count: next.attempt,
        next_attempt_at: nextAttemptAt,
        last_error: reason,
      });
    } catch (error) {
      this.logPersistence(record, error);
      return 'failed';
    }

    if (next.status === 'retrying') {
      this.stats.retriesScheduled++;
      logger.warn('Join notification failed, retry scheduled', {
        recordId: record.id,
        attempt: next.attempt,
        nextAttemptAt: nextAttemptAt?.toISOString(),
        reason,
      });
      return 'failed';
    }

    this.stats.failed++;
    await this.errorChannel
      .reportDeliveryFailure(
        { ...record, delivery_status: 'failed', attempt_count: next.attempt, last_error: reason },
        reason
      )
      .catch((error: unknown) => {
        logger.error('Error channel report failed', { recordId: record.id, error: describeError(error) });
      });
    return 'failed';
  }

  private logPersistence(record: JoinRecord, error: unknown): void {
    const message = error instanceof PersistenceError ? error.message : describeError(error);
    logger.error('Could not persist delivery state', { recordId: record.id, error: message });
  }

  private async run(): Promise<void> {
    while (this.running) {
      if (this.queue.length === 0) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = null;
        continue;
      }
      try {
        await this.processNext();
      } catch (error) {
        logger.error('Dispatch loop error', { error: describeError(error) });
      }
    }
  }
}
