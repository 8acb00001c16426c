import type { CommunityTransport } from '../api/community/types.js';
import { logger } from '../config/logger.js';
import type { JoinRecord } from '../types/models.js';
import type { NotificationFormatter } from './notification-formatter.service.js';
import type { TokenBucket } from './token-bucket.js';

export interface ErrorChannel {
  reportDeliveryFailure(record: JoinRecord, reason: string): Promise<void>;
}

export interface OperatorErrorChannelOptions {
  targetId: string;
  notifyTarget: boolean;
  tokenDeadlineMs: number;
}

/**
 * Surfaces records whose delivery was abandoned: always to the log, and as a
 * best-effort message to the operator when enabled. A failed notice is not retried.
 */
export class OperatorErrorChannel implements ErrorChannel {
  constructor(
    private readonly transport: CommunityTransport,
    private readonly bucket: TokenBucket,
    private readonly formatter: NotificationFormatter,
    private readonly options: OperatorErrorChannelOptions
  ) {}

  async reportDeliveryFailure(record: JoinRecord, reason: string): Promise<void> {
    logger.error('Join notification abandoned', {
      recordId: record.id,
      subjectId: record.subject_id,
      communityId: record.community_id,
      attempts: record.attempt_count,
      reason,
    });

    if (!this.options.notifyTarget) {
      return;
    }
    if (!(await this.bucket.acquire(this.options.tokenDeadlineMs))) {
      logger.warn('Skipped delivery failure notice, rate budget exhausted', { recordId: record.id });
      return;
    }

    const result = await this.transport.sendDirectMessage(
      this.options.targetId,
      this.formatter.formatDeliveryFailure(record, reason)
    );
    if (result.status !== 'ok') {
      logger.warn('Delivery failure notice not sent', { recordId: record.id, status: result.status });
    }
  }
}
