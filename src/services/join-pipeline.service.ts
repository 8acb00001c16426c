import { logger } from '../config/logger.js';
import type { JoinCandidate } from '../types/models.js';
import type { AdmissionDecision, DeduplicationGuard } from './dedup-guard.service.js';
import type { NotificationDispatcher } from './notification-dispatcher.service.js';

export interface PipelineStats {
  submitted: number;
  admitted: number;
  duplicates: number;
  deferred: number;
}

/**
 * Where every source hands over its candidates. The candidate is copied on entry,
 * so the producer keeps no reference into records in flight.
 */
export class JoinPipeline {
  private readonly stats: PipelineStats = { submitted: 0, admitted: 0, duplicates: 0, deferred: 0 };

  constructor(
    private readonly guard: Pick<DeduplicationGuard, 'admit'>,
    private readonly dispatcher: Pick<NotificationDispatcher, 'enqueue'>
  ) {}

  async submit(candidate: JoinCandidate): Promise<AdmissionDecision> {
    this.stats.submitted++;
    const decision = await this.guard.admit(structuredClone(candidate));

    switch (decision.outcome) {
      case 'admitted':
        this.stats.admitted++;
        logger.info('Join admitted', {
          recordId: decision.record.id,
          subjectId: candidate.subject_id,
          communityId: candidate.community_id,
          source: candidate.source,
        });
        this.dispatcher.enqueue(decision.record);
        break;
      case 'duplicate':
        this.stats.duplicates++;
        logger.debug('Duplicate join dropped', {
          subjectId: candidate.subject_id,
          communityId: candidate.community_id,
          source: candidate.source,
          reason: decision.reason,
        });
        break;
      case 'deferred':
        this.stats.deferred++;
        break;
    }

    return decision;
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }
}
