import { validateEnv, type Env } from './config/env.js';
import { logger } from './config/logger.js';
import { CommunityRestClient } from './api/community/rest-client.js';
import { GatewayListener } from './api/community/gateway-listener.js';
import { disconnect } from './db/client.js';
import { describeError } from './errors.js';
import { InMemoryDetectionStateStore, type DetectionStateStore } from './detection/detection-state.js';
import { HeuristicDetector } from './detection/heuristic-detector.js';
import { ActivityPatternStrategy } from './detection/strategies/activity-pattern.strategy.js';
import { CountDeltaStrategy } from './detection/strategies/count-delta.strategy.js';
import { PresenceDeltaStrategy } from './detection/strategies/presence-delta.strategy.js';
import { daysToMs } from './detection/join-message.js';
import { CommunityMonitorJob } from './jobs/community-monitor.job.js';
import { RetentionJob } from './jobs/retention.job.js';
import { PgCommunityRegistry } from './services/community-registry.service.js';
import { DeduplicationGuard } from './services/dedup-guard.service.js';
import type { RetryPolicy } from './services/delivery-state.js';
import { PgDetectionStateStore } from './services/detection-state.service.js';
import { OperatorErrorChannel } from './services/error-channel.service.js';
import { EventStreamAccess, EventStreamListener } from './services/event-stream-listener.js';
import { JobRestoreService } from './services/job-restore.service.js';
import { JoinPipeline } from './services/join-pipeline.service.js';
import { PgJoinStore } from './services/join-store.service.js';
import { NotificationDispatcher } from './services/notification-dispatcher.service.js';
import { NotificationFormatter } from './services/notification-formatter.service.js';
import { TokenBucket } from './services/token-bucket.js';

/**
 * Worker process: event stream listener, heuristic polling and notification delivery.
 */

const HOUR_MS = 60 * 60 * 1000;

function buildWorker(env: Env) {
  const transport = new CommunityRestClient({
    token: env.COMMUNITY_API_TOKEN,
    baseURL: env.COMMUNITY_API_BASE_URL,
  });

  const windowMs = env.DEDUP_WINDOW_HOURS * HOUR_MS;
  const store = new PgJoinStore();
  const bucket = new TokenBucket({
    capacity: env.RATE_BUDGET_CAPACITY,
    refillAmount: env.RATE_BUDGET_REFILL_AMOUNT,
    refillIntervalMs: env.RATE_BUDGET_REFILL_INTERVAL_MS,
  });
  const formatter = new NotificationFormatter(env.MESSAGE_FORMAT);
  const retryPolicy: RetryPolicy = {
    maxAttempts: env.DISPATCH_MAX_ATTEMPTS,
    baseDelayMs: env.DISPATCH_RETRY_BASE_MS,
    maxDelayMs: env.DISPATCH_RETRY_MAX_MS,
    jitterFactor: 0.1,
  };

  const errorChannel = new OperatorErrorChannel(transport, bucket, formatter, {
    targetId: env.NOTIFICATION_TARGET_ID,
    notifyTarget: env.NOTIFY_DELIVERY_FAILURES,
    tokenDeadlineMs: env.DISPATCH_TOKEN_DEADLINE_MS,
  });

  const dispatcher = new NotificationDispatcher(store, transport, bucket, formatter, errorChannel, {
    targetId: env.NOTIFICATION_TARGET_ID,
    windowMs,
    retryPolicy,
    tokenDeadlineMs: env.DISPATCH_TOKEN_DEADLINE_MS,
    filters: { ignoreBots: env.IGNORE_BOTS, minAccountAgeDays: env.MIN_ACCOUNT_AGE_DAYS },
    sweepIntervalMs: env.RETRY_SWEEP_SECONDS * 1000,
  });

  const guard = new DeduplicationGuard(store, { windowMs });
  const pipeline = new JoinPipeline(guard, dispatcher);
  const access = new EventStreamAccess();

  const detector = new HeuristicDetector(
    transport,
    [
      new CountDeltaStrategy(),
      new ActivityPatternStrategy({
        maxChannels: env.ACTIVITY_MAX_CHANNELS,
        messageLimit: env.ACTIVITY_MESSAGE_LIMIT,
        lookbackMs: env.ACTIVITY_LOOKBACK_SECONDS * 1000,
        newAccountMaxAgeMs: daysToMs(env.NEW_ACCOUNT_MAX_AGE_DAYS),
      }),
      new PresenceDeltaStrategy(),
    ],
    { heartbeatStaleMs: env.HEARTBEAT_STALE_SECONDS * 1000 }
  );

  const stateStore: DetectionStateStore =
    env.DETECTION_STATE_BACKEND === 'memory' ? new InMemoryDetectionStateStore() : new PgDetectionStateStore();

  const monitorJob = new CommunityMonitorJob(
    {
      transport,
      registry: new PgCommunityRegistry(),
      detector,
      stateStore,
      pipeline,
      access,
      excludedIds: env.EXCLUDED_COMMUNITY_IDS,
      heuristicOnEventStream: env.HEURISTIC_ON_EVENT_STREAM,
      pollBackoff: {
        maxAttempts: Number.POSITIVE_INFINITY,
        baseDelayMs: env.POLL_INTERVAL_SECONDS * 1000,
        maxDelayMs: env.POLL_INTERVAL_SECONDS * 1000 * 16,
        jitterFactor: 0.1,
      },
    },
    {
      pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
      discoveryIntervalMinutes: env.DISCOVERY_INTERVAL_MINUTES,
      enabled: true,
    }
  );

  const retentionJob = new RetentionJob(
    { store, windowMs },
    { intervalHours: 24, retentionDays: env.RETENTION_DAYS, enabled: true }
  );

  const gateway = env.EVENT_STREAM_ENABLED
    ? new GatewayListener(env.COMMUNITY_API_TOKEN, new EventStreamListener(), pipeline, access)
    : null;

  const jobs = new JobRestoreService([
    { name: 'community-monitor', job: monitorJob },
    { name: 'retention', job: retentionJob },
  ]);

  return { dispatcher, gateway, jobs };
}

async function startWorker(): Promise<void> {
  const env = validateEnv();
  logger.info('Starting join watch worker');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const { dispatcher, gateway, jobs } = buildWorker(env);

  // Halt rather than stop: jobs stay marked running so the next start restores them
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
      await gateway?.stop();
      await jobs.haltAllJobs();
      await dispatcher.stop();
      await disconnect();
    } catch (error) {
      logger.error('Error during shutdown', { error: describeError(error) });
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await dispatcher.start();

  // Connect the event stream before discovery so reachable communities are not polled
  if (gateway) {
    try {
      await gateway.start();
    } catch (error) {
      logger.error('Event stream unavailable, heuristics cover every community', {
        error: describeError(error),
      });
    }
  }

  const { restored, skipped, failed } = await jobs.restoreAllJobs();
  logger.info('Background jobs restoration summary', { restored, skipped, failed });
}

if (require.main === module) {
  startWorker().catch((error: unknown) => {
    logger.error('Worker failed to start', { error: describeError(error) });
    process.exit(1);
  });
}
