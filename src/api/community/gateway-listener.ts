import { Client, Events, GatewayIntentBits } from 'discord.js';
import { logger } from '../../config/logger.js';
import { describeError } from '../../errors.js';
import type { EventStreamAccess, EventStreamListener, JoinedMember } from '../../services/event-stream-listener.js';
import type { JoinPipeline } from '../../services/join-pipeline.service.js';
import { systemClock, type Clock } from '../../utils/clock.js';

const READY_TIMEOUT_MS = 30000;

/** The parts of a gateway member object the join handler reads. */
export interface GatewayMember {
  id: string;
  displayName: string;
  joinedAt: Date | null;
  guild: { id: string; name: string };
  user: {
    username: string;
    globalName: string | null;
    bot: boolean;
    system: boolean;
    createdAt: Date;
    displayAvatarURL(): string;
  };
}

export function toJoinedMember(member: GatewayMember): JoinedMember {
  const joined: JoinedMember = {
    id: member.id,
    username: member.user.username,
    account_created_at: member.user.createdAt,
    avatar_url: member.user.displayAvatarURL(),
    is_bot: member.user.bot,
    is_system: member.user.system,
  };
  const displayName = member.user.globalName ?? member.displayName;
  if (displayName) {
    joined.display_name = displayName;
  }
  return joined;
}

/**
 * Gateway connection feeding member-join events into the pipeline. Communities
 * the connection can see are recorded in `access`.
 */
export class GatewayListener {
  private client: Client | null = null;

  constructor(
    private readonly token: string,
    private readonly listener: EventStreamListener,
    private readonly pipeline: Pick<JoinPipeline, 'submit'>,
    private readonly access: EventStreamAccess,
    private readonly clock: Clock = systemClock
  ) {}

  async start(): Promise<void> {
    const client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
    });

    let markReady: () => void = () => undefined;
    const ready = new Promise<void>((resolve) => {
      markReady = resolve;
    });
    const readyTimeout = setTimeout(() => {
      logger.warn('Event stream not ready in time, continuing', { timeoutMs: READY_TIMEOUT_MS });
      markReady();
    }, READY_TIMEOUT_MS);

    client.once(Events.ClientReady, (readyClient) => {
      readyClient.guilds.cache.forEach((guild) => this.access.grant(guild.id));
      logger.info('Event stream connected', {
        user: readyClient.user.tag,
        communities: this.access.size,
      });
      clearTimeout(readyTimeout);
      markReady();
    });

    client.on(Events.GuildCreate, (guild) => {
      this.access.grant(guild.id);
      logger.info('Event stream access gained', { communityId: guild.id, name: guild.name });
    });

    client.on(Events.GuildDelete, (guild) => {
      this.access.revoke(guild.id);
      logger.info('Event stream access lost', { communityId: guild.id });
    });

    client.on(Events.GuildMemberAdd, (member) => {
      void this.handleMemberAdd(member);
    });

    client.on(Events.Error, (error) => {
      logger.error('Event stream error', { error: error.message });
    });

    this.client = client;
    try {
      await client.login(this.token);
    } catch (error) {
      clearTimeout(readyTimeout);
      throw error;
    }
    await ready;
  }

  async stop(): Promise<void> {
    if (!this.client) {
      return;
    }
    await this.client.destroy();
    this.client = null;
    logger.info('Event stream disconnected');
  }

  async handleMemberAdd(member: GatewayMember): Promise<void> {
    try {
      const candidate = this.listener.onMemberJoined(
        member.guild.id,
        toJoinedMember(member),
        member.joinedAt ?? this.clock.now(),
        member.guild.name
      );
      await this.pipeline.submit(candidate);
    } catch (error) {
      logger.error('Failed to handle member join', {
        communityId: member.guild.id,
        subjectId: member.id,
        error: describeError(error),
      });
    }
  }
}
