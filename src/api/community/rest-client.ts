import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { logger } from '../../config/logger.js';
import type {
  ApiMessage,
  ChannelSummary,
  CommunityMetadata,
  CommunitySummary,
  CommunityTransport,
  SentMessage,
  TransportResult,
} from './types.js';

export interface CommunityRestClientOptions {
  token: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Replaces the HTTP adapter; used to run the client in-process. */
  adapter?: AxiosAdapter;
}

const DEFAULT_RETRY_AFTER_MS = 5000;

export class CommunityRestClient implements CommunityTransport {
  private client: AxiosInstance;
  private dmChannels = new Map<string, string>();

  constructor(options: CommunityRestClientOptions) {
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://discord.com/api/v10',
      headers: {
        Authorization: `Bot ${options.token}`,
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs ?? 30000,
      // Statuses are mapped to TransportResult below instead of thrown
      validateStatus: () => true,
      adapter: options.adapter,
    });

    this.client.interceptors.request.use((config) => {
      logger.debug(`Community API request: ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });
  }

  async listCommunities(): Promise<TransportResult<CommunitySummary[]>> {
    const result = await this.request<Array<{ id: string; name: string }>>({
      method: 'GET',
      url: '/users/@me/guilds',
    });
    if (result.status !== 'ok') return result;
    return { status: 'ok', data: result.data.map((g) => ({ id: g.id, name: g.name })) };
  }

  async getCommunity(communityId: string): Promise<TransportResult<CommunityMetadata>> {
    const result = await this.request<Record<string, unknown>>({
      method: 'GET',
      url: `/guilds/${communityId}`,
      params: { with_counts: true },
    });
    if (result.status !== 'ok') return result;

    const raw = result.data;
    return {
      status: 'ok',
      data: {
        id: typeof raw.id === 'string' ? raw.id : communityId,
        name: typeof raw.name === 'string' ? raw.name : communityId,
        populations: raw,
      },
    };
  }

  async listChannels(communityId: string): Promise<TransportResult<ChannelSummary[]>> {
    const result = await this.request<Array<{ id: string; name?: string | null; type: number }>>({
      method: 'GET',
      url: `/guilds/${communityId}/channels`,
    });
    if (result.status !== 'ok') return result;
    return {
      status: 'ok',
      data: result.data.map((c) => ({ id: c.id, name: c.name ?? '', type: c.type })),
    };
  }

  async getRecentMessages(channelId: string, limit: number): Promise<TransportResult<ApiMessage[]>> {
    return this.request<ApiMessage[]>({
      method: 'GET',
      url: `/channels/${channelId}/messages`,
      params: { limit: Math.min(Math.max(limit, 1), 100) },
    });
  }

  async sendDirectMessage(recipientId: string, content: string): Promise<TransportResult<SentMessage>> {
    let channelId = this.dmChannels.get(recipientId);

    if (!channelId) {
      const opened = await this.request<{ id: string }>({
        method: 'POST',
        url: '/users/@me/channels',
        data: { recipient_id: recipientId },
      });
      if (opened.status !== 'ok') return opened;
      channelId = opened.data.id;
      this.dmChannels.set(recipientId, channelId);
    }

    return this.request<SentMessage>({
      method: 'POST',
      url: `/channels/${channelId}/messages`,
      data: { content },
    });
  }

  private async request<T>(config: AxiosRequestConfig): Promise<TransportResult<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await this.client.request<T>(config);
    } catch (error) {
      // Only network-level failures reach here (timeouts, resets, DNS)
      const message = axios.isAxiosError(error) ? `${error.code ?? 'ERR'}: ${error.message}` : String(error);
      logger.warn('Community API no response', { url: config.url, message });
      return { status: 'transient_error', message };
    }

    return mapResponse<T>(response, config.url);
  }
}

function mapResponse<T>(response: AxiosResponse<T>, url?: string): TransportResult<T> {
  const { status } = response;

  if (status >= 200 && status < 300) {
    return { status: 'ok', data: response.data };
  }
  if (status === 404) {
    return { status: 'not_found' };
  }
  if (status === 401 || status === 403) {
    return { status: 'forbidden' };
  }
  if (status === 429) {
    const retryAfterMs = parseRetryAfter(response);
    logger.warn('Community API rate limited', { url, retryAfterMs });
    return { status: 'rate_limited', retryAfterMs };
  }

  logger.error('Community API error', { status, url, data: response.data });
  return { status: 'transient_error', message: `HTTP ${status}` };
}

function parseRetryAfter(response: AxiosResponse): number {
  const body: unknown = response.data;
  if (body && typeof body === 'object' && 'retry_after' in body) {
    const seconds = Number(body.retry_after);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1000);
    }
  }

  const header = response.headers['retry-after'];
  const seconds = Number(header);
  if (header !== undefined && Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds * 1000);
  }

  return DEFAULT_RETRY_AFTER_MS;
}
