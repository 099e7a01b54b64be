/**
 * Media Server REST client
 *
 * Thin typed wrapper over the server's HTTP API:
 *   GET  /Sessions                    → raw session records
 *   GET  /Items?ParentId=…            → one page of a library container
 *   POST /Sessions/{id}/Command       → remote-control command
 *   GET  /System/Info                 → reachability / identity probe
 *
 * Every failure leaves this class as a MediaSyncError subclass, classified by
 * ErrorHandler.fromTransport.
 */

import axios, { type AxiosInstance } from 'axios';
import { ErrorHandler } from '../errors/error-handler.js';
import { MalformedResponseError } from '../errors/sync-error.js';
import { RawItemsPageSchema, RawServerInfoSchema } from '../models/schemas.js';
import type {
  CommandArgs,
  CommandTarget,
  LibraryCursor,
  LibraryFilters,
  LibraryPage,
  RequestOptions,
  ServerInfo,
  TransportClient,
} from './types.js';

export interface MediaServerClientOptions {
  host: string;
  port: number;
  ssl?: boolean;
  apiKey: string;
  /** Identifies this client to the server */
  deviceId?: string;
  /** Per-request timeout. Default 10 000 ms */
  timeoutMs?: number;
  clientName?: string;
  clientVersion?: string;
}

export function buildBaseUrl(options: Pick<MediaServerClientOptions, 'host' | 'port' | 'ssl'>): string {
  const protocol = options.ssl ? 'https' : 'http';
  return `${protocol}://${options.host}:${options.port}/emby`;
}

export class MediaServerClient implements TransportClient {
  private httpClient: AxiosInstance;
  readonly baseUrl: string;

  constructor(options: MediaServerClientOptions) {
    this.baseUrl = buildBaseUrl(options);
    const client = options.clientName ?? 'mediasync';
    const version = options.clientVersion ?? '0.1.0';
    const deviceId = options.deviceId ?? 'mediasync';

    this.httpClient = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 10_000,
      headers: {
        'X-Emby-Token': options.apiKey,
        'X-Emby-Authorization': `MediaBrowser Client="${client}", Device="${client}", DeviceId="${deviceId}", Version="${version}"`,
        Accept: 'application/json',
        'User-Agent': `${client}/${version}`,
      },
    });
  }

  async listSessions(options: RequestOptions = {}): Promise<unknown[]> {
    const data = await this.request('listSessions', () =>
      this.httpClient.get<unknown>('/Sessions', { signal: options.signal })
    );
    if (!Array.isArray(data)) {
      throw new MalformedResponseError('Session list is not an array', { operation: 'listSessions' });
    }
    return data;
  }

  async getLibraryItems(
    containerId: string,
    cursor: LibraryCursor,
    filters: LibraryFilters = {},
    options: RequestOptions = {}
  ): Promise<LibraryPage> {
    const data = await this.request('getLibraryItems', () =>
      this.httpClient.get<unknown>('/Items', {
        params: {
          ...filters,
          ParentId: containerId,
          StartIndex: cursor.startIndex,
          Limit: cursor.limit,
        },
        signal: options.signal,
      })
    );

    const result = RawItemsPageSchema.safeParse(data);
    if (!result.success) {
      throw new MalformedResponseError(`Invalid items page for container ${containerId}`, {
        operation: 'getLibraryItems',
        issues: result.error.issues.length,
      });
    }

    const page = result.data;
    const startIndex = page.StartIndex ?? cursor.startIndex;
    const nextIndex = startIndex + page.Items.length;

    return {
      containerId,
      items: page.Items.map((item) => ({
        id: item.Id,
        name: item.Name,
        kind: item.Type ?? 'Unknown',
        isFolder: item.IsFolder ?? false,
      })),
      totalCount: page.TotalRecordCount,
      startIndex,
      next:
        page.Items.length > 0 && nextIndex < page.TotalRecordCount
          ? { startIndex: nextIndex, limit: cursor.limit }
          : undefined,
    };
  }

  async sendCommand(target: CommandTarget, command: string, args: CommandArgs = {}): Promise<void> {
    const argumentsAsText = Object.fromEntries(
      Object.entries(args).map(([name, value]) => [name, String(value)])
    );
    await this.request(
      'sendCommand',
      () =>
        this.httpClient.post<unknown>(`/Sessions/${encodeURIComponent(target.sessionToken)}/Command`, {
          Name: command,
          Arguments: argumentsAsText,
        }),
      { deviceKey: target.deviceKey, command }
    );
  }

  async probe(options: RequestOptions = {}): Promise<ServerInfo> {
    const data = await this.request('probe', () =>
      this.httpClient.get<unknown>('/System/Info', { signal: options.signal })
    );
    const result = RawServerInfoSchema.safeParse(data);
    if (!result.success) {
      throw new MalformedResponseError('Invalid server info payload', { operation: 'probe' });
    }
    return {
      id: result.data.Id,
      name: result.data.ServerName,
      version: result.data.Version ?? undefined,
    };
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────────

  private async request<T>(
    operation: string,
    call: () => Promise<{ data: T }>,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      throw ErrorHandler.fromTransport(error, { operation, ...context });
    }
  }
}
