/**
 * Unit tests for MediaServerClient and RequestCoalescer
 *
 * axios.create is mocked; AxiosError stays real so error classification
 * runs against genuine instances.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders, type AxiosInstance } from 'axios';
import { MediaServerClient, buildBaseUrl } from './client.js';
import { RequestCoalescer } from './coalescer.js';
import {
  AuthenticationRejectedError,
  MalformedResponseError,
  TransportUnavailableError,
} from '../errors/sync-error.js';

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: { ...actual.default, create: vi.fn() },
  };
});

const mockCreate = vi.mocked(axios.create);

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    status,
    statusText: '',
    headers: {},
    config,
    data: null,
  });
}

describe('MediaServerClient', () => {
  let client: MediaServerClient;
  let mockHttpClient: {
    get: ReturnType<typeof vi.fn>;
    post: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    mockHttpClient = { get: vi.fn(), post: vi.fn() };
    mockCreate.mockReturnValue(mockHttpClient as unknown as AxiosInstance);

    client = new MediaServerClient({
      host: 'media.local',
      port: 8096,
      apiKey: 'test-secret',
      deviceId: 'test-device',
      timeoutMs: 5_000,
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('constructor', () => {
    it('configures base URL, timeout and token header', () => {
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          baseURL: 'http://media.local:8096/emby',
          timeout: 5_000,
          headers: expect.objectContaining({ 'X-Emby-Token': 'test-secret' }),
        })
      );
    });

    it('builds an https base URL when ssl is set', () => {
      expect(buildBaseUrl({ host: 'h', port: 443, ssl: true })).toBe('https://h:443/emby');
    });
  });

  describe('listSessions', () => {
    it('returns the raw records', async () => {
      const records = [{ Id: 's1' }, { Id: 's2' }];
      mockHttpClient.get.mockResolvedValueOnce({ data: records });

      await expect(client.listSessions()).resolves.toEqual(records);
      expect(mockHttpClient.get).toHaveBeenCalledWith('/Sessions', { signal: undefined });
    });

    it('rejects a non-array body as malformed', async () => {
      mockHttpClient.get.mockResolvedValueOnce({ data: { error: 'nope' } });

      await expect(client.listSessions()).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it('maps 401 to AuthenticationRejectedError', async () => {
      mockHttpClient.get.mockRejectedValueOnce(httpError(401));

      await expect(client.listSessions()).rejects.toBeInstanceOf(AuthenticationRejectedError);
    });

    it('maps 503 to TransportUnavailableError with status context', async () => {
      mockHttpClient.get.mockRejectedValueOnce(httpError(503));

      await expect(client.listSessions()).rejects.toMatchObject({
        code: 'TRANSPORT_UNAVAILABLE',
        context: expect.objectContaining({ status: 503, operation: 'listSessions' }),
      });
    });

    it('maps a network error without response to TransportUnavailableError', async () => {
      mockHttpClient.get.mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

      await expect(client.listSessions()).rejects.toBeInstanceOf(TransportUnavailableError);
    });
  });

  describe('getLibraryItems', () => {
    it('passes paging and filters and maps the page', async () => {
      mockHttpClient.get.mockResolvedValueOnce({
        data: {
          Items: [
            { Id: 'i1', Name: 'Alien', Type: 'Movie' },
            { Id: 'i2', Name: 'Extras', Type: 'Folder', IsFolder: true },
          ],
          TotalRecordCount: 5,
          StartIndex: 0,
        },
      });

      const page = await client.getLibraryItems('lib1', { startIndex: 0, limit: 2 }, { SortBy: 'Name' });

      expect(mockHttpClient.get).toHaveBeenCalledWith('/Items', {
        params: { SortBy: 'Name', ParentId: 'lib1', StartIndex: 0, Limit: 2 },
        signal: undefined,
      });
      expect(page).toEqual({
        containerId: 'lib1',
        items: [
          { id: 'i1', name: 'Alien', kind: 'Movie', isFolder: false },
          { id: 'i2', name: 'Extras', kind: 'Folder', isFolder: true },
        ],
        totalCount: 5,
        startIndex: 0,
        next: { startIndex: 2, limit: 2 },
      });
    });

    it('omits the next cursor on the last page', async () => {
      mockHttpClient.get.mockResolvedValueOnce({
        data: { Items: [{ Id: 'i5', Name: 'Last' }], TotalRecordCount: 5, StartIndex: 4 },
      });

      const page = await client.getLibraryItems('lib1', { startIndex: 4, limit: 2 });
      expect(page.next).toBeUndefined();
      expect(page.items[0].kind).toBe('Unknown');
    });

    it('rejects a page without Items as malformed', async () => {
      mockHttpClient.get.mockResolvedValueOnce({ data: { TotalRecordCount: 0 } });

      await expect(client.getLibraryItems('lib1', { startIndex: 0, limit: 10 })).rejects.toBeInstanceOf(
        MalformedResponseError
      );
    });
  });

  describe('sendCommand', () => {
    it('posts the command to the session with string arguments', async () => {
      mockHttpClient.post.mockResolvedValueOnce({ data: '' });

      await client.sendCommand({ deviceKey: 'dev-1', sessionToken: 'sess/1' }, 'SetVolume', { Volume: 40 });

      expect(mockHttpClient.post).toHaveBeenCalledWith('/Sessions/sess%2F1/Command', {
        Name: 'SetVolume',
        Arguments: { Volume: '40' },
      });
    });

    it('carries the device key in the error context', async () => {
      mockHttpClient.post.mockRejectedValueOnce(httpError(500));

      await expect(
        client.sendCommand({ deviceKey: 'dev-1', sessionToken: 's1' }, 'Pause')
      ).rejects.toMatchObject({
        context: expect.objectContaining({ deviceKey: 'dev-1', command: 'Pause' }),
      });
    });
  });

  describe('probe', () => {
    it('returns server identity', async () => {
      mockHttpClient.get.mockResolvedValueOnce({
        data: { Id: 'srv', ServerName: 'Home', Version: '4.8.0.0' },
      });

      await expect(client.probe()).resolves.toEqual({ id: 'srv', name: 'Home', version: '4.8.0.0' });
      expect(mockHttpClient.get).toHaveBeenCalledWith('/System/Info', { signal: undefined });
    });

    it('rejects an unexpected payload', async () => {
      mockHttpClient.get.mockResolvedValueOnce({ data: 'ok' });

      await expect(client.probe()).rejects.toBeInstanceOf(MalformedResponseError);
    });
  });
});

describe('RequestCoalescer', () => {
  it('runs one task for concurrent callers with the same key', async () => {
    const coalescer = new RequestCoalescer<number>();
    let release: (value: number) => void = () => undefined;
    const task = vi.fn(() => new Promise<number>((resolve) => (release = resolve)));

    const a = coalescer.run('k', task);
    const b = coalescer.run('k', task);
    expect(coalescer.pendingCount).toBe(1);

    release(7);
    await expect(Promise.all([a, b])).resolves.toEqual([7, 7]);
    expect(task).toHaveBeenCalledTimes(1);
    expect(coalescer.getStats()).toEqual({ coalesced: 1, executed: 1, pending: 0 });
  });

  it('runs again once the previous call settled', async () => {
    const coalescer = new RequestCoalescer<string>();
    const task = vi.fn(async () => 'v');

    await coalescer.run('k', task);
    await coalescer.run('k', task);

    expect(task).toHaveBeenCalledTimes(2);
  });

  it('does not share across keys', async () => {
    const coalescer = new RequestCoalescer<string>();
    const task = vi.fn(async () => 'v');

    await Promise.all([coalescer.run('a', task), coalescer.run('b', task)]);

    expect(task).toHaveBeenCalledTimes(2);
  });
});
