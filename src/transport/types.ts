/**
 * Transport Client contract
 *
 * The coordinator and the library browser depend on this interface only;
 * MediaServerClient is the HTTP implementation.
 */

import type { RemoteSession } from '../models/types.js';

export interface RequestOptions {
  /** Aborts the request; the coordinator wires its poll timeout here. */
  signal?: AbortSignal;
}

export interface LibraryCursor {
  startIndex: number;
  limit: number;
}

export type LibraryFilters = Record<string, string | number | boolean | undefined>;

export interface LibraryItem {
  id: string;
  name: string;
  kind: string;
  isFolder: boolean;
}

export interface LibraryPage {
  containerId: string;
  items: LibraryItem[];
  totalCount: number;
  startIndex: number;
  /** Cursor for the following page, absent on the last page */
  next?: LibraryCursor;
}

export interface ServerInfo {
  id: string;
  name: string;
  version?: string;
}

export type CommandArgs = Record<string, string | number | boolean>;

/** The session fields a command needs to reach its device. */
export type CommandTarget = Pick<RemoteSession, 'deviceKey' | 'sessionToken'>;

export interface TransportClient {
  /**
   * Raw session records, unparsed: the coordinator validates each one
   * separately so a single bad record does not sink the poll.
   */
  listSessions(options?: RequestOptions): Promise<unknown[]>;
  getLibraryItems(
    containerId: string,
    cursor: LibraryCursor,
    filters?: LibraryFilters,
    options?: RequestOptions
  ): Promise<LibraryPage>;
  sendCommand(target: CommandTarget, command: string, args?: CommandArgs): Promise<void>;
  /** Lightweight reachability check used by recovery. */
  probe(options?: RequestOptions): Promise<ServerInfo>;
}
