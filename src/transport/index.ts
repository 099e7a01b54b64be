export { MediaServerClient, buildBaseUrl } from './client.js';
export type { MediaServerClientOptions } from './client.js';
export { RequestCoalescer } from './coalescer.js';
export type {
  TransportClient,
  RequestOptions,
  LibraryCursor,
  LibraryFilters,
  LibraryItem,
  LibraryPage,
  ServerInfo,
  CommandArgs,
  CommandTarget,
} from './types.js';
