/**
 * Session models: types, raw payload schemas and parsers.
 */

export type {
  MediaKind,
  MediaItem,
  PlaybackState,
  RemoteSession,
  PlaybackPatch,
  PlaybackTransition,
  ControllablePredicate,
} from './types.js';

export {
  TICKS_PER_SECOND,
  ticksToSeconds,
  parseDate,
  parseMediaItem,
  parsePlayState,
  parseSession,
  parsePlaybackPatch,
  applyPlaybackPatch,
  clearPlayback,
  describePlaybackTransition,
  isRemoteControllable,
  requiresCapabilities,
  isWebPlayer,
} from './session-parser.js';

export * from './schemas.js';
