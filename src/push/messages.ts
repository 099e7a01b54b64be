/**
 * Push frame codec
 *
 * Frames are JSON envelopes `{ MessageType, Data }`. decodeFrame maps each
 * known MessageType onto one PushMessage variant and validates its payload;
 * unrecognised types come back as `unknown` rather than failing.
 */

import type { z } from 'zod';
import { MalformedResponseError } from '../errors/sync-error.js';
import {
  RawLibraryChangedSchema,
  RawNotificationSchema,
  RawPushFrameSchema,
  RawSessionEndedSchema,
  RawUserChangedSchema,
  RawUserDataChangedSchema,
} from '../models/schemas.js';
import { parseDate, parsePlaybackPatch, ticksToSeconds } from '../models/session-parser.js';
import type { PushCommand, PushMessage } from './types.js';

function parsePayload<S extends z.ZodTypeAny>(schema: S, data: unknown, messageType: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedResponseError(
      `Invalid ${messageType} payload: ${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown'}`,
      { messageType }
    );
  }
  return result.data;
}

/**
 * Decode one text frame.
 *
 * @throws MalformedResponseError for invalid JSON, a missing MessageType, or
 *         a known MessageType with an invalid payload
 */
export function decodeFrame(text: string, receivedAt: Date): PushMessage {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new MalformedResponseError('Push frame is not valid JSON', { length: text.length });
  }

  const envelope = RawPushFrameSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedResponseError('Push frame has no MessageType');
  }
  const { MessageType: messageType, Data: data } = envelope.data;

  switch (messageType) {
    case 'Sessions':
      if (!Array.isArray(data)) {
        throw new MalformedResponseError('Sessions payload is not an array', { messageType });
      }
      return { kind: 'sessions', sessions: data, receivedAt };

    case 'PlaybackProgress':
      return { kind: 'playback-progress', patch: parsePlaybackPatch(data, receivedAt) };

    case 'PlaybackStart':
    case 'PlaybackStarted':
      return { kind: 'playback-started', patch: parsePlaybackPatch(data, receivedAt) };

    case 'PlaybackStopped':
      return { kind: 'playback-stopped', patch: parsePlaybackPatch(data, receivedAt) };

    case 'SessionEnded': {
      const ended = parsePayload(RawSessionEndedSchema, data, messageType);
      return { kind: 'session-ended', deviceKey: ended.DeviceId, sessionToken: ended.Id ?? undefined };
    }

    case 'LibraryChanged': {
      const change = parsePayload(RawLibraryChangedSchema, data, messageType);
      return {
        kind: 'library-changed',
        change: {
          itemsAdded: change.ItemsAdded,
          itemsUpdated: change.ItemsUpdated,
          itemsRemoved: change.ItemsRemoved,
          foldersAddedTo: change.FoldersAddedTo,
          foldersRemovedFrom: change.FoldersRemovedFrom,
        },
      };
    }

    case 'UserDataChanged': {
      const changed = parsePayload(RawUserDataChangedSchema, data, messageType);
      return {
        kind: 'user-data-changed',
        userId: changed.UserId ?? undefined,
        items: changed.UserDataList.map((entry) => ({
          itemId: entry.ItemId ?? undefined,
          isFavorite: entry.IsFavorite ?? undefined,
          played: entry.Played ?? undefined,
          playbackPositionSeconds:
            entry.PlaybackPositionTicks != null ? ticksToSeconds(entry.PlaybackPositionTicks) : undefined,
          playCount: entry.PlayCount ?? undefined,
        })),
      };
    }

    case 'NotificationAdded': {
      const notification = parsePayload(RawNotificationSchema, data, messageType);
      return {
        kind: 'notification',
        notification: {
          name: notification.Name,
          description: notification.Description ?? undefined,
          level: notification.Level,
          notificationType: notification.NotificationType ?? undefined,
          url: notification.Url ?? undefined,
          date: parseDate(notification.Date),
        },
      };
    }

    case 'UserUpdated':
    case 'UserDeleted': {
      const user = parsePayload(RawUserChangedSchema, data, messageType);
      return {
        kind: 'user-changed',
        userId: user.UserId,
        userName: user.UserName ?? undefined,
        change: messageType === 'UserDeleted' ? 'deleted' : 'updated',
      };
    }

    case 'ServerRestarting':
      return { kind: 'server-lifecycle', phase: 'restarting' };

    case 'ServerShuttingDown':
      return { kind: 'server-lifecycle', phase: 'shutting-down' };

    case 'ForceKeepAlive':
      return {
        kind: 'keep-alive',
        intervalSeconds: typeof data === 'number' && data > 0 ? data : undefined,
      };

    case 'KeepAlive':
      return { kind: 'keep-alive' };

    default:
      return { kind: 'unknown', messageType };
  }
}

export function encodeCommand(command: PushCommand): string {
  return JSON.stringify(command);
}

/** Ask the server to stream session lists every `intervalMs`. */
export function sessionsStartCommand(intervalMs: number): PushCommand {
  return { MessageType: 'SessionsStart', Data: `0,${intervalMs}` };
}

export const KEEP_ALIVE_COMMAND: PushCommand = { MessageType: 'KeepAlive' };
