/**
 * zod schemas for the media server's raw JSON payloads.
 *
 * Unknown fields pass through; absent and null fields are both accepted
 * where the server is known to omit them.
 */

import { z } from 'zod';

export const RawMediaItemSchema = z
  .object({
    Id: z.string(),
    Name: z.string(),
    Type: z.string().nullish(),
    RunTimeTicks: z.number().nullish(),
    SeriesName: z.string().nullish(),
    SeasonName: z.string().nullish(),
    IndexNumber: z.number().int().nullish(),
    ParentIndexNumber: z.number().int().nullish(),
    Album: z.string().nullish(),
    AlbumArtist: z.string().nullish(),
    Artists: z.array(z.string()).nullish(),
    ProductionYear: z.number().int().nullish(),
  })
  .passthrough();

export const RawPlayStateSchema = z
  .object({
    PositionTicks: z.number().nullish(),
    CanSeek: z.boolean().nullish(),
    IsPaused: z.boolean().nullish(),
    IsMuted: z.boolean().nullish(),
    VolumeLevel: z.number().nullish(),
    PlayMethod: z.string().nullish(),
  })
  .passthrough();

export const RawSessionSchema = z
  .object({
    Id: z.string(),
    DeviceId: z.string().min(1),
    DeviceName: z.string(),
    Client: z.string(),
    ApplicationVersion: z.string().nullish(),
    UserId: z.string().nullish(),
    UserName: z.string().nullish(),
    SupportsRemoteControl: z.boolean().nullish(),
    SupportedCommands: z.array(z.string()).nullish(),
    PlayableMediaTypes: z.array(z.string()).nullish(),
    NowPlayingItem: RawMediaItemSchema.nullish(),
    PlayState: RawPlayStateSchema.nullish(),
    NowPlayingQueue: z.array(z.object({ Id: z.string().optional() }).passthrough()).nullish(),
    LastActivityDate: z.string().nullish(),
  })
  .passthrough();

/** PlaybackProgress / PlaybackStart / PlaybackStopped push payloads. */
export const RawPlaybackEventSchema = z
  .object({
    DeviceId: z.string().min(1),
    PlaySessionId: z.string().nullish(),
    UserId: z.string().nullish(),
    PositionTicks: z.number().nullish(),
    IsPaused: z.boolean().nullish(),
    PlayState: RawPlayStateSchema.nullish(),
    NowPlayingItem: RawMediaItemSchema.nullish(),
  })
  .passthrough();

export const RawSessionEndedSchema = z
  .object({
    DeviceId: z.string().min(1),
    Id: z.string().nullish(),
  })
  .passthrough();

/** Envelope of every push frame */
export const RawPushFrameSchema = z
  .object({
    MessageType: z.string().min(1),
    Data: z.unknown().optional(),
  })
  .passthrough();

export const RawLibraryChangedSchema = z
  .object({
    ItemsAdded: z.array(z.string()).default([]),
    ItemsUpdated: z.array(z.string()).default([]),
    ItemsRemoved: z.array(z.string()).default([]),
    FoldersAddedTo: z.array(z.string()).default([]),
    FoldersRemovedFrom: z.array(z.string()).default([]),
  })
  .passthrough();

export const RawUserDataChangedSchema = z
  .object({
    UserId: z.string().nullish(),
    UserDataList: z
      .array(
        z
          .object({
            ItemId: z.string().nullish(),
            UserId: z.string().nullish(),
            IsFavorite: z.boolean().nullish(),
            Played: z.boolean().nullish(),
            PlaybackPositionTicks: z.number().nullish(),
            PlayCount: z.number().nullish(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const RawNotificationSchema = z
  .object({
    Name: z.string().default(''),
    Description: z.string().nullish(),
    Level: z.string().default('Normal'),
    NotificationType: z.string().nullish(),
    Url: z.string().nullish(),
    Date: z.string().nullish(),
  })
  .passthrough();

export const RawUserChangedSchema = z
  .object({
    UserId: z.string().min(1),
    UserName: z.string().nullish(),
  })
  .passthrough();

export const RawServerInfoSchema = z
  .object({
    Id: z.string(),
    ServerName: z.string(),
    Version: z.string().nullish(),
  })
  .passthrough();

export const RawItemsPageSchema = z
  .object({
    Items: z
      .array(
        z
          .object({
            Id: z.string(),
            Name: z.string(),
            Type: z.string().nullish(),
            IsFolder: z.boolean().nullish(),
          })
          .passthrough()
      ),
    TotalRecordCount: z.number().int(),
    StartIndex: z.number().int().nullish(),
  })
  .passthrough();

export type RawMediaItem = z.infer<typeof RawMediaItemSchema>;
export type RawPlayState = z.infer<typeof RawPlayStateSchema>;
export type RawSession = z.infer<typeof RawSessionSchema>;
export type RawPlaybackEvent = z.infer<typeof RawPlaybackEventSchema>;
export type RawSessionEnded = z.infer<typeof RawSessionEndedSchema>;
export type RawPushFrame = z.infer<typeof RawPushFrameSchema>;
export type RawLibraryChanged = z.infer<typeof RawLibraryChangedSchema>;
export type RawUserDataChanged = z.infer<typeof RawUserDataChangedSchema>;
export type RawNotification = z.infer<typeof RawNotificationSchema>;
export type RawUserChanged = z.infer<typeof RawUserChangedSchema>;
export type RawServerInfo = z.infer<typeof RawServerInfoSchema>;
export type RawItemsPage = z.infer<typeof RawItemsPageSchema>;
