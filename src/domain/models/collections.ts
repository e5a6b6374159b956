import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { formatZodIssues } from "../../utils/validation.ts";
import {
  type DocumentId,
  documentIdSchema,
  type DocumentValue,
  documentValueSchema,
  type StoredDocument,
} from "./document.ts";
import { type ValidationError, validationError } from "./errors.ts";

export const COLLECTIONS = ["settings", "users"] as const;
export type CollectionName = typeof COLLECTIONS[number];

export const USER_FIELDS = ["playlist", "history", "inbox"] as const;
export type UserField = typeof USER_FIELDS[number];

export type PlaylistPerms = {
  read: DocumentId[];
  write: DocumentId[];
  remove: DocumentId[];
};

export type Playlist = {
  tracks: DocumentValue[];
  perms: PlaylistPerms;
  name: string;
  type: "playlist";
};

export type UserDocument = {
  _id: DocumentId;
  playlist: Record<string, Playlist>;
  history: DocumentValue[];
  inbox: DocumentValue[];
};

export const FAVOURITE_PLAYLIST_ID = "200";

/**
 * Guild settings. The known fields are typed; anything else a caller stored
 * is kept as a plain document value.
 */
export const settingsDocumentSchema = z
  .object({
    _id: documentIdSchema,
    prefix: z.string().nullable().optional(),
    lang: z.string().optional(),
    dj: documentIdSchema.optional(),
    queue_type: z.string().optional(),
    "24/7": z.boolean().optional(),
    disabled_vote: z.boolean().optional(),
    volume: z.number().optional(),
    controller: z.boolean().optional(),
    duplicate_track: z.boolean().optional(),
    controller_msg: z.boolean().optional(),
    silent_msg: z.boolean().optional(),
    stage_announce_template: z.string().optional(),
    music_request_channel: z
      .object({
        text_channel_id: documentIdSchema,
        controller_msg_id: documentIdSchema,
      })
      .catchall(documentValueSchema)
      .optional(),
  })
  .catchall(documentValueSchema);

export type SettingsDocument = z.infer<typeof settingsDocumentSchema>;

export function parseSettingsDocument(raw: StoredDocument): Result<SettingsDocument, ValidationError> {
  const parsed = settingsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return err(validationError(`Malformed settings document ${raw._id}`, formatZodIssues(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Describes how documents of one collection are named in the backend and
 * what a freshly created document looks like
 */
export interface CollectionSchema {
  readonly name: CollectionName;
  readonly backendName: string;
  createDefault(id: DocumentId): StoredDocument;
  /**
   * Top-level fields that can be requested on their own, with the value they
   * take when missing
   */
  readonly fields: Readonly<Record<string, () => DocumentValue>>;
}

function favouritePlaylist(): Playlist {
  return {
    tracks: [],
    perms: { read: [], write: [], remove: [] },
    name: "Favourite",
    type: "playlist",
  };
}

export function createDefaultUser(id: DocumentId): UserDocument {
  return {
    _id: id,
    playlist: { [FAVOURITE_PLAYLIST_ID]: favouritePlaylist() },
    history: [],
    inbox: [],
  };
}

export const settingsSchema: CollectionSchema = {
  name: "settings",
  backendName: "Settings",
  createDefault: (id) => ({ _id: id }),
  fields: {},
};

export const usersSchema: CollectionSchema = {
  name: "users",
  backendName: "Users",
  createDefault: (id) => createDefaultUser(id),
  fields: {
    playlist: () => ({ [FAVOURITE_PLAYLIST_ID]: favouritePlaylist() }),
    history: () => [],
    inbox: () => [],
  },
};

export const defaultCollectionSchemas: Readonly<Record<CollectionName, CollectionSchema>> = {
  settings: settingsSchema,
  users: usersSchema,
};

export function isUserField(value: string): value is UserField {
  return USER_FIELDS.some((field) => field === value);
}
