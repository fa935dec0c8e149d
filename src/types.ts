export type Reference =
  | { readonly kind: 'direct-url'; readonly url: string }
  | { readonly kind: 'video-id'; readonly id: string }
  | { readonly kind: 'search-query'; readonly text: string }
  | { readonly kind: 'playlist-url'; readonly url: string };

export interface Metadata {
  readonly title: string;
  readonly durationSeconds: number;
  readonly durationDisplay: string;
  readonly videoID: string;
  readonly thumbnailURL: string;
}

export type AcquisitionMode =
  | { readonly kind: 'audio-only' }
  | { readonly kind: 'video-up-to-720' }
  | { readonly kind: 'named-song-audio'; readonly formatId: string; readonly title: string }
  | { readonly kind: 'named-song-video'; readonly formatId: string; readonly title: string };

export interface AcquisitionResult {
  /** Filesystem path, or a remote URL when `isDirect` is set. */
  readonly location: string;
  readonly isDirect: boolean;
  readonly succeeded: boolean;
  readonly reason?: string;
}

export type EntityKind = 'url' | 'text-link' | (string & {});

/**
 * Formatting span attached to a chat message. Offsets index the message text in
 * UTF-16 code units, which is how JavaScript strings are indexed.
 */
export interface MessageEntity {
  readonly kind: EntityKind;
  readonly offset: number;
  readonly length: number;
  readonly url?: string;
}

export interface ChatMessage {
  readonly text?: string;
  readonly caption?: string;
  readonly entities?: readonly MessageEntity[];
  readonly captionEntities?: readonly MessageEntity[];
  readonly replyTo?: ChatMessage;
}

export interface FormatDescriptor {
  readonly formatId: string;
  readonly ext: string;
  readonly height: number | null;
  readonly note: string;
  readonly audioOnly: boolean;
  readonly videoOnly: boolean;
  readonly filesize: number | null;
}

export interface DownloadHooks {
  readonly signal?: AbortSignal;
  readonly onProgress?: (percent: number) => void;
}

export const audioOnly = (): AcquisitionMode => ({ kind: 'audio-only' });

export const videoUpTo720 = (): AcquisitionMode => ({ kind: 'video-up-to-720' });

export const namedSongAudio = (formatId: string, title: string): AcquisitionMode => ({
  kind: 'named-song-audio',
  formatId,
  title,
});

export const namedSongVideo = (formatId: string, title: string): AcquisitionMode => ({
  kind: 'named-song-video',
  formatId,
  title,
});
