import ytdl from '@distube/ytdl-core';
import type { ChatMessage, MessageEntity, Reference } from './types.js';
import { isYoutubePlaylistUrl, isYoutubeUrl, trimTrackingParameters, WATCH_URL_PREFIX } from './utils.js';

export const directUrl = (url: string): Reference => ({ kind: 'direct-url', url });

export const videoId = (id: string): Reference => ({ kind: 'video-id', id });

export const searchQuery = (text: string): Reference => ({ kind: 'search-query', text });

export const playlistUrl = (url: string): Reference => ({ kind: 'playlist-url', url });

/**
 * Classifies a bare string: platform links become URL references, anything
 * else is search text.
 */
export const classifyReference = (input: string): Reference => {
  const value = input.trim();
  if (isYoutubePlaylistUrl(value)) {
    return playlistUrl(value);
  }
  if (isYoutubeUrl(value)) {
    return directUrl(value);
  }
  return searchQuery(value);
};

/**
 * Whether the text is a link to the target platform.
 */
export const exists = (text: string): boolean => isYoutubeUrl(text);

const urlFromEntity = (entity: MessageEntity, source: string | undefined): string | null => {
  if (entity.kind === 'url') {
    if (!source) {
      return null;
    }
    const slice = source.slice(entity.offset, entity.offset + entity.length);
    return slice.length > 0 ? slice : null;
  }
  if (entity.kind === 'text-link') {
    return entity.url && entity.url.length > 0 ? entity.url : null;
  }
  return null;
};

const urlFromOwnEntities = (message: ChatMessage): string | null => {
  const source = message.text ?? message.caption;
  for (const entity of message.entities ?? []) {
    const url = urlFromEntity(entity, source);
    if (url && isYoutubeUrl(url)) {
      return url;
    }
  }
  for (const entity of message.captionEntities ?? []) {
    const url = urlFromEntity(entity, message.caption ?? message.text);
    if (url && isYoutubeUrl(url)) {
      return url;
    }
  }
  return null;
};

/**
 * Finds the first platform link carried by a message's entities, falling back
 * to the message it replies to. Links to other hosts are skipped. Only one
 * level of reply is followed.
 */
export const extractMessageUrl = (message: ChatMessage): string | null =>
  urlFromOwnEntities(message) ?? (message.replyTo ? urlFromOwnEntities(message.replyTo) : null);

/**
 * Resolves a chat message or a raw string into a reference. Messages without
 * any link yield `null`.
 */
export const resolveReference = (input: ChatMessage | string): Reference | null => {
  if (typeof input === 'string') {
    return input.trim().length > 0 ? classifyReference(input) : null;
  }
  const url = extractMessageUrl(input);
  return url ? classifyReference(url) : null;
};

/**
 * Video id carried by a platform URL, or `null`.
 */
export const extractVideoId = (url: string): string | null => {
  try {
    return ytdl.getURLVideoID(url);
  } catch {
    return null;
  }
};

/**
 * Backend query for a reference: links and ids pass through without their
 * tracking parameters, search text gets the backend's search scheme.
 */
export const toBackendQuery = (reference: Reference, searchPrefix: string): string => {
  switch (reference.kind) {
    case 'direct-url':
    case 'playlist-url':
      return trimTrackingParameters(reference.url);
    case 'video-id':
      return trimTrackingParameters(reference.id);
    case 'search-query':
      return reference.text.startsWith(searchPrefix) ? reference.text : `${searchPrefix}${reference.text}`;
  }
};

/**
 * Plain text handed to the secondary search provider.
 */
export const toSearchText = (reference: Reference, searchPrefix: string): string => {
  switch (reference.kind) {
    case 'search-query':
      return reference.text.startsWith(searchPrefix) ? reference.text.slice(searchPrefix.length) : reference.text;
    case 'video-id':
      return reference.id;
    case 'direct-url':
    case 'playlist-url':
      return extractVideoId(reference.url) ?? trimTrackingParameters(reference.url);
  }
};

/**
 * Link the backend downloads from. Search text keeps its scheme so the backend
 * picks the first hit.
 */
export const toDownloadLink = (reference: Reference, searchPrefix: string): string => {
  if (reference.kind === 'video-id') {
    return `${WATCH_URL_PREFIX}${reference.id}`;
  }
  return toBackendQuery(reference, searchPrefix);
};

export const describeReference = (reference: Reference): string => {
  switch (reference.kind) {
    case 'direct-url':
    case 'playlist-url':
      return reference.url;
    case 'video-id':
      return reference.id;
    case 'search-query':
      return reference.text;
  }
};
