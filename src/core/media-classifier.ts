/**
 * Media Classifier
 *
 * Maps an observed response to a MediaType from its URL suffix, its
 * content type and the engine resource type. Pure and constant-time, so
 * the Interceptor can call it from inside the engine's event callback.
 */

import type { MediaType } from '../types/index.js';

export interface ClassificationInput {
  url: string;
  contentType?: string;
  resourceType?: string;
}

export interface MediaClassification {
  type: MediaType;
  /** Set when suffix and content type named different containers */
  ambiguous?: readonly [MediaType, MediaType];
}

/** Analytics, ad and font hosts that never serve downloadable media */
const SKIP_PATTERNS = [
  'google-analytics',
  'googletagmanager',
  'googleads',
  'doubleclick',
  'googlesyndication',
  'facebook.com/tr',
  'analytics',
  'tracking',
  'beacon',
  'pixel',
  'telemetry',
  'favicon',
  'fonts.googleapis',
  'fonts.gstatic',
];

const STATIC_EXTENSIONS = new Set([
  'js', 'mjs', 'css', 'map',
  'woff', 'woff2', 'ttf', 'eot', 'otf',
  'png', 'jpg', 'jpeg', 'gif', 'svg', 'ico', 'webp', 'avif',
]);

/** HLS/DASH segments are fetched through their manifest */
const SEGMENT_EXTENSIONS = new Set(['ts', 'm4s']);

const SUFFIX_TYPES: ReadonlyMap<string, MediaType> = new Map<string, MediaType>([
  ['mp4', 'mp4'],
  ['mov', 'mp4'],
  ['m4v', 'mp4'],
  ['m3u8', 'm3u8'],
  ['mpd', 'mpd'],
  ['webm', 'other'],
  ['mp3', 'other'],
  ['m4a', 'other'],
  ['aac', 'other'],
  ['ogg', 'other'],
  ['wav', 'other'],
  ['flac', 'other'],
]);

const CONTENT_TYPES: ReadonlyMap<string, MediaType> = new Map<string, MediaType>([
  ['video/mp4', 'mp4'],
  ['video/quicktime', 'mp4'],
  ['video/x-m4v', 'mp4'],
  ['application/vnd.apple.mpegurl', 'm3u8'],
  ['application/x-mpegurl', 'm3u8'],
  ['audio/mpegurl', 'm3u8'],
  ['audio/x-mpegurl', 'm3u8'],
  ['application/dash+xml', 'mpd'],
]);

/**
 * Classify a response. Returns null for anything that is not media.
 */
export function classifyMedia(input: ClassificationInput): MediaClassification | null {
  let parsed: URL;
  try {
    parsed = new URL(input.url);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  const lowerUrl = input.url.toLowerCase();
  if (SKIP_PATTERNS.some((pattern) => lowerUrl.includes(pattern))) {
    return null;
  }

  const path = parsed.pathname.toLowerCase();
  const extension = extensionOf(path);
  if (STATIC_EXTENSIONS.has(extension) || SEGMENT_EXTENSIONS.has(extension)) {
    return null;
  }

  const fromSuffix = typeFromPath(path, extension);
  const fromContentType = typeFromContentType(input.contentType);

  if (fromSuffix && fromContentType) {
    if (fromSuffix !== fromContentType) {
      return { type: 'other', ambiguous: [fromSuffix, fromContentType] };
    }
    return { type: fromSuffix };
  }

  const type = fromSuffix ?? fromContentType;
  if (type) {
    return { type };
  }

  if (input.resourceType === 'media') {
    return { type: 'other' };
  }

  return null;
}

/**
 * Classify from the URL alone, for downloads of URLs no page reported
 */
export function classifyUrl(url: string): MediaType {
  return classifyMedia({ url })?.type ?? 'other';
}

function extensionOf(path: string): string {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  return dot >= 0 ? segment.slice(dot + 1) : '';
}

function typeFromPath(path: string, extension: string): MediaType | undefined {
  const bySuffix = SUFFIX_TYPES.get(extension);
  if (bySuffix) {
    return bySuffix;
  }
  if (path.includes('manifest')) {
    if (path.includes('hls')) return 'm3u8';
    if (path.includes('dash')) return 'mpd';
  }
  return undefined;
}

function typeFromContentType(contentType: string | undefined): MediaType | undefined {
  if (!contentType) {
    return undefined;
  }
  const mime = contentType.split(';')[0].trim().toLowerCase();
  const known = CONTENT_TYPES.get(mime);
  if (known) {
    return known;
  }
  if (mime.startsWith('video/') || mime.startsWith('audio/')) {
    return 'other';
  }
  return undefined;
}
