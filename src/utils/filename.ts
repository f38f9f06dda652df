/**
 * Download filename helpers
 */

import type { MediaType } from '../types/index.js';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_FILENAME_LENGTH = 200;

/** Segmented media is remuxed into an mp4 container */
const FALLBACK_EXTENSIONS: Record<MediaType, string> = {
  mp4: '.mp4',
  m3u8: '.mp4',
  mpd: '.mp4',
  other: '.bin',
};

/**
 * Replace reserved characters, drop control characters and cap the
 * length while keeping the extension.
 */
export function sanitizeFilename(filename: string): string {
  let name = Array.from(filename.replace(INVALID_FILENAME_CHARS, '_'))
    .filter((char) => char.charCodeAt(0) >= 32)
    .join('');

  if (name.length > MAX_FILENAME_LENGTH) {
    const dot = name.lastIndexOf('.');
    const ext = dot > 0 ? name.slice(dot + 1) : '';
    name = ext
      ? `${name.slice(0, MAX_FILENAME_LENGTH - ext.length - 1)}.${ext}`
      : name.slice(0, MAX_FILENAME_LENGTH);
  }

  return name.trim();
}

/**
 * Derive a filename from the last path segment of a media URL, falling
 * back to `video_<unix seconds><ext>`.
 */
export function filenameFromUrl(url: string, type: MediaType, now: number = Date.now()): string {
  let segment = '';
  try {
    const pathname = decodeURIComponent(new URL(url).pathname);
    segment = pathname.split('/').pop() ?? '';
  } catch {
    segment = '';
  }

  if (segment.includes('.')) {
    const name = sanitizeFilename(segment);
    if (name) {
      return forceExtension(name, type);
    }
  }

  return `video_${Math.floor(now / 1000)}${FALLBACK_EXTENSIONS[type]}`;
}

/**
 * Manifests are written as mp4 files; other types keep their own name
 */
function forceExtension(name: string, type: MediaType): string {
  if (type !== 'm3u8' && type !== 'mpd') {
    return name;
  }
  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  return `${stem}.mp4`;
}

/**
 * Insert a suffix before the extension: `clip.mp4` + `ab12` → `clip-ab12.mp4`
 */
export function withSuffix(filename: string, suffix: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) {
    return `${filename}-${suffix}`;
  }
  return `${filename.slice(0, dot)}-${suffix}${filename.slice(dot)}`;
}
