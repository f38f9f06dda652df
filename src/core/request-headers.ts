/**
 * Download request headers
 *
 * Media servers commonly check Referer, Origin and cookies, so a download
 * replays what the page sent over a browser-like default set.
 */

import type { EngineCookie, MediaRecord } from '../types/index.js';

export const DEFAULT_DOWNLOAD_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: '*/*',
  'Accept-Language': 'en-US,en;q=0.9',
  // Progress is computed from content-length, which only matches the body unencoded
  'Accept-Encoding': 'identity',
  'Sec-Fetch-Dest': 'video',
  'Sec-Fetch-Mode': 'no-cors',
  'Sec-Fetch-Site': 'cross-site',
};

/** Set by the transport itself, or meaningless outside the original connection */
const DROPPED_HEADERS = new Set([
  'host',
  'connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'content-length',
  'range',
]);

/**
 * `user-agent` → `User-Agent`
 */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join('-');
}

function originOf(url: string): string | undefined {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return undefined;
  }
}

/**
 * Join context cookies into a Cookie header, keeping any cookie the page
 * already sent
 */
function mergeCookies(existing: string | undefined, cookies: readonly EngineCookie[]): string | undefined {
  const pairs = existing ? existing.split(';').map((pair) => pair.trim()).filter(Boolean) : [];
  const names = new Set(pairs.map((pair) => pair.split('=')[0]));
  for (const cookie of cookies) {
    if (!names.has(cookie.name)) {
      names.add(cookie.name);
      pairs.push(`${cookie.name}=${cookie.value}`);
    }
  }
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}

/**
 * Defaults, overlaid by the captured request headers, completed with
 * Referer, Origin and the owning context's cookies.
 */
export function buildRequestHeaders(record: MediaRecord, cookies: readonly EngineCookie[] = []): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [name, value] of Object.entries(DEFAULT_DOWNLOAD_HEADERS)) {
    headers[name] = value;
  }
  for (const [name, value] of Object.entries(record.headers)) {
    const lower = name.toLowerCase();
    if (name.startsWith(':') || DROPPED_HEADERS.has(lower)) {
      continue;
    }
    headers[canonicalHeaderName(name)] = value;
  }

  const mediaOrigin = originOf(record.url);
  const pageOrigin = record.pageUrl ? originOf(record.pageUrl) : undefined;

  if (!headers.Referer) {
    const referer = record.pageUrl ?? (mediaOrigin ? `${mediaOrigin}/` : undefined);
    if (referer) {
      headers.Referer = referer;
    }
  }
  if (pageOrigin) {
    headers.Origin = pageOrigin;
  } else if (!headers.Origin && mediaOrigin) {
    headers.Origin = mediaOrigin;
  }

  const cookie = mergeCookies(headers.Cookie, cookies);
  if (cookie) {
    headers.Cookie = cookie;
  }

  return headers;
}

/**
 * ffmpeg's -headers option takes CRLF-terminated lines
 */
export function formatHeaderBlock(headers: Readonly<Record<string, string>>): string {
  return Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}\r\n`)
    .join('');
}
