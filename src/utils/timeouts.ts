/**
 * Central Timeout Configuration
 *
 * All engine-facing and transfer deadlines default from this module.
 * Per-instance values come from the `timeouts` config section.
 */

import { OrchestratorError } from '../types/errors.js';

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Engine launch (browser process start)
   */
  ENGINE_START: 30000,

  /**
   * Creating an isolated context on a running engine
   */
  CONTEXT_CREATE: 10000,

  /**
   * Creating a page inside a context
   */
  PAGE_ACQUIRE: 10000,

  /**
   * Navigation of a page to a task URL
   */
  NAVIGATION: 30000,

  /**
   * How long a background capture page stays open after navigation so
   * that players can request their manifests
   */
  CAPTURE_WINDOW: 3000,

  /**
   * A single transfer attempt (direct fetch or transcode)
   */
  DOWNLOAD_TRANSFER: 60 * 60 * 1000,
} as const;

/**
 * Race an operation against a deadline.
 *
 * When the deadline wins, `onLate` receives the operation's eventual value
 * so that anything it acquired can be disposed of.
 */
export function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => OrchestratorError,
  onLate?: (value: T) => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      settled = true;
      reject(onTimeout());
    }, timeoutMs);

    operation.then(
      (value) => {
        if (settled) {
          onLate?.(value);
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        // Past the deadline the caller has already been rejected
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
