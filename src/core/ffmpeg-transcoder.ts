/**
 * ffmpeg Transcoder - segmented HLS/DASH download remuxed into mp4
 *
 * Streams are copied, not re-encoded. Progress is the ratio of ffmpeg's
 * reported output time to the input duration; live streams without a
 * duration report no progress until they finish.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import type { Readable } from 'stream';
import { toTransferFailure } from '../types/errors.js';
import type { MediaTranscoder, TransferFailure, TransferOptions, TransferResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { formatHeaderBlock } from './request-headers.js';

/**
 * The part of a child process the transcoder uses
 */
export interface TranscoderProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (command: string, args: string[]) => TranscoderProcess;

export interface FfmpegTranscoderOptions {
  ffmpegPath?: string;
  spawn?: SpawnProcess;
}

const STDERR_TAIL_LINES = 10;

const defaultSpawn: SpawnProcess = (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * ffmpeg argument list for a header-carrying copy remux
 */
export function buildFfmpegArgs(manifestUrl: string, headers: Readonly<Record<string, string>>, destination: string): string[] {
  const args = ['-hide_banner', '-nostdin', '-y'];
  const headerBlock = formatHeaderBlock(headers);
  if (headerBlock) {
    args.push('-headers', headerBlock);
  }
  args.push(
    '-i', manifestUrl,
    '-c', 'copy',
    '-bsf:a', 'aac_adtstoasc',
    '-progress', 'pipe:1',
    '-nostats',
    destination
  );
  return args;
}

/**
 * `Duration: 00:01:02.50` → 62.5
 */
export function parseDurationSeconds(line: string): number | null {
  const match = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(line);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

/**
 * `out_time_us=1500000` (or the misnamed out_time_ms, also microseconds) → 1.5
 */
export function parseProgressSeconds(line: string): number | null {
  const match = /^out_time_(?:us|ms)=(\d+)$/.exec(line.trim());
  return match ? Number(match[1]) / 1_000_000 : null;
}

/**
 * Map ffmpeg's last stderr lines to a transfer failure
 */
export function describeFfmpegFailure(exitCode: number | null, stderrTail: readonly string[]): TransferFailure {
  const output = stderrTail.join('\n');
  const message = `ffmpeg exited with code ${exitCode ?? 'null'}${output ? `: ${stderrTail[stderrTail.length - 1]}` : ''}`;

  const status = /(?:Server returned|HTTP error) (\d)(\d\d|XX)/.exec(output);
  if (status) {
    const code = status[2] === 'XX' ? Number(status[1]) * 100 : Number(`${status[1]}${status[2]}`);
    return { message, status: code };
  }
  if (/Invalid data found when processing input|Failed to open segment|Error when loading first segment/i.test(output)) {
    return { message, code: 'MALFORMED_MANIFEST' };
  }
  if (/No space left on device/i.test(output)) {
    return { message, code: 'ENOSPC' };
  }
  if (/Permission denied/i.test(output)) {
    return { message, code: 'EACCES' };
  }
  if (/Connection timed out/i.test(output)) {
    return { message, code: 'ETIMEDOUT' };
  }
  if (/Connection refused/i.test(output)) {
    return { message, code: 'ECONNREFUSED' };
  }
  if (/Connection reset/i.test(output)) {
    return { message, code: 'ECONNRESET' };
  }
  return { message };
}

export class FfmpegTranscoder implements MediaTranscoder {
  private readonly ffmpegPath: string;
  private readonly spawnProcess: SpawnProcess;

  constructor(options: FfmpegTranscoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  async transcode(
    manifestUrl: string,
    headers: Record<string, string>,
    destination: string,
    options: TransferOptions
  ): Promise<TransferResult> {
    const { signal, onProgress } = options;
    if (signal.aborted) {
      return { bytesWritten: 0, error: { message: 'Transcode aborted', code: 'ABORT_ERR' } };
    }

    try {
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    } catch (error) {
      return { bytesWritten: 0, error: toTransferFailure(error) };
    }

    const startTime = Date.now();
    const failure = await this.run(buildFfmpegArgs(manifestUrl, headers, destination), signal, onProgress);

    if (failure) {
      await fs.promises.rm(destination, { force: true });
      logger.transfer.warn('Transcode failed', { url: manifestUrl, error: failure.message });
      return { bytesWritten: 0, error: failure };
    }

    const bytesWritten = await fileSize(destination);
    onProgress?.(1);
    logger.transfer.timed('Transcoded', startTime, { url: manifestUrl, destination, bytesWritten });
    return { bytesWritten };
  }

  /**
   * Resolves with null on a clean exit, otherwise with the failure
   */
  private run(args: string[], signal: AbortSignal, onProgress?: (fraction: number) => void): Promise<TransferFailure | null> {
    return new Promise<TransferFailure | null>((resolve) => {
      const child = this.spawnProcess(this.ffmpegPath, args);
      const stderrTail: string[] = [];
      let durationSeconds: number | null = null;
      let settled = false;
      let aborted = false;

      const settle = (result: TransferFailure | null) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      };

      // The process keeps writing until it exits, so an abort settles on close
      const onAbort = () => {
        aborted = true;
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort);

      if (child.stderr) {
        readline.createInterface({ input: child.stderr }).on('line', (line: string) => {
          durationSeconds ??= parseDurationSeconds(line);
          stderrTail.push(line);
          if (stderrTail.length > STDERR_TAIL_LINES) {
            stderrTail.shift();
          }
        });
      }

      if (child.stdout) {
        readline.createInterface({ input: child.stdout }).on('line', (line: string) => {
          const seconds = parseProgressSeconds(line);
          if (seconds !== null && durationSeconds) {
            onProgress?.(Math.min(seconds / durationSeconds, 1));
          }
        });
      }

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (aborted) {
          settle({ message: 'Transcode aborted', code: 'ABORT_ERR' });
          return;
        }
        if (error.code === 'ENOENT') {
          settle({ message: `ffmpeg not found at ${this.ffmpegPath}`, code: 'TRANSCODER_MISSING' });
          return;
        }
        settle({ message: error.message, code: error.code });
      });

      child.on('close', (code: number | null) => {
        if (aborted) {
          settle({ message: 'Transcode aborted', code: 'ABORT_ERR' });
          return;
        }
        settle(code === 0 ? null : describeFfmpegFailure(code, stderrTail));
      });
    });
  }
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await fs.promises.stat(file)).size;
  } catch (error) {
    logger.transfer.debug('Could not stat transcoder output', { file, error: String(error) });
    return 0;
  }
}
