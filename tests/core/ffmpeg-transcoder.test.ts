import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  FfmpegTranscoder,
  buildFfmpegArgs,
  describeFfmpegFailure,
  parseDurationSeconds,
  parseProgressSeconds,
  type TranscoderProcess,
} from '../../src/core/ffmpeg-transcoder.js';

class FakeProcess extends EventEmitter implements TranscoderProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((_signal?: NodeJS.Signals | number) => true);
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('buildFfmpegArgs', () => {
  it('passes headers as a CRLF block and copies streams', () => {
    expect(buildFfmpegArgs('https://cdn.test/master.m3u8', { Referer: 'https://site.test/' }, '/out/a.mp4')).toEqual([
      '-hide_banner',
      '-nostdin',
      '-y',
      '-headers',
      'Referer: https://site.test/\r\n',
      '-i',
      'https://cdn.test/master.m3u8',
      '-c',
      'copy',
      '-bsf:a',
      'aac_adtstoasc',
      '-progress',
      'pipe:1',
      '-nostats',
      '/out/a.mp4',
    ]);
  });

  it('leaves out -headers when there are none', () => {
    expect(buildFfmpegArgs('https://cdn.test/a.mpd', {}, '/out/a.mp4')).not.toContain('-headers');
  });
});

describe('ffmpeg output parsing', () => {
  it('reads the input duration', () => {
    expect(parseDurationSeconds('  Duration: 00:01:02.50, start: 0.000000, bitrate: N/A')).toBe(62.5);
    expect(parseDurationSeconds('Stream #0:0: Video: h264')).toBeNull();
  });

  it('reads the output time in microseconds', () => {
    expect(parseProgressSeconds('out_time_us=1500000')).toBe(1.5);
    expect(parseProgressSeconds('out_time_ms=1500000')).toBe(1.5);
    expect(parseProgressSeconds('out_time=00:00:01.500000')).toBeNull();
  });

  it('classifies failures from the stderr tail', () => {
    expect(describeFfmpegFailure(1, ['Server returned 404 Not Found'])).toEqual({
      message: 'ffmpeg exited with code 1: Server returned 404 Not Found',
      status: 404,
    });
    expect(describeFfmpegFailure(1, ['HTTP error 5XX Server Error'])).toEqual({
      message: 'ffmpeg exited with code 1: HTTP error 5XX Server Error',
      status: 500,
    });
    expect(describeFfmpegFailure(1, ['master.m3u8: Invalid data found when processing input'])).toEqual({
      message: 'ffmpeg exited with code 1: master.m3u8: Invalid data found when processing input',
      code: 'MALFORMED_MANIFEST',
    });
    expect(describeFfmpegFailure(null, [])).toEqual({ message: 'ffmpeg exited with code null' });
  });
});

describe('FfmpegTranscoder', () => {
  let dir: string;
  let spawned: Array<{ command: string; args: string[]; child: FakeProcess }>;
  let transcoder: FfmpegTranscoder;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tabstream-ffmpeg-'));
    spawned = [];
    transcoder = new FfmpegTranscoder({
      ffmpegPath: '/opt/ffmpeg',
      spawn: (command, args) => {
        const child = new FakeProcess();
        spawned.push({ command, args, child });
        return child;
      },
    });
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  async function started(): Promise<FakeProcess> {
    await vi.waitFor(() => expect(spawned).toHaveLength(1));
    return spawned[0].child;
  }

  it('reports progress from the output time and the final size', async () => {
    const destination = path.join(dir, 'master.mp4');
    const progress: number[] = [];

    const transcoding = transcoder.transcode('https://cdn.test/master.m3u8', {}, destination, {
      signal: new AbortController().signal,
      onProgress: (fraction) => progress.push(fraction),
    });
    const child = await started();
    expect(spawned[0].command).toBe('/opt/ffmpeg');

    child.stderr.write('  Duration: 00:00:10.00, start: 0.000000, bitrate: N/A\n');
    await nextTurn();
    child.stdout.write('out_time_us=5000000\n');
    await nextTurn();
    await fs.promises.writeFile(destination, 'abc');
    child.emit('close', 0);

    await expect(transcoding).resolves.toEqual({ bytesWritten: 3 });
    expect(progress).toEqual([0.5, 1]);
  });

  it('maps an HTTP failure in the stderr tail to a status', async () => {
    const transcoding = transcoder.transcode('https://cdn.test/master.m3u8', {}, path.join(dir, 'master.mp4'), {
      signal: new AbortController().signal,
    });
    const child = await started();

    child.stderr.write('Server returned 403 Forbidden\n');
    await nextTurn();
    child.emit('close', 1);

    await expect(transcoding).resolves.toEqual({
      bytesWritten: 0,
      error: { message: 'ffmpeg exited with code 1: Server returned 403 Forbidden', status: 403 },
    });
  });

  it('reports a missing ffmpeg binary', async () => {
    const transcoding = transcoder.transcode('https://cdn.test/master.m3u8', {}, path.join(dir, 'master.mp4'), {
      signal: new AbortController().signal,
    });
    const child = await started();

    child.emit('error', Object.assign(new Error('spawn /opt/ffmpeg ENOENT'), { code: 'ENOENT' }));

    await expect(transcoding).resolves.toEqual({
      bytesWritten: 0,
      error: { message: 'ffmpeg not found at /opt/ffmpeg', code: 'TRANSCODER_MISSING' },
    });
  });

  it('terminates ffmpeg when aborted and settles once it has exited', async () => {
    const controller = new AbortController();
    let settled = false;
    const transcoding = transcoder
      .transcode('https://cdn.test/master.m3u8', {}, path.join(dir, 'master.mp4'), { signal: controller.signal })
      .finally(() => {
        settled = true;
      });
    const child = await started();

    controller.abort();
    await nextTurn();

    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    expect(settled).toBe(false);

    child.emit('close', null);

    await expect(transcoding).resolves.toEqual({
      bytesWritten: 0,
      error: { message: 'Transcode aborted', code: 'ABORT_ERR' },
    });
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await transcoder.transcode('https://cdn.test/master.m3u8', {}, path.join(dir, 'master.mp4'), {
      signal: controller.signal,
    });

    expect(result.error?.code).toBe('ABORT_ERR');
    expect(spawned).toEqual([]);
  });
});
