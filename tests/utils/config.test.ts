/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { booleanStringSchema, ConfigValidationError } from '../../src/utils/config-schemas.js';
import {
  isConfigValid,
  loadConfig,
  parseDownloadsConfig,
  parsePoolConfig,
} from '../../src/utils/env-parser.js';

describe('configuration', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('TABSTREAM_') || key === 'LOG_LEVEL' || key === 'LOG_PRETTY') {
        delete process.env[key];
      }
    }
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  describe('defaults', () => {
    it('fills every section', () => {
      const config = loadConfig();

      expect(config.log).toEqual({ level: 'info', prettyPrint: false });
      expect(config.engine).toEqual({ headless: true, startTimeoutMs: 30000 });
      expect(config.pool).toEqual({ maxContexts: 10, maxPages: 5, tombstoneLimit: 256 });
      expect(config.timeouts).toEqual({
        navigationMs: 30000,
        pageAcquireMs: 10000,
        contextAcquireMs: 10000,
        captureWindowMs: 3000,
      });
      expect(config.downloads).toMatchObject({
        directory: './downloads',
        queueCapacity: 100,
        maxConcurrent: 3,
        maxAttempts: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
        backoffMultiplier: 2,
        historyLimit: 256,
        ffmpegPath: 'ffmpeg',
        autoDownload: [],
      });
    });
  });

  describe('environment', () => {
    it('parses numbers, booleans and lists from strings', () => {
      process.env.TABSTREAM_MAX_CONTEXTS = '4';
      process.env.TABSTREAM_HEADLESS = 'false';
      process.env.TABSTREAM_AUTO_DOWNLOAD = 'mp4, m3u8';
      process.env.LOG_LEVEL = 'debug';

      const config = loadConfig();

      expect(config.pool.maxContexts).toBe(4);
      expect(config.engine.headless).toBe(false);
      expect(config.downloads.autoDownload).toEqual(['mp4', 'm3u8']);
      expect(config.log.level).toBe('debug');
    });

    it('lets overrides win over the environment', () => {
      process.env.TABSTREAM_MAX_CONTEXTS = '4';
      process.env.TABSTREAM_DOWNLOAD_DIR = '/from-env';

      const config = loadConfig({ pool: { maxContexts: 2 }, downloads: { autoDownload: ['mpd'] } });

      expect(config.pool.maxContexts).toBe(2);
      expect(config.downloads.directory).toBe('/from-env');
      expect(config.downloads.autoDownload).toEqual(['mpd']);
    });
  });

  describe('validation', () => {
    it('names the section and field of a bad number', () => {
      process.env.TABSTREAM_MAX_PAGES = 'abc';

      expect(() => parsePoolConfig()).toThrow(ConfigValidationError);
      try {
        parsePoolConfig();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.section).toBe('pool');
          expect(error.message).toContain('Configuration validation failed for pool:\n  - maxPages:');
        }
      }
    });

    it('rejects unknown media types in the auto-download list', () => {
      expect(() => parseDownloadsConfig({ autoDownload: 'mp4,avi' })).toThrow(/  - autoDownload/);
    });

    it('rejects a backoff cap below the initial delay', () => {
      expect(() => parseDownloadsConfig({ initialBackoffMs: 5000, maxBackoffMs: 1000 })).toThrow(
        '  - maxBackoffMs: maxBackoffMs must be greater than or equal to initialBackoffMs'
      );
    });

    it('rejects a pool without capacity', () => {
      expect(() => loadConfig({ pool: { maxContexts: 0 } })).toThrow(/Configuration validation failed for pool/);
    });

    it('reports validity without throwing', () => {
      expect(isConfigValid()).toEqual({ valid: true });

      const result = isConfigValid({ downloads: { maxConcurrent: 0 } });
      expect(result.valid).toBe(false);
      expect(result.error).toContain('Configuration validation failed for downloads');
    });
  });

  describe('booleanStringSchema', () => {
    it('accepts booleans and boolean-like strings', () => {
      expect(booleanStringSchema.parse(true)).toBe(true);
      expect(booleanStringSchema.parse('yes')).toBe(true);
      expect(booleanStringSchema.parse('1')).toBe(true);
      expect(booleanStringSchema.parse('no')).toBe(false);
      expect(booleanStringSchema.parse(undefined)).toBe(false);
    });
  });
});
