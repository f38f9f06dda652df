/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration. Programmatic overrides take precedence over the
 * environment, field by field.
 */

import {
  logConfigSchema,
  engineConfigSchema,
  poolConfigSchema,
  timeoutsConfigSchema,
  downloadsConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type EngineConfig,
  type PoolConfig,
  type TimeoutsConfig,
  type DownloadsConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from './config-schemas.js';

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig() {
  return {
    level: process.env.LOG_LEVEL,
    prettyPrint: process.env.LOG_PRETTY,
  };
}

function mapEnvToEngineConfig() {
  return {
    headless: process.env.TABSTREAM_HEADLESS,
    executablePath: process.env.TABSTREAM_BROWSER_PATH,
    channel: process.env.TABSTREAM_BROWSER_CHANNEL,
    startTimeoutMs: process.env.TABSTREAM_ENGINE_START_TIMEOUT,
  };
}

function mapEnvToPoolConfig() {
  return {
    maxContexts: process.env.TABSTREAM_MAX_CONTEXTS,
    maxPages: process.env.TABSTREAM_MAX_PAGES,
  };
}

function mapEnvToTimeoutsConfig() {
  return {
    navigationMs: process.env.TABSTREAM_NAVIGATION_TIMEOUT,
    pageAcquireMs: process.env.TABSTREAM_PAGE_TIMEOUT,
    contextAcquireMs: process.env.TABSTREAM_CONTEXT_TIMEOUT,
    captureWindowMs: process.env.TABSTREAM_CAPTURE_WINDOW,
  };
}

function mapEnvToDownloadsConfig() {
  return {
    directory: process.env.TABSTREAM_DOWNLOAD_DIR,
    queueCapacity: process.env.TABSTREAM_QUEUE_CAPACITY,
    maxConcurrent: process.env.TABSTREAM_MAX_CONCURRENT_DOWNLOADS,
    maxAttempts: process.env.TABSTREAM_MAX_ATTEMPTS,
    initialBackoffMs: process.env.TABSTREAM_BACKOFF_INITIAL,
    maxBackoffMs: process.env.TABSTREAM_BACKOFF_MAX,
    backoffMultiplier: process.env.TABSTREAM_BACKOFF_MULTIPLIER,
    transferTimeoutMs: process.env.TABSTREAM_TRANSFER_TIMEOUT,
    historyLimit: process.env.TABSTREAM_DOWNLOAD_HISTORY,
    ffmpegPath: process.env.TABSTREAM_FFMPEG_PATH,
    autoDownload: process.env.TABSTREAM_AUTO_DOWNLOAD,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration.
 */
export function parseLogConfig(overrides: OrchestratorConfigInput['log'] = {}): LogConfig {
  const result = logConfigSchema.safeParse({ ...mapEnvToLogConfig(), ...overrides });
  if (!result.success) {
    throw new ConfigValidationError('log', result.error);
  }
  return result.data;
}

/**
 * Parse and validate browser engine configuration.
 */
export function parseEngineConfig(overrides: OrchestratorConfigInput['engine'] = {}): EngineConfig {
  const result = engineConfigSchema.safeParse({ ...mapEnvToEngineConfig(), ...overrides });
  if (!result.success) {
    throw new ConfigValidationError('engine', result.error);
  }
  return result.data;
}

/**
 * Parse and validate resource pool configuration.
 */
export function parsePoolConfig(overrides: OrchestratorConfigInput['pool'] = {}): PoolConfig {
  const result = poolConfigSchema.safeParse({ ...mapEnvToPoolConfig(), ...overrides });
  if (!result.success) {
    throw new ConfigValidationError('pool', result.error);
  }
  return result.data;
}

/**
 * Parse and validate engine-facing timeouts.
 */
export function parseTimeoutsConfig(overrides: OrchestratorConfigInput['timeouts'] = {}): TimeoutsConfig {
  const result = timeoutsConfigSchema.safeParse({ ...mapEnvToTimeoutsConfig(), ...overrides });
  if (!result.success) {
    throw new ConfigValidationError('timeouts', result.error);
  }
  return result.data;
}

/**
 * Parse and validate download dispatcher configuration.
 */
export function parseDownloadsConfig(overrides: OrchestratorConfigInput['downloads'] = {}): DownloadsConfig {
  const result = downloadsConfigSchema.safeParse({ ...mapEnvToDownloadsConfig(), ...overrides });
  if (!result.success) {
    throw new ConfigValidationError('downloads', result.error);
  }
  return result.data;
}

/**
 * Load the complete configuration.
 *
 * @throws ConfigValidationError naming the first invalid section
 */
export function loadConfig(overrides: OrchestratorConfigInput = {}): OrchestratorConfig {
  return {
    log: parseLogConfig(overrides.log),
    engine: parseEngineConfig(overrides.engine),
    pool: parsePoolConfig(overrides.pool),
    timeouts: parseTimeoutsConfig(overrides.timeouts),
    downloads: parseDownloadsConfig(overrides.downloads),
  };
}

/**
 * Check the configuration without throwing.
 */
export function isConfigValid(overrides: OrchestratorConfigInput = {}): { valid: boolean; error?: string } {
  try {
    loadConfig(overrides);
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { valid: false, error: error.message };
    }
    return { valid: false, error: String(error) };
  }
}
