/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * Environment variables and programmatic overrides both go through these
 * schemas, so values arrive either as strings or as their native types.
 */

import { z } from 'zod';
import { MEDIA_TYPES } from '../types/index.js';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a boolean or a boolean-like string.
 * Recognizes 'true', '1', 'yes' as true; every other string as false.
 */
export const booleanStringSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((val) => {
    if (typeof val === 'boolean') return val;
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

/**
 * Schema for a comma-separated list of strings.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

export const mediaTypeSchema = z.enum(MEDIA_TYPES);

/**
 * Media type list given either as an array or as "mp4,m3u8"
 */
export const mediaTypeListSchema = z
  .union([z.array(mediaTypeSchema), commaSeparatedListSchema.pipe(z.array(mediaTypeSchema))])
  .default([]);

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema.default(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// ENGINE CONFIGURATION
// ============================================

export const engineConfigSchema = z.object({
  headless: booleanStringSchema.default(true),
  executablePath: z.string().min(1).optional(),
  /** Installed browser channel such as "chrome" or "msedge" */
  channel: z.string().min(1).optional(),
  startTimeoutMs: integerStringSchema({ min: 1000, max: 300000, default: TIMEOUTS.ENGINE_START }),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ============================================
// POOL CONFIGURATION
// ============================================

export const poolConfigSchema = z.object({
  maxContexts: integerStringSchema({ min: 1, max: 1000, default: 10 }),
  maxPages: integerStringSchema({ min: 1, max: 1000, default: 5 }),
  /** How many closed task ids are remembered for StateViolation reporting */
  tombstoneLimit: integerStringSchema({ min: 0, max: 100000, default: 256 }),
});

export type PoolConfig = z.infer<typeof poolConfigSchema>;

// ============================================
// TIMEOUT CONFIGURATION
// ============================================

export const timeoutsConfigSchema = z.object({
  navigationMs: integerStringSchema({ min: 1, max: 600000, default: TIMEOUTS.NAVIGATION }),
  pageAcquireMs: integerStringSchema({ min: 1, max: 600000, default: TIMEOUTS.PAGE_ACQUIRE }),
  contextAcquireMs: integerStringSchema({ min: 1, max: 600000, default: TIMEOUTS.CONTEXT_CREATE }),
  captureWindowMs: integerStringSchema({ min: 0, max: 600000, default: TIMEOUTS.CAPTURE_WINDOW }),
});

export type TimeoutsConfig = z.infer<typeof timeoutsConfigSchema>;

// ============================================
// DOWNLOAD CONFIGURATION
// ============================================

export const downloadsConfigSchema = z
  .object({
    directory: z.string().min(1).default('./downloads'),
    queueCapacity: integerStringSchema({ min: 1, max: 100000, default: 100 }),
    maxConcurrent: integerStringSchema({ min: 1, max: 64, default: 3 }),
    maxAttempts: integerStringSchema({ min: 1, max: 20, default: 3 }),
    initialBackoffMs: integerStringSchema({ min: 0, max: 600000, default: 1000 }),
    maxBackoffMs: integerStringSchema({ min: 0, max: 3600000, default: 30000 }),
    backoffMultiplier: z.coerce.number().gt(1).max(10).default(2),
    transferTimeoutMs: integerStringSchema({ min: 1, max: 24 * 60 * 60 * 1000, default: TIMEOUTS.DOWNLOAD_TRANSFER }),
    historyLimit: integerStringSchema({ min: 0, max: 100000, default: 256 }),
    ffmpegPath: z.string().min(1).default('ffmpeg'),
    autoDownload: mediaTypeListSchema,
  })
  .refine((config) => config.maxBackoffMs >= config.initialBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to initialBackoffMs',
    path: ['maxBackoffMs'],
  });

export type DownloadsConfig = z.infer<typeof downloadsConfigSchema>;

// ============================================
// COMPLETE CONFIGURATION
// ============================================

export const orchestratorConfigSchema = z.object({
  log: logConfigSchema.default({}),
  engine: engineConfigSchema.default({}),
  pool: poolConfigSchema.default({}),
  timeouts: timeoutsConfigSchema.default({}),
  downloads: downloadsConfigSchema.default({}),
});

export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;

/**
 * What callers may pass: every section and field is optional
 */
export type OrchestratorConfigInput = z.input<typeof orchestratorConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration overrides.`
    );
    this.name = 'ConfigValidationError';
  }
}
