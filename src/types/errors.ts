/**
 * Error Taxonomy
 *
 * Every failure raised by the orchestrator core is an OrchestratorError with:
 * - a machine-readable code for programmatic handling
 * - a high-level category
 * - a retryability indicator
 *
 * The command channel converts these into StructuredError values so that
 * nothing thrown inside the core reaches a GUI collaborator as an exception.
 */

import type { TransferFailure } from './index.js';

/**
 * High-level error categories for classification
 */
export type ErrorCategory =
  | 'resource'   // Context, page or queue caps reached
  | 'state'      // Illegal transitions, unknown ids
  | 'engine'     // Browser engine not started or crashed
  | 'timeout'    // Engine-facing operation exceeded its deadline
  | 'media'      // Media classification notices
  | 'download'   // Transfer failures
  | 'validation' // Malformed commands, URLs or configuration
  | 'internal';  // Anything unexpected

/**
 * Machine-readable error codes
 */
export type ErrorCode =
  | 'RESOURCE_EXHAUSTED'
  | 'STATE_VIOLATION'
  | 'NOT_FOUND'
  | 'ENGINE_UNAVAILABLE'
  | 'NAVIGATION_TIMEOUT'
  | 'OPERATION_TIMEOUT'
  | 'MEDIA_CLASSIFICATION_AMBIGUOUS'
  | 'DOWNLOAD_TRANSIENT'
  | 'DOWNLOAD_PERMANENT'
  | 'DOWNLOAD_CANCELLED'
  | 'INVALID_ARGUMENT'
  | 'INTERNAL_ERROR';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  RESOURCE_EXHAUSTED: 'resource',
  STATE_VIOLATION: 'state',
  NOT_FOUND: 'state',
  ENGINE_UNAVAILABLE: 'engine',
  NAVIGATION_TIMEOUT: 'timeout',
  OPERATION_TIMEOUT: 'timeout',
  MEDIA_CLASSIFICATION_AMBIGUOUS: 'media',
  DOWNLOAD_TRANSIENT: 'download',
  DOWNLOAD_PERMANENT: 'download',
  DOWNLOAD_CANCELLED: 'download',
  INVALID_ARGUMENT: 'validation',
  INTERNAL_ERROR: 'internal',
};

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'RESOURCE_EXHAUSTED',
  'NAVIGATION_TIMEOUT',
  'OPERATION_TIMEOUT',
  'DOWNLOAD_TRANSIENT',
]);

/**
 * Context about the error
 */
export interface ErrorContext {
  taskId?: string;
  jobId?: string;
  url?: string;
  state?: string;
  action?: string;
  status?: number;
  [key: string]: unknown;
}

/**
 * Structured error returned by the command channel
 */
export interface StructuredError {
  /** Human-readable error message */
  error: string;
  category: ErrorCategory;
  code: ErrorCode;
  retryable: boolean;
  context?: ErrorContext;
}

export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  readonly context?: ErrorContext;

  constructor(code: ErrorCode, message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrchestratorError';
    this.code = code;
    this.context = context;
  }

  get category(): ErrorCategory {
    return CATEGORY_BY_CODE[this.code];
  }

  get retryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

export class ResourceExhaustedError extends OrchestratorError {
  constructor(message: string, context?: ErrorContext) {
    super('RESOURCE_EXHAUSTED', message, context);
    this.name = 'ResourceExhaustedError';
  }
}

export class StateViolationError extends OrchestratorError {
  constructor(action: string, state: string, context?: ErrorContext) {
    super('STATE_VIOLATION', `Cannot ${action} while ${state}`, { ...context, action, state });
    this.name = 'StateViolationError';
  }
}

export class NotFoundError extends OrchestratorError {
  constructor(kind: 'task' | 'job', id: string) {
    super('NOT_FOUND', `Unknown ${kind}: ${id}`, kind === 'job' ? { jobId: id } : { taskId: id });
    this.name = 'NotFoundError';
  }
}

export class EngineUnavailableError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENGINE_UNAVAILABLE', message, undefined, options);
    this.name = 'EngineUnavailableError';
  }
}

export class NavigationTimeoutError extends OrchestratorError {
  constructor(url: string, timeoutMs: number, taskId?: string) {
    super('NAVIGATION_TIMEOUT', `Navigation to ${url} timed out after ${timeoutMs}ms`, { url, taskId, timeoutMs });
    this.name = 'NavigationTimeoutError';
  }
}

export class OperationTimeoutError extends OrchestratorError {
  constructor(operation: string, timeoutMs: number, context?: ErrorContext) {
    super('OPERATION_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, { ...context, operation, timeoutMs });
    this.name = 'OperationTimeoutError';
  }
}

export class MediaClassificationAmbiguousError extends OrchestratorError {
  constructor(url: string, candidates: readonly string[]) {
    super('MEDIA_CLASSIFICATION_AMBIGUOUS', `Conflicting media signals (${candidates.join(' vs ')}) for ${url}`, {
      url,
      candidates,
    });
    this.name = 'MediaClassificationAmbiguousError';
  }
}

export class DownloadTransientError extends OrchestratorError {
  constructor(message: string, context?: ErrorContext) {
    super('DOWNLOAD_TRANSIENT', message, context);
    this.name = 'DownloadTransientError';
  }
}

export class DownloadPermanentError extends OrchestratorError {
  constructor(message: string, context?: ErrorContext) {
    super('DOWNLOAD_PERMANENT', message, context);
    this.name = 'DownloadPermanentError';
  }
}

export class DownloadCancelledError extends OrchestratorError {
  constructor(jobId: string) {
    super('DOWNLOAD_CANCELLED', `Download ${jobId} was cancelled`, { jobId });
    this.name = 'DownloadCancelledError';
  }
}

export class InvalidArgumentError extends OrchestratorError {
  constructor(message: string, context?: ErrorContext) {
    super('INVALID_ARGUMENT', message, context);
    this.name = 'InvalidArgumentError';
  }
}

// ============================================
// TRANSFER FAILURE CLASSIFICATION
// ============================================

/** Node/undici error codes that indicate a retryable network condition */
const TRANSIENT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
  'TRANSFER_TIMEOUT',
]);

/** Disk, manifest and tooling failures that will not fix themselves */
const PERMANENT_ERROR_CODES = new Set([
  'ENOSPC',
  'EACCES',
  'EPERM',
  'EROFS',
  'EISDIR',
  'ENOENT',
  'EDQUOT',
  'ENOTFOUND',
  'MALFORMED_MANIFEST',
  'TRANSCODER_MISSING',
]);

/**
 * Classify an HTTP status code: request timeouts, throttling and server
 * errors are transient, every other 4xx is permanent.
 */
function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Turn a collaborator-reported failure into a transient or permanent
 * download error.
 */
export function classifyTransferFailure(
  failure: TransferFailure,
  context?: ErrorContext
): DownloadTransientError | DownloadPermanentError {
  const errorContext: ErrorContext = { ...context, status: failure.status, errorCode: failure.code };

  if (failure.status !== undefined && failure.status >= 400) {
    return isTransientStatus(failure.status)
      ? new DownloadTransientError(failure.message, errorContext)
      : new DownloadPermanentError(failure.message, errorContext);
  }

  if (failure.code) {
    if (TRANSIENT_ERROR_CODES.has(failure.code)) {
      return new DownloadTransientError(failure.message, errorContext);
    }
    if (PERMANENT_ERROR_CODES.has(failure.code)) {
      return new DownloadPermanentError(failure.message, errorContext);
    }
  }

  const message = failure.message.toLowerCase();
  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up') ||
    message.includes('network')
  ) {
    return new DownloadTransientError(failure.message, errorContext);
  }

  return new DownloadPermanentError(failure.message, errorContext);
}

/**
 * Extract a TransferFailure from anything a collaborator threw
 */
export function toTransferFailure(error: unknown): TransferFailure {
  if (error instanceof Error) {
    const code = readErrorCode(error) ?? readErrorCode(error.cause);
    return code ? { message: error.message, code } : { message: error.message };
  }
  return { message: String(error) };
}

function readErrorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// ============================================
// STRUCTURED ERRORS
// ============================================

/**
 * Convert anything thrown into a StructuredError
 */
export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof OrchestratorError) {
    return {
      error: error.message,
      category: error.category,
      code: error.code,
      retryable: error.retryable,
      ...(error.context ? { context: error.context } : {}),
    };
  }

  return {
    error: error instanceof Error ? error.message : String(error),
    category: 'internal',
    code: 'INTERNAL_ERROR',
    retryable: false,
  };
}

export function isOrchestratorError(error: unknown, code?: ErrorCode): error is OrchestratorError {
  return error instanceof OrchestratorError && (code === undefined || error.code === code);
}
