/**
 * tabstream
 *
 * Orchestrates browser tasks over one shared engine: each task owns an
 * isolated context and at most one page, media seen on its pages is
 * classified and recorded, and downloads run in a bounded, retrying queue
 * without needing a page.
 */

export { createOrchestrator, TabOrchestrator, type OrchestratorOptions } from './core/orchestrator.js';
export {
  Controller,
  commandSchema,
  type CommandData,
  type CommandResult,
  type CommandType,
  type OrchestratorCommand,
} from './core/controller.js';
export { EngineSingleton, type EngineSingletonOptions } from './core/engine-singleton.js';
export { PlaywrightEngineDriver, loadPlaywright, type PlaywrightEngineOptions } from './core/playwright-engine.js';
export { ResourcePool, type PoolStats, type ResourcePoolConfig } from './core/resource-pool.js';
export { TabStateMachine, dominantState, type TabFlags, type TabTransition } from './core/tab-state-machine.js';
export { TabManager, normalizeUrl, type TabManagerOptions } from './core/tab-manager.js';
export { Interceptor } from './core/interceptor.js';
export {
  classifyMedia,
  classifyUrl,
  type ClassificationInput,
  type MediaClassification,
} from './core/media-classifier.js';
export {
  DownloadDispatcher,
  type DispatcherStats,
  type DownloadDispatcherConfig,
  type DownloadTaskPort,
} from './core/download-dispatcher.js';
export { buildRequestHeaders, DEFAULT_DOWNLOAD_HEADERS } from './core/request-headers.js';
export { HttpMediaFetcher, type HttpMediaFetcherOptions } from './core/http-media-fetcher.js';
export {
  FfmpegTranscoder,
  type FfmpegTranscoderOptions,
  type SpawnProcess,
  type TranscoderProcess,
} from './core/ffmpeg-transcoder.js';
export { EventBus } from './core/event-bus.js';

export * from './types/index.js';
export type {
  EngineStatus,
  BusLogLevel,
  OrchestratorEvent,
  OrchestratorEventType,
  EventOf,
  EventListener,
} from './types/events.js';
export {
  OrchestratorError,
  ResourceExhaustedError,
  StateViolationError,
  NotFoundError,
  EngineUnavailableError,
  NavigationTimeoutError,
  OperationTimeoutError,
  MediaClassificationAmbiguousError,
  DownloadTransientError,
  DownloadPermanentError,
  DownloadCancelledError,
  InvalidArgumentError,
  classifyTransferFailure,
  toStructuredError,
  isOrchestratorError,
  type ErrorCategory,
  type ErrorCode,
  type ErrorContext,
  type StructuredError,
} from './types/errors.js';

export { loadConfig, isConfigValid } from './utils/env-parser.js';
export {
  ConfigValidationError,
  orchestratorConfigSchema,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from './utils/config-schemas.js';
export { configureLogger, Logger, logger, type LogLevel } from './utils/logger.js';
