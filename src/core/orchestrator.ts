/**
 * Orchestrator - composition root
 *
 * Builds every component from one validated configuration and wires the
 * cross-component reactions:
 * - engine status changes become `engine_status` events
 * - closing a task cancels its unfinished downloads
 * - media of the configured types is queued as soon as it is detected
 *
 * The engine is started lazily by the first task that needs a context.
 */

import type { MediaFetcher, MediaTranscoder, EngineDriver } from '../types/index.js';
import type { EventListener } from '../types/events.js';
import { isOrchestratorError } from '../types/errors.js';
import type { OrchestratorConfig, OrchestratorConfigInput } from '../utils/config-schemas.js';
import { loadConfig } from '../utils/env-parser.js';
import { configureLogger, logger } from '../utils/logger.js';
import { Controller, type CommandResult } from './controller.js';
import { DownloadDispatcher } from './download-dispatcher.js';
import { EngineSingleton } from './engine-singleton.js';
import { EventBus } from './event-bus.js';
import { FfmpegTranscoder } from './ffmpeg-transcoder.js';
import { HttpMediaFetcher } from './http-media-fetcher.js';
import { Interceptor } from './interceptor.js';
import { PlaywrightEngineDriver } from './playwright-engine.js';
import { ResourcePool } from './resource-pool.js';
import { TabManager } from './tab-manager.js';

export interface OrchestratorOptions {
  /** Merged over environment configuration */
  config?: OrchestratorConfigInput;
  /** Defaults to Chromium through playwright-core */
  driver?: EngineDriver;
  /** Defaults to a streamed HTTP fetch */
  fetcher?: MediaFetcher;
  /** Defaults to ffmpeg */
  transcoder?: MediaTranscoder;
  /** Leave the global logger configuration untouched */
  keepLoggerConfig?: boolean;
}

export class TabOrchestrator {
  readonly bus = new EventBus();
  readonly engine: EngineSingleton;
  readonly pool: ResourcePool;
  readonly interceptor: Interceptor;
  readonly tabs: TabManager;
  readonly dispatcher: DownloadDispatcher;
  readonly controller: Controller;
  private disposers: Array<() => void> = [];
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    readonly config: OrchestratorConfig,
    collaborators: { driver: EngineDriver; fetcher: MediaFetcher; transcoder: MediaTranscoder }
  ) {
    const { engine: engineConfig, pool: poolConfig, timeouts, downloads } = config;

    this.engine = new EngineSingleton(collaborators.driver, { startTimeoutMs: engineConfig.startTimeoutMs });
    // Registered on the engine's crash hook before TabManager, so handles
    // are invalidated before tasks are closed
    this.pool = new ResourcePool(this.engine, {
      maxContexts: poolConfig.maxContexts,
      maxPages: poolConfig.maxPages,
      contextAcquireMs: timeouts.contextAcquireMs,
      pageAcquireMs: timeouts.pageAcquireMs,
    });
    this.interceptor = new Interceptor(this.bus);
    this.tabs = new TabManager(this.pool, this.engine, this.interceptor, this.bus, {
      navigationTimeoutMs: timeouts.navigationMs,
      captureWindowMs: timeouts.captureWindowMs,
      tombstoneLimit: poolConfig.tombstoneLimit,
    });
    this.dispatcher = new DownloadDispatcher(collaborators.fetcher, collaborators.transcoder, this.tabs, this.bus, {
      directory: downloads.directory,
      queueCapacity: downloads.queueCapacity,
      maxConcurrent: downloads.maxConcurrent,
      maxAttempts: downloads.maxAttempts,
      initialBackoffMs: downloads.initialBackoffMs,
      maxBackoffMs: downloads.maxBackoffMs,
      backoffMultiplier: downloads.backoffMultiplier,
      transferTimeoutMs: downloads.transferTimeoutMs,
      historyLimit: downloads.historyLimit,
    });
    this.controller = new Controller(this.tabs, this.dispatcher, this.engine);

    this.disposers.push(
      this.engine.onStatusChange((status) => {
        this.bus.publish({ type: 'engine_status', status });
      }),
      this.tabs.onTaskClosed((taskId) => {
        this.dispatcher.cancelForTask(taskId);
      })
    );

    if (downloads.autoDownload.length > 0) {
      const autoTypes = new Set(downloads.autoDownload);
      this.disposers.push(
        this.bus.on('media_detected', ({ record }) => {
          if (!autoTypes.has(record.type)) {
            return;
          }
          try {
            this.dispatcher.enqueue(record);
          } catch (error) {
            if (!isOrchestratorError(error)) {
              throw error;
            }
            logger.dispatcher.warn('Auto-download skipped', { url: record.url, code: error.code });
            this.bus.log('warn', `[Download] Auto-download skipped: ${error.message}`);
          }
        })
      );
    }
  }

  /**
   * Validate and run one GUI command
   */
  execute(command: unknown): Promise<CommandResult> {
    return this.controller.execute(command);
  }

  /**
   * Receive every event in publish order
   */
  subscribe(listener: EventListener): () => void {
    return this.bus.subscribe(listener);
  }

  /**
   * Cancel downloads, close every task, release the pool and stop the
   * engine. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.teardown();
    }
    return this.shutdownPromise;
  }

  private async teardown(): Promise<void> {
    const startTime = Date.now();
    await this.dispatcher.shutdown();
    await this.tabs.closeAll();
    await this.pool.shutdown();
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
    logger.create('Orchestrator').timed('Shut down', startTime);
  }
}

/**
 * Build an orchestrator from environment configuration and overrides
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator({ config: { pool: { maxContexts: 4 } } });
 * orchestrator.subscribe((event) => console.log(event.type));
 * const created = await orchestrator.execute({ type: 'create_task', url: 'example.com/video' });
 * ```
 */
export function createOrchestrator(options: OrchestratorOptions = {}): TabOrchestrator {
  const config = loadConfig(options.config);
  if (!options.keepLoggerConfig) {
    configureLogger({ level: config.log.level, prettyPrint: config.log.prettyPrint });
  }

  return new TabOrchestrator(config, {
    driver:
      options.driver ??
      new PlaywrightEngineDriver({
        headless: config.engine.headless,
        executablePath: config.engine.executablePath,
        channel: config.engine.channel,
      }),
    fetcher: options.fetcher ?? new HttpMediaFetcher(),
    transcoder: options.transcoder ?? new FfmpegTranscoder({ ffmpegPath: config.downloads.ffmpegPath }),
  });
}
