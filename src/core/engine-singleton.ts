/**
 * Engine Singleton - owns the one browser engine shared by every task
 *
 * Startup is guarded by a shared launch promise, so concurrent first use
 * from many tasks starts the engine once. A disconnect that was not
 * requested through shutdown() is a crash: the engine moves to 'crashed',
 * crash listeners run, and init() refuses to start again until restart()
 * is called explicitly.
 */

import { EngineUnavailableError, isOrchestratorError } from '../types/errors.js';
import type { EngineStatus } from '../types/events.js';
import type { EngineDriver } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, withTimeout } from '../utils/timeouts.js';

export interface EngineSingletonOptions {
  startTimeoutMs?: number;
}

type CrashListener = (reason: string) => void;
type StatusListener = (status: EngineStatus) => void;

export class EngineSingleton {
  private status: EngineStatus = 'stopped';
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private generationCounter = 0;
  private detachDisconnect: (() => void) | null = null;
  private crashListeners: Set<CrashListener> = new Set();
  private statusListeners: Set<StatusListener> = new Set();
  private readonly startTimeoutMs: number;

  constructor(
    private readonly engineDriver: EngineDriver,
    options: EngineSingletonOptions = {}
  ) {
    this.startTimeoutMs = options.startTimeoutMs ?? TIMEOUTS.ENGINE_START;
  }

  get state(): EngineStatus {
    return this.status;
  }

  /**
   * Bumped every time the running engine goes away; handles from an older
   * generation belong to a dead engine.
   */
  get generation(): number {
    return this.generationCounter;
  }

  isRunning(): boolean {
    return this.status === 'running';
  }

  /**
   * The driver, for callers that already hold a live engine
   *
   * @throws EngineUnavailableError unless the engine is running
   */
  get driver(): EngineDriver {
    if (this.status !== 'running') {
      throw new EngineUnavailableError(`Engine is ${this.status}`);
    }
    return this.engineDriver;
  }

  /**
   * Start the engine if it is not running. Safe to call concurrently.
   */
  async init(): Promise<void> {
    if (this.status === 'running') {
      return;
    }
    if (this.status === 'crashed') {
      throw new EngineUnavailableError('Engine crashed; an explicit restart is required');
    }
    if (this.stopPromise) {
      await this.stopPromise;
    }
    if (!this.startPromise) {
      this.startPromise = this.launch().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  /**
   * Stop the engine. Waits for a launch in progress first.
   */
  async shutdown(): Promise<void> {
    if (this.startPromise) {
      try {
        await this.startPromise;
      } catch (error) {
        logger.engine.debug('Launch failed before shutdown', { error: String(error) });
      }
    }
    if (this.stopPromise) {
      return this.stopPromise;
    }
    if (this.status === 'stopped') {
      return;
    }

    this.stopPromise = this.teardown().finally(() => {
      this.stopPromise = null;
    });
    return this.stopPromise;
  }

  /**
   * Explicit recovery after a crash; also restarts a healthy engine
   */
  async restart(): Promise<void> {
    logger.engine.info('Restarting engine', { from: this.status });
    if (this.status === 'crashed') {
      this.setStatus('stopping');
      await this.stopDriver();
      this.setStatus('stopped');
    } else {
      await this.shutdown();
    }
    await this.init();
  }

  /**
   * Notified once per crash, after the engine is marked crashed
   */
  onCrash(listener: CrashListener): () => void {
    this.crashListeners.add(listener);
    return () => {
      this.crashListeners.delete(listener);
    };
  }

  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  private async launch(): Promise<void> {
    const startTime = Date.now();
    this.setStatus('starting');

    try {
      await withTimeout(
        this.engineDriver.start(),
        this.startTimeoutMs,
        () => new EngineUnavailableError(`Engine did not start within ${this.startTimeoutMs}ms`),
        () => {
          this.stopDriver().catch((error: unknown) => {
            logger.engine.error('Failed to stop late engine', { error });
          });
        }
      );
    } catch (error) {
      this.setStatus('stopped');
      logger.engine.error('Engine failed to start', { error });
      if (isOrchestratorError(error)) {
        throw error;
      }
      throw new EngineUnavailableError(
        `Engine failed to start: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.detachDisconnect = this.engineDriver.onDisconnected((reason) => this.handleDisconnect(reason));
    this.setStatus('running');
    logger.engine.timed('Engine started', startTime, { generation: this.generationCounter });
  }

  private async teardown(): Promise<void> {
    this.setStatus('stopping');
    this.generationCounter++;
    this.detachDisconnect?.();
    this.detachDisconnect = null;

    await this.stopDriver();
    this.setStatus('stopped');
    logger.engine.info('Engine stopped');
  }

  private async stopDriver(): Promise<void> {
    try {
      await this.engineDriver.stop();
    } catch (error) {
      logger.engine.warn('Engine stop reported an error', { error: String(error) });
    }
  }

  private handleDisconnect(reason: string): void {
    if (this.status !== 'running') {
      return;
    }

    this.generationCounter++;
    this.detachDisconnect?.();
    this.detachDisconnect = null;
    this.setStatus('crashed');
    logger.engine.error('Engine disconnected unexpectedly', { reason, generation: this.generationCounter });

    for (const listener of [...this.crashListeners]) {
      try {
        listener(reason);
      } catch (error) {
        logger.engine.error('Crash listener error', { error });
      }
    }
  }

  private setStatus(status: EngineStatus): void {
    if (this.status === status) {
      return;
    }
    this.status = status;
    for (const listener of [...this.statusListeners]) {
      try {
        listener(status);
      } catch (error) {
        logger.engine.error('Status listener error', { error });
      }
    }
  }
}
