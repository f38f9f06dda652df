/**
 * Resource Pool - leases engine contexts and pages with hard caps
 *
 * Caps are enforced by reserving a slot synchronously before the first
 * await of an acquire; the slot becomes a live handle or is given back in
 * the same tick the acquire settles, so live + reserved never exceeds the
 * configured maximum.
 *
 * Every engine-facing acquire is tracked while in flight. Shutdown and
 * crash reject the tracked acquires with EngineUnavailable, and whatever
 * the engine hands back afterwards is disposed of.
 */

import { randomUUID } from 'crypto';
import {
  EngineUnavailableError,
  OperationTimeoutError,
  ResourceExhaustedError,
  StateViolationError,
  type OrchestratorError,
} from '../types/errors.js';
import type { ContextHandle, PageHandle, PagePurpose, TaskId } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, withTimeout } from '../utils/timeouts.js';
import type { EngineSingleton } from './engine-singleton.js';

export interface ResourcePoolConfig {
  maxContexts: number;
  maxPages: number;
  contextAcquireMs: number;
  pageAcquireMs: number;
}

export interface PoolStats {
  liveContexts: number;
  livePages: number;
  reservedContexts: number;
  reservedPages: number;
  maxContexts: number;
  maxPages: number;
}

const DEFAULT_CONFIG: ResourcePoolConfig = {
  maxContexts: 10,
  maxPages: 5,
  contextAcquireMs: TIMEOUTS.CONTEXT_CREATE,
  pageAcquireMs: TIMEOUTS.PAGE_ACQUIRE,
};

interface ContextEntry {
  handle: ContextHandle;
  pages: Set<string>;
}

type AbortInFlight = (error: OrchestratorError) => void;

export class ResourcePool {
  private config: ResourcePoolConfig;
  private contexts: Map<string, ContextEntry> = new Map();
  private pages: Map<string, PageHandle> = new Map();
  private reservedContexts = 0;
  private reservedPages = 0;
  private inFlight: Set<AbortInFlight> = new Set();
  private closing = false;

  constructor(
    private readonly engine: EngineSingleton,
    config: Partial<ResourcePoolConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.engine.onCrash((reason) => this.invalidateAll(reason));
  }

  stats(): PoolStats {
    return {
      liveContexts: this.contexts.size,
      livePages: this.pages.size,
      reservedContexts: this.reservedContexts,
      reservedPages: this.reservedPages,
      maxContexts: this.config.maxContexts,
      maxPages: this.config.maxPages,
    };
  }

  get liveContextCount(): number {
    return this.contexts.size;
  }

  get livePageCount(): number {
    return this.pages.size;
  }

  /**
   * Whether a context can be reserved right now
   */
  hasContextCapacity(): boolean {
    return this.contexts.size + this.reservedContexts < this.config.maxContexts;
  }

  /**
   * Lease a fresh context for `ownerId`, starting the engine on first use.
   *
   * @throws ResourceExhaustedError when the context cap is reached
   * @throws EngineUnavailableError when the engine cannot start or goes away
   * @throws OperationTimeoutError when the engine does not answer in time
   */
  async acquireContext(ownerId: TaskId): Promise<ContextHandle> {
    if (this.closing) {
      throw new EngineUnavailableError('Resource pool is shutting down');
    }
    if (!this.hasContextCapacity()) {
      throw new ResourceExhaustedError(`Context limit reached (${this.config.maxContexts})`, {
        taskId: ownerId,
        limit: this.config.maxContexts,
      });
    }

    this.reservedContexts++;
    try {
      await this.engine.init();
      if (this.closing) {
        throw new EngineUnavailableError('Resource pool is shutting down');
      }

      const driver = this.engine.driver;
      const generation = this.engine.generation;
      const engineContextId = await this.track(
        driver.createContext(),
        this.config.contextAcquireMs,
        () => new OperationTimeoutError('Context creation', this.config.contextAcquireMs, { taskId: ownerId }),
        generation,
        (lateId) => this.disposeContext(lateId)
      );

      const handle: ContextHandle = {
        id: randomUUID(),
        ownerId,
        engineContextId,
        generation,
        acquiredAt: Date.now(),
        state: 'live',
      };
      this.contexts.set(handle.id, { handle, pages: new Set() });
      logger.pool.debug('Context acquired', { taskId: ownerId, contextId: handle.id, live: this.contexts.size });
      return handle;
    } finally {
      this.reservedContexts--;
    }
  }

  /**
   * Release a context and any page still leased from it. Idempotent.
   * Accounting is updated before the engine is asked to destroy anything.
   */
  async releaseContext(handle: ContextHandle): Promise<void> {
    const entry = this.contexts.get(handle.id);
    if (!entry || handle.state !== 'live') {
      return;
    }

    const pageHandles = [...entry.pages].flatMap((pageId) => {
      const page = this.pages.get(pageId);
      return page ? [page] : [];
    });
    for (const page of pageHandles) {
      this.forgetPage(page, 'released');
    }
    this.contexts.delete(handle.id);
    handle.state = 'released';
    logger.pool.debug('Context released', { taskId: handle.ownerId, contextId: handle.id, live: this.contexts.size });

    if (handle.generation !== this.engine.generation || !this.engine.isRunning()) {
      return;
    }
    const driver = this.engine.driver;
    await Promise.all(pageHandles.map((page) => this.closeEnginePage(page.enginePageId)));
    try {
      await driver.destroyContext(handle.engineContextId);
    } catch (error) {
      logger.pool.warn('Engine failed to destroy context', { contextId: handle.id, error: String(error) });
    }
  }

  /**
   * Swap a context for a fresh one with the same owner. The old slot is
   * freed in the same tick the new one is reserved, so the swap works at
   * the cap and no other caller can take the slot in between.
   */
  async renewContext(handle: ContextHandle): Promise<ContextHandle> {
    if (!this.contexts.has(handle.id) || handle.state !== 'live') {
      throw new StateViolationError('reset the context', `holding a ${handle.state} context`, {
        taskId: handle.ownerId,
      });
    }
    const released = this.releaseContext(handle);
    const acquired = this.acquireContext(handle.ownerId);
    const [, next] = await Promise.all([released, acquired]);
    return next;
  }

  /**
   * Lease a page from a live context. The only pool operation that waits
   * on the engine for longer than a bookkeeping round trip.
   */
  async acquirePage(context: ContextHandle, purpose: PagePurpose = 'browse'): Promise<PageHandle> {
    if (this.closing) {
      throw new EngineUnavailableError('Resource pool is shutting down');
    }
    const entry = this.contexts.get(context.id);
    if (!entry || context.state !== 'live') {
      throw new StateViolationError('acquire a page', `holding a ${context.state} context`, {
        taskId: context.ownerId,
      });
    }
    if (this.pages.size + this.reservedPages >= this.config.maxPages) {
      throw new ResourceExhaustedError(`Page limit reached (${this.config.maxPages})`, {
        taskId: context.ownerId,
        limit: this.config.maxPages,
      });
    }

    this.reservedPages++;
    try {
      const driver = this.engine.driver;
      const enginePageId = await this.track(
        driver.createPage(context.engineContextId),
        this.config.pageAcquireMs,
        () => new OperationTimeoutError('Page acquisition', this.config.pageAcquireMs, { taskId: context.ownerId }),
        context.generation,
        (latePageId) => {
          this.closeEnginePage(latePageId).catch((error: unknown) => {
            logger.pool.error('Failed to dispose of late page', { error });
          });
        }
      );

      if (context.state !== 'live') {
        await this.closeEnginePage(enginePageId);
        throw new StateViolationError('acquire a page', `holding a ${context.state} context`, {
          taskId: context.ownerId,
        });
      }

      const handle: PageHandle = {
        id: randomUUID(),
        contextId: context.id,
        enginePageId,
        purpose,
        acquiredAt: Date.now(),
        state: 'live',
      };
      this.pages.set(handle.id, handle);
      entry.pages.add(handle.id);
      logger.pool.debug('Page acquired', { taskId: context.ownerId, pageId: handle.id, purpose, live: this.pages.size });
      return handle;
    } finally {
      this.reservedPages--;
    }
  }

  /**
   * Release a page. Idempotent.
   */
  async releasePage(handle: PageHandle): Promise<void> {
    if (!this.pages.has(handle.id) || handle.state !== 'live') {
      return;
    }
    this.forgetPage(handle, 'released');
    logger.pool.debug('Page released', { pageId: handle.id, live: this.pages.size });

    const context = this.contexts.get(handle.contextId)?.handle;
    if (!context || context.generation !== this.engine.generation || !this.engine.isRunning()) {
      return;
    }
    await this.closeEnginePage(handle.enginePageId);
  }

  /**
   * Drop every handle without talking to the engine, which is gone.
   * In-flight acquires fail with EngineUnavailable.
   */
  invalidateAll(reason: string): void {
    const contexts = this.contexts.size;
    const pages = this.pages.size;

    for (const page of this.pages.values()) {
      page.state = 'invalidated';
    }
    for (const { handle } of this.contexts.values()) {
      handle.state = 'invalidated';
    }
    this.pages.clear();
    this.contexts.clear();
    this.abortInFlight(new EngineUnavailableError(`Engine unavailable: ${reason}`));

    logger.pool.warn('All handles invalidated', { reason, contexts, pages });
  }

  /**
   * Release every live handle, fail anything still waiting on the engine,
   * then stop the engine. The pool can be used again afterwards; the
   * engine then starts lazily on the next acquire.
   */
  async shutdown(): Promise<void> {
    this.closing = true;
    try {
      this.abortInFlight(new EngineUnavailableError('Resource pool is shutting down'));
      const handles = [...this.contexts.values()].map(({ handle }) => handle);
      await Promise.all(handles.map((handle) => this.releaseContext(handle)));
      await this.engine.shutdown();
      logger.pool.info('Resource pool drained', { released: handles.length });
    } finally {
      this.closing = false;
    }
  }

  /**
   * Race an engine call against its timeout and against shutdown/crash.
   * A result that arrives after the caller gave up goes to `dispose`.
   */
  private track<T>(
    operation: Promise<T>,
    timeoutMs: number,
    onTimeout: () => OrchestratorError,
    generation: number,
    dispose: (value: T) => void
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const abort: AbortInFlight = (error) => {
        if (settled) return;
        settled = true;
        this.inFlight.delete(abort);
        reject(error);
      };
      this.inFlight.add(abort);

      withTimeout(operation, timeoutMs, onTimeout, dispose).then(
        (value) => {
          if (settled) {
            dispose(value);
            return;
          }
          if (generation !== this.engine.generation) {
            abort(new EngineUnavailableError('Engine went away during acquisition'));
            dispose(value);
            return;
          }
          settled = true;
          this.inFlight.delete(abort);
          resolve(value);
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          this.inFlight.delete(abort);
          reject(error);
        }
      );
    });
  }

  private abortInFlight(error: OrchestratorError): void {
    for (const abort of [...this.inFlight]) {
      abort(error);
    }
  }

  private forgetPage(page: PageHandle, state: 'released' | 'invalidated'): void {
    this.pages.delete(page.id);
    this.contexts.get(page.contextId)?.pages.delete(page.id);
    page.state = state;
  }

  private disposeContext(engineContextId: string): void {
    if (!this.engine.isRunning()) {
      return;
    }
    this.engine.driver.destroyContext(engineContextId).catch((error: unknown) => {
      logger.pool.error('Failed to dispose of late context', { error });
    });
  }

  private async closeEnginePage(enginePageId: string): Promise<void> {
    if (!this.engine.isRunning()) {
      return;
    }
    try {
      await this.engine.driver.closePage(enginePageId);
    } catch (error) {
      logger.pool.warn('Engine failed to close page', { error: String(error) });
    }
  }
}
