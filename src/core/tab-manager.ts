/**
 * Tab Manager - registry of tasks and their command surface
 *
 * Each task owns one context for its whole life and at most one browse
 * page. Commands for the same task run one at a time through a keyed
 * mutex; commands for different tasks run in parallel, bounded only by
 * the pool's caps.
 *
 * A navigation without a browse page leases a short-lived capture page,
 * observes its traffic for a capture window, and then gives it back. A
 * capture page never makes a task Browsing.
 *
 * Closed task ids are remembered in a bounded tombstone list: get/close
 * on such an id report NotFound, while navigating or starting a download
 * reports StateViolation.
 */

import { randomUUID } from 'crypto';
import {
  EngineUnavailableError,
  InvalidArgumentError,
  NavigationTimeoutError,
  NotFoundError,
  StateViolationError,
  isOrchestratorError,
  type OrchestratorError,
} from '../types/errors.js';
import type { ContextHandle, EngineCookie, MediaRecord, PageHandle, TaskId, TaskSnapshot } from '../types/index.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, withTimeout } from '../utils/timeouts.js';
import type { EngineSingleton } from './engine-singleton.js';
import type { EventBus } from './event-bus.js';
import type { Interceptor } from './interceptor.js';
import type { ResourcePool } from './resource-pool.js';
import { TabStateMachine } from './tab-state-machine.js';

export interface TabManagerOptions {
  navigationTimeoutMs: number;
  captureWindowMs: number;
  tombstoneLimit: number;
}

const DEFAULT_OPTIONS: TabManagerOptions = {
  navigationTimeoutMs: TIMEOUTS.NAVIGATION,
  captureWindowMs: TIMEOUTS.CAPTURE_WINDOW,
  tombstoneLimit: 256,
};

interface Task {
  id: TaskId;
  url: string;
  machine: TabStateMachine;
  context: ContextHandle;
  /** Browse page; its presence is what makes the task Browsing */
  page: PageHandle | null;
  capturePage: PageHandle | null;
  captureTimer: NodeJS.Timeout | null;
  createdAt: number;
  lastActiveAt: number;
}

type TaskClosedListener = (taskId: TaskId) => void;

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Trim a URL, default its scheme to https and require http(s)
 *
 * @throws InvalidArgumentError
 */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('URL must not be empty');
  }
  const candidate = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidArgumentError(`Invalid URL: ${input}`, { url: input });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidArgumentError(`Unsupported URL scheme: ${parsed.protocol}`, { url: input });
  }
  return parsed.toString();
}

export class TabManager {
  private tasks: Map<TaskId, Task> = new Map();
  private tombstones: Map<TaskId, number> = new Map();
  private locks = new KeyedMutex();
  private closedListeners: Set<TaskClosedListener> = new Set();
  private options: TabManagerOptions;

  constructor(
    private readonly pool: ResourcePool,
    private readonly engine: EngineSingleton,
    private readonly interceptor: Interceptor,
    private readonly bus: EventBus,
    options: Partial<TabManagerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.engine.onCrash((reason) => this.handleCrash(reason));
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Create a task in state Idle with its own context.
   *
   * @throws ResourceExhaustedError when the context cap is reached
   */
  async create(url: string): Promise<TaskId> {
    const normalized = normalizeUrl(url);
    const id = randomUUID();

    const context = await this.pool.acquireContext(id);
    const now = Date.now();
    const task: Task = {
      id,
      url: normalized,
      machine: new TabStateMachine(id),
      context,
      page: null,
      capturePage: null,
      captureTimer: null,
      createdAt: now,
      lastActiveAt: now,
    };
    this.tasks.set(id, task);

    logger.tabs.info('Task created', { taskId: id, url: normalized });
    this.bus.log('info', `[Tab] Creating: ${id} -> ${normalized}`);
    this.bus.publish({ type: 'task_created', taskId: id, url: normalized, state: task.machine.state });
    return id;
  }

  /**
   * Release the task's pages and context and move it to Closed.
   *
   * @throws NotFoundError for unknown and already closed ids
   */
  async close(id: TaskId): Promise<void> {
    await this.locks.runExclusive(id, async () => {
      const task = this.tasks.get(id);
      if (!task) {
        throw new NotFoundError('task', id);
      }
      await this.closeTask(task);
    });
  }

  /**
   * Close every open task; used on shutdown
   */
  async closeAll(): Promise<void> {
    const ids = [...this.tasks.keys()];
    await Promise.all(
      ids.map((id) =>
        this.locks.runExclusive(id, async () => {
          const task = this.tasks.get(id);
          if (task) {
            await this.closeTask(task);
          }
        })
      )
    );
  }

  // ============================================
  // QUERIES
  // ============================================

  /**
   * @throws NotFoundError for unknown and closed ids
   */
  get(id: TaskId): TaskSnapshot {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError('task', id);
    }
    return this.snapshot(task);
  }

  list(): TaskSnapshot[] {
    return [...this.tasks.values()].map((task) => this.snapshot(task));
  }

  has(id: TaskId): boolean {
    return this.tasks.has(id);
  }

  /**
   * @throws StateViolationError for closed ids, NotFoundError for unknown ones
   */
  assertOpen(id: TaskId, action: string): void {
    this.requireOpen(id, action);
  }

  wasClosed(id: TaskId): boolean {
    return this.tombstones.has(id);
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Discovered media of a task in discovery order
   */
  media(id: TaskId): MediaRecord[] {
    this.requireOpen(id, 'list media');
    return this.interceptor.records(id);
  }

  findMedia(url: string, taskId?: TaskId): MediaRecord | undefined {
    return this.interceptor.find(url, taskId);
  }

  /**
   * Cookies the task's context would send to `url`; empty once the task
   * or the engine is gone
   */
  async cookiesFor(taskId: TaskId, url: string): Promise<EngineCookie[]> {
    const task = this.tasks.get(taskId);
    if (!task || task.context.state !== 'live' || !this.engine.isRunning()) {
      return [];
    }
    try {
      return await this.engine.driver.cookies(task.context.engineContextId, url);
    } catch (error) {
      logger.tabs.warn('Cookie lookup failed', { taskId, error: String(error) });
      return [];
    }
  }

  onTaskClosed(listener: TaskClosedListener): () => void {
    this.closedListeners.add(listener);
    return () => {
      this.closedListeners.delete(listener);
    };
  }

  // ============================================
  // BROWSING
  // ============================================

  /**
   * Attach a page when none is attached, otherwise detach it.
   * Returns the resulting snapshot.
   */
  async toggleBrowse(id: TaskId): Promise<TaskSnapshot> {
    return this.locks.runExclusive(id, async () => {
      const task = this.requireOpen(id, 'toggle browsing');
      if (task.machine.hasPage) {
        await this.detach(task);
      } else {
        await this.attach(task);
      }
      return this.snapshot(task);
    });
  }

  async attachPage(id: TaskId): Promise<TaskSnapshot> {
    return this.locks.runExclusive(id, async () => {
      const task = this.requireOpen(id, 'attach a page');
      await this.attach(task);
      return this.snapshot(task);
    });
  }

  async detachPage(id: TaskId): Promise<TaskSnapshot> {
    return this.locks.runExclusive(id, async () => {
      const task = this.requireOpen(id, 'detach a page');
      await this.detach(task);
      return this.snapshot(task);
    });
  }

  /**
   * Navigate the task's browse page, or a capture page when none is
   * attached. On failure the leased capture page is released and the
   * previous state restored.
   */
  async navigate(id: TaskId, url: string): Promise<TaskSnapshot> {
    return this.locks.runExclusive(id, async () => {
      const task = this.requireOpen(id, 'navigate');
      const target = normalizeUrl(url);

      const previousBase = this.transition(task, () => task.machine.navigate());
      this.clearCaptureTimer(task);

      try {
        const page = task.page ?? task.capturePage ?? (await this.leaseCapturePage(task, target));
        await this.navigatePage(task, page, target);
        task.url = target;
        task.lastActiveAt = Date.now();
        logger.tabs.info('Navigated', { taskId: id, url: target, capture: !task.page });

        if (!task.page) {
          this.scheduleCaptureRelease(task);
        }
        return this.snapshot(task);
      } catch (error) {
        await this.releaseCapturePage(task);
        this.transition(task, () => task.machine.restoreBase(previousBase));
        this.reportError(task, error);
        throw error;
      }
    });
  }

  /**
   * Replace the task's context with a fresh one (new cookie jar). Only
   * legal while no browse page is attached.
   */
  async resetContext(id: TaskId): Promise<TaskSnapshot> {
    return this.locks.runExclusive(id, async () => {
      const task = this.requireOpen(id, 'reset the context');
      task.machine.assert('reset_context');
      await this.releaseCapturePage(task);

      try {
        task.context = await this.pool.renewContext(task.context);
      } catch (error) {
        this.reportError(task, error);
        await this.closeTask(task);
        throw error;
      }
      this.transition(task, () => task.machine.resetContext());
      task.lastActiveAt = Date.now();
      logger.tabs.info('Context reset', { taskId: id });
      return this.snapshot(task);
    });
  }

  // ============================================
  // DOWNLOAD ACCOUNTING
  // ============================================

  /**
   * Count an unfinished job against the task.
   *
   * @throws StateViolationError when the task is closed
   * @throws NotFoundError when the task never existed
   */
  beginJob(taskId: TaskId): void {
    const task = this.requireOpen(taskId, 'start a download');
    this.transition(task, () => task.machine.jobStarted());
  }

  /**
   * A job of the task reached a terminal status. Ignored once the task
   * is gone.
   */
  endJob(taskId: TaskId): void {
    const task = this.tasks.get(taskId);
    if (!task) {
      return;
    }
    this.transition(task, () => task.machine.jobFinished());
  }

  // ============================================
  // INTERNALS
  // ============================================

  private requireOpen(id: TaskId, action: string): Task {
    const task = this.tasks.get(id);
    if (task) {
      return task;
    }
    if (this.tombstones.has(id)) {
      throw new StateViolationError(action, 'closed', { taskId: id });
    }
    throw new NotFoundError('task', id);
  }

  private async attach(task: Task): Promise<void> {
    task.machine.assert('attach_page');
    await this.releaseCapturePage(task);

    const page = await this.pool.acquirePage(task.context, 'browse');
    try {
      this.interceptor.attach(task.id, page, this.engine.driver, task.url);
      await this.navigatePage(task, page, task.url);
    } catch (error) {
      this.interceptor.detach(page.id);
      await this.pool.releasePage(page);
      this.reportError(task, error);
      throw error;
    }

    task.page = page;
    this.transition(task, () => task.machine.attachPage());
    task.lastActiveAt = Date.now();
    logger.tabs.info('Page attached', { taskId: task.id, pageId: page.id });
    this.bus.log('info', `[Tab] Browsing: ${task.id}`);
  }

  private async detach(task: Task): Promise<void> {
    task.machine.assert('detach_page');
    const page = task.page;
    task.page = null;
    this.transition(task, () => task.machine.detachPage());
    task.lastActiveAt = Date.now();

    if (page) {
      this.interceptor.detach(page.id);
      await this.pool.releasePage(page);
    }
    logger.tabs.info('Page detached', { taskId: task.id });
    this.bus.log('info', `[Tab] Background: ${task.id}`);
  }

  private async navigatePage(task: Task, page: PageHandle, url: string): Promise<void> {
    const timeoutMs = this.options.navigationTimeoutMs;
    const driver = this.engine.driver;
    await withTimeout(
      driver.navigate(page.enginePageId, url, { timeoutMs }),
      timeoutMs,
      () => new NavigationTimeoutError(url, timeoutMs, task.id)
    );
  }

  private async leaseCapturePage(task: Task, pageUrl: string): Promise<PageHandle> {
    const page = await this.pool.acquirePage(task.context, 'capture');
    task.capturePage = page;
    this.interceptor.attach(task.id, page, this.engine.driver, pageUrl);
    return page;
  }

  private scheduleCaptureRelease(task: Task): void {
    this.clearCaptureTimer(task);
    const timer = setTimeout(() => {
      task.captureTimer = null;
      this.locks
        .runExclusive(task.id, async () => {
          if (this.tasks.get(task.id) === task) {
            await this.releaseCapturePage(task);
          }
        })
        .catch((error: unknown) => {
          logger.tabs.error('Failed to release capture page', { taskId: task.id, error });
        });
    }, this.options.captureWindowMs);
    timer.unref();
    task.captureTimer = timer;
  }

  private clearCaptureTimer(task: Task): void {
    if (task.captureTimer) {
      clearTimeout(task.captureTimer);
      task.captureTimer = null;
    }
  }

  private async releaseCapturePage(task: Task): Promise<void> {
    this.clearCaptureTimer(task);
    const page = task.capturePage;
    if (!page) {
      return;
    }
    task.capturePage = null;
    this.interceptor.detach(page.id);
    await this.pool.releasePage(page);
  }

  /**
   * Release page, then context, then mark Closed
   */
  private async closeTask(task: Task): Promise<void> {
    this.forget(task);

    const page = task.page;
    task.page = null;
    if (page) {
      await this.pool.releasePage(page);
    }
    await this.releaseCapturePage(task);
    await this.pool.releaseContext(task.context);

    this.markClosed(task);
    logger.tabs.info('Task closed', { taskId: task.id });
    this.bus.log('info', `[Tab] Closed: ${task.id}`);
  }

  /**
   * Registry side of closing: the task disappears for every later command
   */
  private forget(task: Task): void {
    this.clearCaptureTimer(task);
    this.tasks.delete(task.id);
    this.tombstones.set(task.id, Date.now());
    while (this.tombstones.size > this.options.tombstoneLimit) {
      const oldest = this.tombstones.keys().next();
      if (oldest.done) break;
      this.tombstones.delete(oldest.value);
    }
    this.interceptor.forget(task.id);
  }

  private markClosed(task: Task): void {
    if (!task.machine.close()) {
      return;
    }
    this.bus.publish({ type: 'task_updated', taskId: task.id, state: 'closed' });
    for (const listener of [...this.closedListeners]) {
      try {
        listener(task.id);
      } catch (error) {
        logger.tabs.error('Task closed listener error', { taskId: task.id, error });
      }
    }
  }

  /**
   * The engine is gone and so are the handles (the pool has already
   * invalidated them). Every task is closed with EngineUnavailable.
   */
  private handleCrash(reason: string): void {
    const tasks = [...this.tasks.values()];
    const error = new EngineUnavailableError(`Engine crashed: ${reason}`);
    for (const task of tasks) {
      task.page = null;
      task.capturePage = null;
      this.forget(task);
      this.reportError(task, error);
      this.markClosed(task);
    }
    if (tasks.length > 0) {
      logger.tabs.error('Closed all tasks after engine crash', { reason, tasks: tasks.length });
      this.bus.log('error', `[Engine] Crashed, closed ${tasks.length} task(s): ${reason}`);
    }
  }

  /**
   * Publish task_updated when the dominant state changes
   */
  private transition<T>(task: Task, mutate: () => T): T {
    const before = task.machine.state;
    const result = mutate();
    const after = task.machine.state;
    if (before !== after) {
      this.bus.publish({ type: 'task_updated', taskId: task.id, state: after });
    }
    return result;
  }

  private reportError(task: Task, error: unknown): void {
    const failure: OrchestratorError | null = isOrchestratorError(error) ? error : null;
    const code = failure?.code ?? 'INTERNAL_ERROR';
    const message = error instanceof Error ? error.message : String(error);
    logger.tabs.warn('Task operation failed', { taskId: task.id, code, message });
    this.bus.publish({ type: 'task_error', taskId: task.id, code, message });
  }

  private snapshot(task: Task): TaskSnapshot {
    return {
      id: task.id,
      url: task.url,
      state: task.machine.state,
      contextId: task.context.state === 'live' ? task.context.id : null,
      pageId: task.page?.id ?? null,
      hasPage: task.machine.hasPage,
      activeJobCount: task.machine.activeJobCount,
      mediaCount: this.interceptor.records(task.id).length,
      createdAt: task.createdAt,
      lastActiveAt: task.lastActiveAt,
    };
  }
}
