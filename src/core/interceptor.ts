/**
 * Interceptor - turns a page's network responses into media records
 *
 * Subscribes to the response stream of a leased page. Each response is
 * classified in constant time inside the engine callback; a record is
 * created and announced once per (task, URL) pair. Records outlive the
 * page subscription and are dropped only when the task is forgotten.
 */

import { MediaClassificationAmbiguousError } from '../types/errors.js';
import type { EngineDriver, EngineResponse, MediaRecord, PageHandle, TaskId } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';
import { classifyMedia } from './media-classifier.js';

interface Subscription {
  taskId: TaskId;
  unsubscribe: () => void;
}

export class Interceptor {
  /** Per task, keyed by URL; insertion order is discovery order */
  private registries: Map<TaskId, Map<string, MediaRecord>> = new Map();
  private byUrl: Map<string, MediaRecord> = new Map();
  private subscriptions: Map<string, Subscription> = new Map();

  constructor(private readonly bus: EventBus) {}

  /**
   * Start observing a page on behalf of a task. Attaching the same page
   * twice is a no-op.
   */
  attach(taskId: TaskId, page: PageHandle, driver: EngineDriver, pageUrl: string): void {
    if (this.subscriptions.has(page.id)) {
      return;
    }
    const unsubscribe = driver.onResponse(page.enginePageId, (response) => {
      this.handleResponse(taskId, response, pageUrl);
    });
    this.subscriptions.set(page.id, { taskId, unsubscribe });
    logger.interceptor.debug('Attached', { taskId, pageId: page.id, purpose: page.purpose });
  }

  /**
   * Stop observing a page. Records already emitted are kept.
   */
  detach(pageId: string): void {
    const subscription = this.subscriptions.get(pageId);
    if (!subscription) {
      return;
    }
    this.subscriptions.delete(pageId);
    subscription.unsubscribe();
    logger.interceptor.debug('Detached', { taskId: subscription.taskId, pageId });
  }

  /**
   * Detach every page of a task and drop its records
   */
  forget(taskId: TaskId): void {
    for (const [pageId, subscription] of [...this.subscriptions]) {
      if (subscription.taskId === taskId) {
        this.detach(pageId);
      }
    }

    const registry = this.registries.get(taskId);
    if (!registry) {
      return;
    }
    for (const url of registry.keys()) {
      if (this.byUrl.get(url)?.taskId === taskId) {
        this.byUrl.delete(url);
      }
    }
    this.registries.delete(taskId);
  }

  /**
   * Classify one response. Returns the new record, or null when the
   * response is not media or the task has already seen the URL.
   */
  handleResponse(taskId: TaskId, response: EngineResponse, pageUrl: string): MediaRecord | null {
    if (response.status >= 400) {
      return null;
    }

    const registry = this.registries.get(taskId) ?? new Map<string, MediaRecord>();
    if (registry.has(response.url)) {
      return null;
    }

    const classification = classifyMedia({
      url: response.url,
      contentType: response.contentType,
      resourceType: response.resourceType,
    });
    if (!classification) {
      return null;
    }

    if (classification.ambiguous) {
      const notice = new MediaClassificationAmbiguousError(response.url, classification.ambiguous);
      logger.interceptor.warn(notice.message, { taskId, url: response.url });
      this.bus.log('warn', `[Media] ${notice.message}`);
    }

    const record: MediaRecord = {
      url: response.url,
      type: classification.type,
      headers: { ...response.requestHeaders },
      taskId,
      pageUrl: response.frameUrl ?? pageUrl,
      contentType: response.contentType,
      discoveredAt: Date.now(),
    };

    registry.set(record.url, record);
    this.registries.set(taskId, registry);
    this.byUrl.set(record.url, record);

    logger.interceptor.info('Media detected', { taskId, url: record.url, type: record.type });
    this.bus.log('info', `[Media] ${record.type.toUpperCase()}: ${record.url}`);
    this.bus.publish({ type: 'media_detected', record });
    return record;
  }

  /**
   * A task's records in discovery order
   */
  records(taskId: TaskId): MediaRecord[] {
    return [...(this.registries.get(taskId)?.values() ?? [])];
  }

  /**
   * Most recent record for a URL, optionally restricted to one task
   */
  find(url: string, taskId?: TaskId): MediaRecord | undefined {
    if (taskId !== undefined) {
      return this.registries.get(taskId)?.get(url);
    }
    return this.byUrl.get(url);
  }

  isAttached(pageId: string): boolean {
    return this.subscriptions.has(pageId);
  }

  get attachedCount(): number {
    return this.subscriptions.size;
  }
}
