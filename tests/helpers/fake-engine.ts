/**
 * In-memory engine driver for tests
 *
 * Contexts and pages are plain records. Navigation can be delayed, made
 * to hang or fail, and replays scripted responses to the page's listeners.
 * crash() behaves like the browser process going away.
 */

import type { EngineCookie, EngineDriver, EngineResponse, ResponseListener } from '../../src/types/index.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

interface FakeContext {
  cookies: EngineCookie[];
}

interface FakePage {
  contextId: string;
  url: string | null;
  listeners: Set<ResponseListener>;
}

export class FakeEngineDriver implements EngineDriver {
  running = false;
  startCalls = 0;
  stopCalls = 0;

  /** Held by start() until resolved */
  startGate: Promise<void> | null = null;
  startError: Error | null = null;
  /** Held by createContext() until resolved */
  contextGate: Promise<void> | null = null;
  /** Held by createPage() until resolved */
  pageGate: Promise<void> | null = null;

  navigationDelayMs = 0;
  hangNavigation = false;
  navigationError: Error | null = null;
  /** Copied into every new context */
  defaultCookies: EngineCookie[] = [];

  readonly contexts: Map<string, FakeContext> = new Map();
  readonly pages: Map<string, FakePage> = new Map();
  readonly navigations: Array<{ pageId: string; url: string }> = [];
  readonly closedPages: string[] = [];
  readonly destroyedContexts: string[] = [];
  pendingContextCreates = 0;
  pendingPageCreates = 0;

  private scripted: Map<string, EngineResponse[]> = new Map();
  private disconnectListeners: Set<(reason: string) => void> = new Set();
  private nextId = 0;

  async start(): Promise<void> {
    this.startCalls++;
    if (this.startGate) {
      await this.startGate;
    }
    if (this.startError) {
      throw this.startError;
    }
    this.running = true;
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    this.running = false;
    this.contexts.clear();
    this.pages.clear();
  }

  async createContext(): Promise<string> {
    this.requireRunning();
    this.pendingContextCreates++;
    try {
      if (this.contextGate) {
        await this.contextGate;
      }
    } finally {
      this.pendingContextCreates--;
    }
    this.requireRunning();
    const id = `ctx-${++this.nextId}`;
    this.contexts.set(id, { cookies: [...this.defaultCookies] });
    return id;
  }

  async destroyContext(contextId: string): Promise<void> {
    this.destroyedContexts.push(contextId);
    this.contexts.delete(contextId);
    for (const [pageId, page] of [...this.pages]) {
      if (page.contextId === contextId) {
        this.pages.delete(pageId);
      }
    }
  }

  async createPage(contextId: string): Promise<string> {
    this.requireRunning();
    if (!this.contexts.has(contextId)) {
      throw new Error(`No such context: ${contextId}`);
    }
    this.pendingPageCreates++;
    try {
      if (this.pageGate) {
        await this.pageGate;
      }
    } finally {
      this.pendingPageCreates--;
    }
    this.requireRunning();
    const id = `page-${++this.nextId}`;
    this.pages.set(id, { contextId, url: null, listeners: new Set() });
    return id;
  }

  async closePage(pageId: string): Promise<void> {
    this.closedPages.push(pageId);
    this.pages.delete(pageId);
  }

  async navigate(pageId: string, url: string): Promise<void> {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new Error(`No such page: ${pageId}`);
    }
    this.navigations.push({ pageId, url });

    if (this.hangNavigation) {
      return new Promise<void>(() => {});
    }
    if (this.navigationDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.navigationDelayMs));
    }
    if (this.navigationError) {
      throw this.navigationError;
    }

    page.url = url;
    for (const response of this.scripted.get(url) ?? []) {
      this.emitResponse(pageId, response);
    }
  }

  onResponse(pageId: string, listener: ResponseListener): () => void {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new Error(`No such page: ${pageId}`);
    }
    page.listeners.add(listener);
    return () => {
      page.listeners.delete(listener);
    };
  }

  onDisconnected(listener: (reason: string) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  async cookies(contextId: string): Promise<EngineCookie[]> {
    return [...(this.contexts.get(contextId)?.cookies ?? [])];
  }

  // ============================================
  // TEST CONTROLS
  // ============================================

  /** Responses delivered to a page whenever it navigates to `url` */
  scriptResponses(url: string, responses: EngineResponse[]): void {
    this.scripted.set(url, responses);
  }

  emitResponse(pageId: string, response: EngineResponse): void {
    for (const listener of [...(this.pages.get(pageId)?.listeners ?? [])]) {
      listener(response);
    }
  }

  /** Simulate the browser process dying */
  crash(reason = 'Browser process exited'): void {
    this.running = false;
    this.contexts.clear();
    this.pages.clear();
    for (const listener of [...this.disconnectListeners]) {
      listener(reason);
    }
  }

  listenerCount(pageId: string): number {
    return this.pages.get(pageId)?.listeners.size ?? 0;
  }

  private requireRunning(): void {
    if (!this.running) {
      throw new Error('Target closed');
    }
  }
}

export function mediaResponse(url: string, overrides: Partial<EngineResponse> = {}): EngineResponse {
  return {
    url,
    status: 200,
    method: 'GET',
    resourceType: 'media',
    requestHeaders: {},
    ...overrides,
  };
}
