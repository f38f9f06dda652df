/**
 * Stand-in for the parts of playwright-core the engine driver touches.
 * Tests install it with vi.mock('playwright-core').
 */

import { EventEmitter } from 'events';

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export const errors = { TimeoutError };

export interface FakeResponseInit {
  url: string;
  status?: number;
  method?: string;
  contentType?: string;
  resourceType?: string;
  requestHeaders?: Record<string, string>;
  /** Omit to simulate a request without a frame */
  frameUrl?: string;
}

export class FakeResponse {
  constructor(private readonly init: FakeResponseInit) {}

  url(): string {
    return this.init.url;
  }

  status(): number {
    return this.init.status ?? 200;
  }

  headers(): Record<string, string> {
    return this.init.contentType ? { 'content-type': this.init.contentType } : {};
  }

  request() {
    const { init } = this;
    return {
      method: () => init.method ?? 'GET',
      resourceType: () => init.resourceType ?? 'media',
      headers: () => ({ ...init.requestHeaders }),
      frame: () => {
        if (init.frameUrl === undefined) {
          throw new Error('Service worker request has no frame');
        }
        return { url: () => init.frameUrl };
      },
    };
  }
}

export class FakePage extends EventEmitter {
  readonly gotoCalls: Array<{ url: string; options: unknown }> = [];
  gotoError: Error | null = null;
  closed = false;

  constructor(private readonly owner: FakeContext) {
    super();
  }

  context(): FakeContext {
    return this.owner;
  }

  async goto(url: string, options: unknown): Promise<null> {
    this.gotoCalls.push({ url, options });
    if (this.gotoError) {
      throw this.gotoError;
    }
    return null;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.emit('close');
  }
}

export class FakeContext {
  readonly pages: FakePage[] = [];
  cookieList: Array<{ name: string; value: string; domain: string }> = [];
  closed = false;

  constructor(readonly options: unknown) {}

  async newPage(): Promise<FakePage> {
    const page = new FakePage(this);
    this.pages.push(page);
    return page;
  }

  async cookies(_url: string): Promise<Array<{ name: string; value: string; domain: string }>> {
    return [...this.cookieList];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowser extends EventEmitter {
  readonly contexts: FakeContext[] = [];
  closed = false;

  constructor(readonly launchOptions: unknown) {
    super();
  }

  version(): string {
    return '120.0.0.0';
  }

  async newContext(options: unknown): Promise<FakeContext> {
    const context = new FakeContext(options);
    this.contexts.push(context);
    return context;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.emit('disconnected');
  }
}

export const launched: FakeBrowser[] = [];

export const chromium = {
  async launch(options: unknown): Promise<FakeBrowser> {
    const browser = new FakeBrowser(options);
    launched.push(browser);
    return browser;
  },
};
