/**
 * Playwright Engine Driver - the browser engine behind EngineSingleton
 *
 * playwright-core is loaded on first start, so the rest of the orchestrator
 * (and its tests) never needs a browser installed. Contexts and pages are
 * handed out as opaque ids.
 */

import { randomUUID } from 'crypto';
import type { Browser, BrowserContext, Page, Response } from 'playwright-core';
import { EngineUnavailableError, NavigationTimeoutError } from '../types/errors.js';
import type { EngineCookie, EngineDriver, EngineResponse, ResponseListener } from '../types/index.js';
import { logger } from '../utils/logger.js';

type PlaywrightModule = typeof import('playwright-core');

let playwrightModule: PlaywrightModule | null = null;

/**
 * Load playwright-core once
 *
 * @throws EngineUnavailableError when the package cannot be loaded
 */
export async function loadPlaywright(): Promise<PlaywrightModule> {
  if (playwrightModule) {
    return playwrightModule;
  }
  try {
    playwrightModule = await import('playwright-core');
    return playwrightModule;
  } catch (error) {
    throw new EngineUnavailableError(
      'playwright-core could not be loaded. Install it with: npm install playwright-core',
      { cause: error }
    );
  }
}

export interface PlaywrightEngineOptions {
  headless?: boolean;
  /** Chromium binary to launch instead of Playwright's bundled one */
  executablePath?: string;
  /** Installed browser channel, e.g. 'chrome' or 'msedge' */
  channel?: string;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--autoplay-policy=no-user-gesture-required'];

function toEngineResponse(response: Response): EngineResponse {
  const request = response.request();
  let frameUrl: string | undefined;
  try {
    frameUrl = request.frame().url();
  } catch {
    // Service worker requests have no frame
    frameUrl = undefined;
  }
  return {
    url: response.url(),
    status: response.status(),
    method: request.method(),
    contentType: response.headers()['content-type'],
    resourceType: request.resourceType(),
    requestHeaders: request.headers(),
    frameUrl,
  };
}

export class PlaywrightEngineDriver implements EngineDriver {
  private playwright: PlaywrightModule | null = null;
  private browser: Browser | null = null;
  private contexts: Map<string, BrowserContext> = new Map();
  private pages: Map<string, Page> = new Map();
  private disconnectListeners: Set<(reason: string) => void> = new Set();
  private stopping = false;
  private readonly options: PlaywrightEngineOptions;

  constructor(options: PlaywrightEngineOptions = {}) {
    this.options = options;
  }

  async start(): Promise<void> {
    if (this.browser) {
      return;
    }
    const pw = await loadPlaywright();
    this.playwright = pw;
    this.stopping = false;

    const browser = await pw.chromium.launch({
      headless: this.options.headless ?? true,
      executablePath: this.options.executablePath,
      channel: this.options.channel,
      args: LAUNCH_ARGS,
    });
    browser.on('disconnected', () => this.handleDisconnected());
    this.browser = browser;
    logger.engine.info('Chromium launched', { version: browser.version(), headless: this.options.headless ?? true });
  }

  async stop(): Promise<void> {
    const browser = this.browser;
    if (!browser) {
      return;
    }
    this.stopping = true;
    this.browser = null;
    this.contexts.clear();
    this.pages.clear();
    try {
      await browser.close();
    } finally {
      this.stopping = false;
    }
  }

  async createContext(): Promise<string> {
    const context = await this.requireBrowser().newContext({
      userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
      viewport: { width: 1920, height: 1080 },
    });
    const id = randomUUID();
    this.contexts.set(id, context);
    return id;
  }

  async destroyContext(contextId: string): Promise<void> {
    const context = this.contexts.get(contextId);
    if (!context) {
      return;
    }
    this.contexts.delete(contextId);
    for (const [pageId, page] of this.pages) {
      if (page.context() === context) {
        this.pages.delete(pageId);
      }
    }
    await context.close();
  }

  async createPage(contextId: string): Promise<string> {
    const context = this.contexts.get(contextId);
    if (!context) {
      throw new EngineUnavailableError(`Unknown engine context: ${contextId}`);
    }
    const page = await context.newPage();
    const id = randomUUID();
    this.pages.set(id, page);
    page.on('close', () => this.pages.delete(id));
    return id;
  }

  async closePage(pageId: string): Promise<void> {
    const page = this.pages.get(pageId);
    if (!page) {
      return;
    }
    this.pages.delete(pageId);
    await page.close();
  }

  async navigate(pageId: string, url: string, options: { timeoutMs: number }): Promise<void> {
    const page = this.requirePage(pageId);
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
    } catch (error) {
      if (this.playwright && error instanceof this.playwright.errors.TimeoutError) {
        throw new NavigationTimeoutError(url, options.timeoutMs);
      }
      throw error;
    }
  }

  onResponse(pageId: string, listener: ResponseListener): () => void {
    const page = this.requirePage(pageId);
    const handler = (response: Response) => {
      listener(toEngineResponse(response));
    };
    page.on('response', handler);
    return () => {
      page.off('response', handler);
    };
  }

  onDisconnected(listener: (reason: string) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  async cookies(contextId: string, url: string): Promise<EngineCookie[]> {
    const context = this.contexts.get(contextId);
    if (!context) {
      return [];
    }
    const cookies = await context.cookies(url);
    return cookies.map(({ name, value }) => ({ name, value }));
  }

  private handleDisconnected(): void {
    if (this.stopping) {
      return;
    }
    this.browser = null;
    this.contexts.clear();
    this.pages.clear();
    logger.engine.error('Chromium disconnected unexpectedly');
    for (const listener of this.disconnectListeners) {
      listener('Browser process disconnected');
    }
  }

  private requireBrowser(): Browser {
    if (!this.browser) {
      throw new EngineUnavailableError('Browser is not running');
    }
    return this.browser;
  }

  private requirePage(pageId: string): Page {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new EngineUnavailableError(`Unknown engine page: ${pageId}`);
    }
    return page;
  }
}
