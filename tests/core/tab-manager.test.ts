import { describe, it, expect, vi } from 'vitest';
import { normalizeUrl } from '../../src/core/tab-manager.js';
import { ResourceExhaustedError } from '../../src/types/errors.js';
import { deferred, mediaResponse } from '../helpers/fake-engine.js';
import { createHarness } from '../helpers/harness.js';

const PAGE_URL = 'https://site.test/watch';

describe('normalizeUrl', () => {
  it('defaults the scheme to https', () => {
    expect(normalizeUrl('  site.test/watch ')).toBe(PAGE_URL);
  });

  it('rejects empty input and non-http schemes', () => {
    expect(() => normalizeUrl('   ')).toThrow('URL must not be empty');
    expect(() => normalizeUrl('ftp://files.test/a')).toThrow('Unsupported URL scheme: ftp:');
  });
});

describe('TabManager', () => {
  describe('create', () => {
    it('creates an idle task with its own context and announces it', async () => {
      const { tabs, pool, eventsOf } = createHarness();

      const id = await tabs.create('site.test/watch');

      const snapshot = tabs.get(id);
      expect(snapshot).toMatchObject({ id, url: PAGE_URL, state: 'idle', hasPage: false, pageId: null });
      expect(snapshot.contextId).not.toBeNull();
      expect(pool.liveContextCount).toBe(1);
      expect(eventsOf('task_created')).toEqual([{ type: 'task_created', taskId: id, url: PAGE_URL, state: 'idle' }]);
    });

    it('admits exactly the context cap out of a concurrent burst', async () => {
      const { tabs, pool } = createHarness({ pool: { maxContexts: 10 } });

      const results = await Promise.allSettled(Array.from({ length: 50 }, () => tabs.create(PAGE_URL)));

      const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(10);
      expect(rejected).toHaveLength(40);
      expect(rejected.every((reason) => reason instanceof ResourceExhaustedError)).toBe(true);
      expect(tabs.size).toBe(10);
      expect(pool.liveContextCount).toBe(10);
    });
  });

  describe('navigate', () => {
    it('captures media on a transient page and releases it after the capture window', async () => {
      const { driver, tabs, pool, eventsOf } = createHarness();
      driver.scriptResponses(PAGE_URL, [mediaResponse('https://cdn.test/clip.mp4')]);
      const id = await tabs.create('https://site.test/');

      const snapshot = await tabs.navigate(id, PAGE_URL);

      expect(snapshot).toMatchObject({ url: PAGE_URL, state: 'active', hasPage: false, mediaCount: 1 });
      expect(eventsOf('media_detected').map((event) => event.record.url)).toEqual(['https://cdn.test/clip.mp4']);
      await vi.waitFor(() => expect(pool.livePageCount).toBe(0));
      expect(tabs.get(id).state).toBe('active');
    });

    it('tags captured media with the page being navigated to', async () => {
      const { driver, tabs, eventsOf } = createHarness();
      driver.scriptResponses(PAGE_URL, [mediaResponse('https://cdn.test/clip.mp4')]);
      const id = await tabs.create('https://site.test/');

      await tabs.navigate(id, PAGE_URL);

      expect(eventsOf('media_detected').map((event) => event.record.pageUrl)).toEqual([PAGE_URL]);
    });

    it('restores the state and releases the page when navigation times out', async () => {
      const { driver, tabs, pool, eventsOf } = createHarness({ tabs: { navigationTimeoutMs: 50 } });
      const id = await tabs.create(PAGE_URL);
      driver.hangNavigation = true;

      await expect(tabs.navigate(id, PAGE_URL)).rejects.toMatchObject({
        code: 'NAVIGATION_TIMEOUT',
        message: `Navigation to ${PAGE_URL} timed out after 50ms`,
      });

      expect(tabs.get(id).state).toBe('idle');
      expect(pool.livePageCount).toBe(0);
      expect(driver.closedPages).toHaveLength(1);
      expect(eventsOf('task_error')).toEqual([
        {
          type: 'task_error',
          taskId: id,
          code: 'NAVIGATION_TIMEOUT',
          message: `Navigation to ${PAGE_URL} timed out after 50ms`,
        },
      ]);
    });
  });

  describe('browsing', () => {
    it('toggles between browsing and the prior state on the same context', async () => {
      const { driver, tabs, pool } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.navigate(id, PAGE_URL);
      const contextId = tabs.get(id).contextId;

      const browsing = await tabs.toggleBrowse(id);
      expect(browsing.state).toBe('browsing');
      expect(browsing.hasPage).toBe(true);
      expect(browsing.pageId).not.toBeNull();
      expect(pool.livePageCount).toBe(1);

      const background = await tabs.toggleBrowse(id);
      expect(background.state).toBe('active');
      expect(background.hasPage).toBe(false);
      expect(background.contextId).toBe(contextId);
      expect(driver.destroyedContexts).toEqual([]);
      expect(pool.livePageCount).toBe(0);
    });

    it('rejects a second attach without side effects', async () => {
      const { tabs, pool } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.attachPage(id);

      await expect(tabs.attachPage(id)).rejects.toThrow('Cannot attach a page while browsing');
      expect(pool.livePageCount).toBe(1);
    });

    it('rejects detaching an idle task', async () => {
      const { tabs } = createHarness();
      const id = await tabs.create(PAGE_URL);

      await expect(tabs.detachPage(id)).rejects.toMatchObject({ code: 'STATE_VIOLATION' });
    });
  });

  describe('resetContext', () => {
    it('swaps in a fresh context and returns to idle', async () => {
      const { driver, tabs } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.navigate(id, PAGE_URL);
      const before = tabs.get(id).contextId;

      const snapshot = await tabs.resetContext(id);

      expect(snapshot.state).toBe('idle');
      expect(snapshot.contextId).not.toBeNull();
      expect(snapshot.contextId).not.toBe(before);
      expect(driver.destroyedContexts).toHaveLength(1);
    });

    it('is refused while browsing', async () => {
      const { tabs } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.attachPage(id);

      await expect(tabs.resetContext(id)).rejects.toThrow('Cannot reset the context while browsing');
    });
  });

  describe('download accounting', () => {
    it('shows downloading while jobs are unfinished', async () => {
      const { tabs } = createHarness();
      const id = await tabs.create(PAGE_URL);

      tabs.beginJob(id);
      expect(tabs.get(id).state).toBe('downloading');
      tabs.endJob(id);
      expect(tabs.get(id).state).toBe('idle');
    });

    it('refuses new jobs for unknown ids', () => {
      const { tabs } = createHarness();
      expect(() => tabs.beginJob('missing')).toThrow('Unknown task: missing');
    });
  });

  describe('close', () => {
    it('releases everything and notifies close listeners', async () => {
      const { tabs, pool, eventsOf } = createHarness();
      const closed: string[] = [];
      tabs.onTaskClosed((taskId) => closed.push(taskId));
      const id = await tabs.create(PAGE_URL);
      await tabs.attachPage(id);

      await tabs.close(id);

      expect(tabs.has(id)).toBe(false);
      expect(tabs.wasClosed(id)).toBe(true);
      expect(pool.stats()).toMatchObject({ liveContexts: 0, livePages: 0 });
      expect(closed).toEqual([id]);
      expect(eventsOf('task_updated').at(-1)).toEqual({ type: 'task_updated', taskId: id, state: 'closed' });
    });

    it('reports NotFound on a second close and changes nothing', async () => {
      const { tabs, pool } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.close(id);
      const stats = pool.stats();

      await expect(tabs.close(id)).rejects.toMatchObject({ code: 'NOT_FOUND', message: `Unknown task: ${id}` });
      expect(pool.stats()).toEqual(stats);
    });

    it('answers later commands on the closed id', async () => {
      const { tabs } = createHarness();
      const id = await tabs.create(PAGE_URL);
      await tabs.close(id);

      await expect(tabs.navigate(id, PAGE_URL)).rejects.toMatchObject({
        code: 'STATE_VIOLATION',
        message: 'Cannot navigate while closed',
      });
      expect(() => tabs.beginJob(id)).toThrow('Cannot start a download while closed');
      expect(() => tabs.get(id)).toThrow(`Unknown task: ${id}`);
    });

    it('forgets the oldest tombstones beyond the limit', async () => {
      const { tabs } = createHarness({ tabs: { tombstoneLimit: 1 } });
      const first = await tabs.create(PAGE_URL);
      const second = await tabs.create(PAGE_URL);
      await tabs.close(first);
      await tabs.close(second);

      expect(tabs.wasClosed(first)).toBe(false);
      expect(tabs.wasClosed(second)).toBe(true);
    });

    it('closes every task with closeAll', async () => {
      const { tabs, pool } = createHarness();
      await tabs.create(PAGE_URL);
      await tabs.create(PAGE_URL);

      await tabs.closeAll();

      expect(tabs.size).toBe(0);
      expect(pool.liveContextCount).toBe(0);
    });
  });

  describe('per-task ordering', () => {
    it('runs a close issued during a navigation after it and leaks nothing', async () => {
      const { driver, tabs, pool } = createHarness({ tabs: { captureWindowMs: 1000 } });
      driver.navigationDelayMs = 30;
      const id = await tabs.create('https://site.test/');
      const order: string[] = [];

      const navigating = tabs.navigate(id, PAGE_URL).then((snapshot) => {
        order.push('navigate');
        return snapshot;
      });
      const closing = tabs.close(id).then(() => {
        order.push('close');
      });
      const [snapshot] = await Promise.all([navigating, closing]);

      expect(order).toEqual(['navigate', 'close']);
      expect(snapshot).toMatchObject({ url: PAGE_URL, state: 'active' });
      expect(driver.navigations).toHaveLength(1);
      expect(pool.stats()).toMatchObject({ liveContexts: 0, livePages: 0, reservedContexts: 0, reservedPages: 0 });
      expect(driver.pages.size).toBe(0);
      expect(driver.contexts.size).toBe(0);
    });

    it('holds a close behind a pending attach and refuses commands queued after it', async () => {
      const { driver, tabs, pool } = createHarness();
      const id = await tabs.create(PAGE_URL);
      const gate = deferred();
      driver.pageGate = gate.promise;

      const toggling = tabs.toggleBrowse(id);
      const closing = tabs.close(id);
      const late = tabs.navigate(id, PAGE_URL).catch((error: unknown) => error);

      await vi.waitFor(() => expect(driver.pendingPageCreates).toBe(1));
      expect(tabs.has(id)).toBe(true);
      gate.resolve();

      await expect(toggling).resolves.toMatchObject({ state: 'browsing', hasPage: true });
      await closing;
      expect(await late).toMatchObject({ code: 'STATE_VIOLATION', message: 'Cannot navigate while closed' });
      expect(pool.stats()).toMatchObject({ liveContexts: 0, livePages: 0 });
      expect(driver.pages.size).toBe(0);
      expect(driver.closedPages).toHaveLength(1);
    });

    it('never lets interleaved creates and closes exceed the context cap', async () => {
      const { driver, tabs, pool } = createHarness({ pool: { maxContexts: 3 } });
      const occupied = () => pool.stats().liveContexts + pool.stats().reservedContexts;
      const a = await tabs.create(PAGE_URL);
      await tabs.create(PAGE_URL);
      const gate = deferred();
      driver.contextGate = gate.promise;

      const first = tabs.create(PAGE_URL);
      expect(occupied()).toBe(3);
      await expect(tabs.create(PAGE_URL)).rejects.toBeInstanceOf(ResourceExhaustedError);

      await tabs.close(a);
      expect(occupied()).toBe(2);
      const second = tabs.create(PAGE_URL);
      expect(occupied()).toBe(3);
      await expect(tabs.create(PAGE_URL)).rejects.toBeInstanceOf(ResourceExhaustedError);

      await vi.waitFor(() => expect(driver.pendingContextCreates).toBe(2));
      expect(occupied()).toBe(3);
      gate.resolve();
      await Promise.all([first, second]);

      expect(tabs.size).toBe(3);
      expect(pool.stats()).toMatchObject({ liveContexts: 3, reservedContexts: 0 });
      expect(driver.contexts.size).toBe(3);

      await tabs.closeAll();
      expect(pool.liveContextCount).toBe(0);
      expect(driver.contexts.size).toBe(0);
    });
  });

  describe('engine crash', () => {
    it('closes every task with EngineUnavailable until the engine is restarted', async () => {
      const { driver, engine, tabs, pool, eventsOf } = createHarness();
      const a = await tabs.create(PAGE_URL);
      const b = await tabs.create(PAGE_URL);

      driver.crash();

      expect(tabs.size).toBe(0);
      expect(pool.stats()).toMatchObject({ liveContexts: 0, livePages: 0 });
      expect(eventsOf('task_error')).toEqual([
        { type: 'task_error', taskId: a, code: 'ENGINE_UNAVAILABLE', message: 'Engine crashed: Browser process exited' },
        { type: 'task_error', taskId: b, code: 'ENGINE_UNAVAILABLE', message: 'Engine crashed: Browser process exited' },
      ]);
      expect(() => tabs.get(a)).toThrow(`Unknown task: ${a}`);
      await expect(tabs.create(PAGE_URL)).rejects.toMatchObject({ code: 'ENGINE_UNAVAILABLE' });

      await engine.restart();
      const id = await tabs.create(PAGE_URL);
      expect(tabs.get(id).state).toBe('idle');
    });
  });

  it('returns no cookies for an unknown task', async () => {
    const { tabs } = createHarness();
    await expect(tabs.cookiesFor('missing', PAGE_URL)).resolves.toEqual([]);
  });

  it('reads cookies from the task context', async () => {
    const { driver, tabs } = createHarness();
    driver.defaultCookies = [{ name: 'session', value: 'test-secret' }];
    const id = await tabs.create(PAGE_URL);

    await expect(tabs.cookiesFor(id, PAGE_URL)).resolves.toEqual([{ name: 'session', value: 'test-secret' }]);
  });
});
