/**
 * Download Dispatcher - bounded, deduplicated, retrying download queue
 *
 * Jobs move Queued → Running → Completed | Failed, with Paused and
 * Cancelled reachable by command. At most `maxConcurrent` transfers are in
 * flight; a job's slot is freed once its transfer has settled, so an abort
 * never lets a replacement overlap the transfer it replaces.
 *
 * Transient failures are retried with exponential backoff up to
 * `maxAttempts`; a job waiting out its backoff is Queued and counts
 * against the queue capacity. Permanent failures end the job at once.
 *
 * A cancelled job gives up its URL at once but keeps its destination until
 * its transfer has settled, and a new job for the same URL does not start
 * before then. Finished jobs are kept in a bounded history.
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import {
  NotFoundError,
  ResourceExhaustedError,
  StateViolationError,
  classifyTransferFailure,
  toTransferFailure,
  type OrchestratorError,
} from '../types/errors.js';
import {
  TERMINAL_JOB_STATUSES,
  type DownloadJob,
  type EngineCookie,
  type MediaFetcher,
  type MediaRecord,
  type MediaTranscoder,
  type TaskId,
  type TransferFailure,
  type TransferResult,
} from '../types/index.js';
import { filenameFromUrl, withSuffix } from '../utils/filename.js';
import { logger } from '../utils/logger.js';
import { backoffDelay, canRetry, type RetryPolicy } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { EventBus } from './event-bus.js';
import { buildRequestHeaders } from './request-headers.js';

/**
 * What the dispatcher needs from the task registry
 */
export interface DownloadTaskPort {
  /** @throws when the task is closed or unknown */
  beginJob(taskId: TaskId): void;
  endJob(taskId: TaskId): void;
  cookiesFor(taskId: TaskId, url: string): Promise<EngineCookie[]>;
}

export interface DownloadDispatcherConfig {
  directory: string;
  queueCapacity: number;
  maxConcurrent: number;
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
  transferTimeoutMs: number;
  /** How many finished jobs stay queryable */
  historyLimit: number;
}

const DEFAULT_CONFIG: DownloadDispatcherConfig = {
  directory: './downloads',
  queueCapacity: 100,
  maxConcurrent: 3,
  maxAttempts: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2,
  transferTimeoutMs: TIMEOUTS.DOWNLOAD_TRANSFER,
  historyLimit: 256,
};

export interface DispatcherStats {
  queued: number;
  running: number;
  paused: number;
  inFlight: number;
  total: number;
}

type AbortReason = 'pause' | 'cancel' | 'timeout';

interface JobEntry {
  job: DownloadJob;
  controller: AbortController | null;
  abortReason: AbortReason | null;
  retryTimer: NodeJS.Timeout | null;
  /** Incremented per attempt; a settling transfer with an older token is stale */
  token: number;
}

interface Attempt {
  url: string;
  settled: Promise<void>;
}

export class DownloadDispatcher {
  private config: DownloadDispatcherConfig;
  private entries: Map<string, JobEntry> = new Map();
  /** URL → id of the unfinished job for it */
  private byUrl: Map<string, string> = new Map();
  private claimedDestinations: Set<string> = new Set();
  /** Job ids ready to start, in FIFO order */
  private ready: string[] = [];
  /** Job ids whose transfer has not settled yet */
  private inFlight: Map<string, Attempt> = new Map();
  /** Finished job ids, oldest first */
  private history: Set<string> = new Set();

  constructor(
    private readonly fetcher: MediaFetcher,
    private readonly transcoder: MediaTranscoder,
    private readonly tasks: DownloadTaskPort,
    private readonly bus: EventBus,
    config: Partial<DownloadDispatcherConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private get retryPolicy(): RetryPolicy {
    return {
      maxAttempts: this.config.maxAttempts,
      initialDelayMs: this.config.initialBackoffMs,
      maxDelayMs: this.config.maxBackoffMs,
      backoffMultiplier: this.config.backoffMultiplier,
    };
  }

  // ============================================
  // COMMANDS
  // ============================================

  /**
   * Queue a download for a record. A URL that already has an unfinished
   * job is coalesced into that job.
   *
   * @throws ResourceExhaustedError when the queue is full
   * @throws StateViolationError when the owning task is closed
   */
  enqueue(record: MediaRecord): DownloadJob {
    const existingId = this.byUrl.get(record.url);
    const existing = existingId ? this.entries.get(existingId) : undefined;
    if (existing) {
      logger.dispatcher.debug('Coalesced duplicate request', { jobId: existing.job.id, url: record.url });
      return this.snapshot(existing);
    }

    if (this.countByStatus('queued') >= this.config.queueCapacity) {
      throw new ResourceExhaustedError(`Download queue is full (${this.config.queueCapacity})`, {
        url: record.url,
        limit: this.config.queueCapacity,
      });
    }
    if (record.taskId !== null) {
      this.tasks.beginJob(record.taskId);
    }

    const id = randomUUID();
    const now = Date.now();
    const job: DownloadJob = {
      id,
      record,
      status: 'queued',
      progress: 0,
      destination: this.claimDestination(record, id),
      attempts: 0,
      createdAt: now,
      updatedAt: now,
    };
    const entry: JobEntry = { job, controller: null, abortReason: null, retryTimer: null, token: 0 };
    this.entries.set(id, entry);
    this.byUrl.set(record.url, id);
    this.ready.push(id);

    logger.dispatcher.info('Download queued', { jobId: id, url: record.url, type: record.type, taskId: record.taskId });
    this.bus.log('info', `[Download] Queued: ${record.url}`);
    this.publishStatus(entry);
    this.pump();
    return this.snapshot(entry);
  }

  /**
   * Cancel a job. Cancelling a finished job is a no-op.
   *
   * @throws NotFoundError for unknown job ids
   */
  cancel(jobId: string): DownloadJob {
    const entry = this.require(jobId);
    if (TERMINAL_JOB_STATUSES.has(entry.job.status)) {
      return this.snapshot(entry);
    }

    this.clearRetry(entry);
    this.abortTransfer(entry, 'cancel');
    this.setStatus(entry, 'cancelled');
    this.finish(entry);
    logger.dispatcher.info('Download cancelled', { jobId });
    this.bus.log('info', `[Download] Cancelled: ${entry.job.record.url}`);
    this.pump();
    return this.snapshot(entry);
  }

  /**
   * Stop a queued or running job without giving up its URL
   *
   * @throws StateViolationError for finished jobs
   */
  pause(jobId: string): DownloadJob {
    const entry = this.require(jobId);
    const { status } = entry.job;
    if (status === 'paused') {
      return this.snapshot(entry);
    }
    if (status !== 'queued' && status !== 'running') {
      throw new StateViolationError('pause a download', status, { jobId });
    }

    this.clearRetry(entry);
    this.abortTransfer(entry, 'pause');
    this.setStatus(entry, 'paused');
    logger.dispatcher.info('Download paused', { jobId });
    this.pump();
    return this.snapshot(entry);
  }

  /**
   * Put a paused job back in the queue
   *
   * @throws StateViolationError unless the job is paused
   * @throws ResourceExhaustedError when the queue is full
   */
  resume(jobId: string): DownloadJob {
    const entry = this.require(jobId);
    const { status } = entry.job;
    if (status === 'queued' || status === 'running') {
      return this.snapshot(entry);
    }
    if (status !== 'paused') {
      throw new StateViolationError('resume a download', status, { jobId });
    }
    if (this.countByStatus('queued') >= this.config.queueCapacity) {
      throw new ResourceExhaustedError(`Download queue is full (${this.config.queueCapacity})`, {
        jobId,
        limit: this.config.queueCapacity,
      });
    }

    this.setStatus(entry, 'queued');
    this.ready.push(jobId);
    logger.dispatcher.info('Download resumed', { jobId });
    this.pump();
    return this.snapshot(entry);
  }

  /**
   * Cancel every unfinished job owned by a task
   */
  cancelForTask(taskId: TaskId): number {
    const owned = [...this.entries.values()].filter(
      (entry) => entry.job.record.taskId === taskId && !TERMINAL_JOB_STATUSES.has(entry.job.status)
    );
    for (const entry of owned) {
      this.cancel(entry.job.id);
    }
    if (owned.length > 0) {
      logger.dispatcher.info('Cancelled jobs of closed task', { taskId, count: owned.length });
    }
    return owned.length;
  }

  /**
   * Cancel everything and wait for in-flight transfers to settle
   */
  async shutdown(): Promise<void> {
    for (const entry of [...this.entries.values()]) {
      if (!TERMINAL_JOB_STATUSES.has(entry.job.status)) {
        this.cancel(entry.job.id);
      }
    }
    await this.settleInFlight();
  }

  // ============================================
  // QUERIES
  // ============================================

  /**
   * @throws NotFoundError for unknown job ids
   */
  get(jobId: string): DownloadJob {
    return this.snapshot(this.require(jobId));
  }

  list(): DownloadJob[] {
    return [...this.entries.values()].map((entry) => this.snapshot(entry));
  }

  findByUrl(url: string): DownloadJob | undefined {
    const id = this.byUrl.get(url);
    const entry = id ? this.entries.get(id) : undefined;
    return entry ? this.snapshot(entry) : undefined;
  }

  stats(): DispatcherStats {
    return {
      queued: this.countByStatus('queued'),
      running: this.countByStatus('running'),
      paused: this.countByStatus('paused'),
      inFlight: this.inFlight.size,
      total: this.entries.size,
    };
  }

  /**
   * Resolves once no transfer is in flight
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await this.settleInFlight();
    }
  }

  private async settleInFlight(): Promise<void> {
    await Promise.all([...this.inFlight.values()].map((attempt) => attempt.settled));
  }

  // ============================================
  // SCHEDULING
  // ============================================

  private pump(): void {
    for (const id of [...this.ready]) {
      if (this.inFlight.size >= this.config.maxConcurrent) {
        return;
      }
      const entry = this.entries.get(id);
      if (!entry || entry.job.status !== 'queued') {
        this.removeReady(id);
        continue;
      }
      // An aborted transfer of this job is still winding down
      if (this.inFlight.has(id) || this.isUrlInFlight(entry.job.record.url)) {
        continue;
      }
      this.removeReady(id);
      this.start(entry);
    }
  }

  private start(entry: JobEntry): void {
    const { job } = entry;
    const controller = new AbortController();
    entry.controller = controller;
    entry.abortReason = null;
    entry.token++;
    job.attempts++;
    this.setStatus(entry, 'running');

    logger.dispatcher.info('Download starting', { jobId: job.id, attempt: job.attempts, url: job.record.url });
    this.bus.log('info', `[Download] Starting: ${job.record.url}`);

    const settled = this.runAttempt(entry, entry.token, controller)
      .catch((error: unknown) => {
        logger.dispatcher.error('Attempt handler failed', { jobId: job.id, error });
      })
      .finally(() => {
        this.inFlight.delete(job.id);
        if (TERMINAL_JOB_STATUSES.has(job.status)) {
          this.claimedDestinations.delete(job.destination);
        }
        this.pump();
      });
    this.inFlight.set(job.id, { url: job.record.url, settled });
  }

  private isUrlInFlight(url: string): boolean {
    for (const attempt of this.inFlight.values()) {
      if (attempt.url === url) return true;
    }
    return false;
  }

  private async runAttempt(entry: JobEntry, token: number, controller: AbortController): Promise<void> {
    const { job } = entry;
    const timer = setTimeout(() => {
      if (entry.token === token && entry.controller === controller) {
        entry.abortReason = 'timeout';
        controller.abort();
      }
    }, this.config.transferTimeoutMs);

    let result: TransferResult | null = null;
    let thrown: unknown = null;
    try {
      const cookies = job.record.taskId !== null ? await this.tasks.cookiesFor(job.record.taskId, job.record.url) : [];
      if (!controller.signal.aborted) {
        const headers = buildRequestHeaders(job.record, cookies);
        result = await this.transfer(entry, headers, controller.signal, token);
      }
    } catch (error) {
      thrown = error;
    } finally {
      clearTimeout(timer);
    }

    if (entry.token !== token || job.status !== 'running') {
      // Paused or cancelled while the transfer ran; the command already settled the job
      return;
    }
    entry.controller = null;

    const failure = this.failureOf(entry.abortReason, result, thrown);
    entry.abortReason = null;
    if (!failure) {
      this.complete(entry, result?.bytesWritten ?? 0);
      return;
    }
    this.handleFailure(entry, failure);
  }

  private transfer(
    entry: JobEntry,
    headers: Record<string, string>,
    signal: AbortSignal,
    token: number
  ): Promise<TransferResult> {
    const { record, destination } = entry.job;
    const options = {
      signal,
      onProgress: (fraction: number) => {
        if (entry.token === token && entry.job.status === 'running') {
          this.reportProgress(entry, fraction);
        }
      },
    };

    switch (record.type) {
      case 'm3u8':
      case 'mpd':
        return this.transcoder.transcode(record.url, headers, destination, options);
      case 'mp4':
      case 'other':
        return this.fetcher.fetch(record.url, headers, destination, options);
    }
  }

  private failureOf(
    abortReason: AbortReason | null,
    result: TransferResult | null,
    thrown: unknown
  ): TransferFailure | null {
    if (abortReason === 'timeout') {
      return { message: `Transfer timed out after ${this.config.transferTimeoutMs}ms`, code: 'TRANSFER_TIMEOUT' };
    }
    if (thrown !== null) {
      return toTransferFailure(thrown);
    }
    if (!result) {
      return { message: 'Transfer produced no result' };
    }
    return result.error ?? null;
  }

  private handleFailure(entry: JobEntry, failure: TransferFailure): void {
    const { job } = entry;
    const error = classifyTransferFailure(failure, { jobId: job.id, url: job.record.url });
    job.lastError = error.message;

    if (error.retryable && canRetry(job.attempts, this.retryPolicy)) {
      this.scheduleRetry(entry, error);
      return;
    }
    this.fail(entry, error);
  }

  private scheduleRetry(entry: JobEntry, error: OrchestratorError): void {
    const { job } = entry;
    const delayMs = backoffDelay(job.attempts, this.retryPolicy);
    this.setStatus(entry, 'queued');

    logger.dispatcher.warn('Transient failure, retrying', {
      jobId: job.id,
      attempt: job.attempts,
      maxAttempts: this.config.maxAttempts,
      delayMs,
      error: error.message,
    });
    this.bus.log('warn', `[Download] Retrying in ${delayMs}ms (attempt ${job.attempts}/${this.config.maxAttempts}): ${error.message}`);

    const timer = setTimeout(() => {
      entry.retryTimer = null;
      if (job.status === 'queued') {
        this.ready.push(job.id);
        this.pump();
      }
    }, delayMs);
    timer.unref();
    entry.retryTimer = timer;
  }

  private complete(entry: JobEntry, bytesWritten: number): void {
    const { job } = entry;
    this.reportProgress(entry, 1);
    this.setStatus(entry, 'completed');
    this.finish(entry);

    logger.dispatcher.info('Download completed', { jobId: job.id, destination: job.destination, bytesWritten });
    this.bus.log('info', `[Download] Completed: ${job.destination}`);
    this.bus.publish({ type: 'download_complete', jobId: job.id, path: job.destination });
  }

  private fail(entry: JobEntry, error: OrchestratorError): void {
    const { job } = entry;
    this.setStatus(entry, 'failed');
    this.finish(entry);

    logger.dispatcher.error('Download failed', { jobId: job.id, code: error.code, attempts: job.attempts, error: error.message });
    this.bus.log('error', `[Download] Failed: ${error.message}`);
    this.bus.publish({ type: 'download_failed', jobId: job.id, reason: error.message, code: error.code });
  }

  /**
   * Leave the unfinished set: free the URL and the task's job count. The
   * destination stays claimed while a transfer to it is still settling.
   */
  private finish(entry: JobEntry): void {
    const { job } = entry;
    if (this.byUrl.get(job.record.url) === job.id) {
      this.byUrl.delete(job.record.url);
    }
    if (!this.inFlight.has(job.id)) {
      this.claimedDestinations.delete(job.destination);
    }
    this.removeReady(job.id);
    if (job.record.taskId !== null) {
      this.tasks.endJob(job.record.taskId);
    }
    this.remember(job.id);
  }

  private remember(jobId: string): void {
    this.history.add(jobId);
    while (this.history.size > this.config.historyLimit) {
      const oldest = this.history.values().next();
      if (oldest.done) break;
      this.history.delete(oldest.value);
      this.entries.delete(oldest.value);
    }
  }

  private reportProgress(entry: JobEntry, fraction: number): void {
    const clamped = Math.min(1, Math.max(0, fraction));
    if (!(clamped > entry.job.progress)) {
      return;
    }
    entry.job.progress = clamped;
    entry.job.updatedAt = Date.now();
    this.bus.publish({ type: 'download_progress', jobId: entry.job.id, fraction: clamped });
  }

  private setStatus(entry: JobEntry, status: DownloadJob['status']): void {
    entry.job.status = status;
    entry.job.updatedAt = Date.now();
    this.publishStatus(entry);
  }

  private publishStatus(entry: JobEntry): void {
    this.bus.publish({
      type: 'download_status',
      jobId: entry.job.id,
      status: entry.job.status,
      attempt: entry.job.attempts,
    });
  }

  private abortTransfer(entry: JobEntry, reason: AbortReason): void {
    if (entry.controller) {
      entry.abortReason = reason;
      entry.controller.abort();
      entry.controller = null;
    }
  }

  private clearRetry(entry: JobEntry): void {
    if (entry.retryTimer) {
      clearTimeout(entry.retryTimer);
      entry.retryTimer = null;
    }
  }

  private claimDestination(record: MediaRecord, jobId: string): string {
    const filename = filenameFromUrl(record.url, record.type);
    let destination = path.join(this.config.directory, filename);
    if (this.claimedDestinations.has(destination)) {
      destination = path.join(this.config.directory, withSuffix(filename, jobId.slice(0, 8)));
    }
    this.claimedDestinations.add(destination);
    return destination;
  }

  private removeReady(jobId: string): void {
    const index = this.ready.indexOf(jobId);
    if (index >= 0) {
      this.ready.splice(index, 1);
    }
  }

  private countByStatus(status: DownloadJob['status']): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.job.status === status) count++;
    }
    return count;
  }

  private require(jobId: string): JobEntry {
    const entry = this.entries.get(jobId);
    if (!entry) {
      throw new NotFoundError('job', jobId);
    }
    return entry;
  }

  private snapshot(entry: JobEntry): DownloadJob {
    return { ...entry.job };
  }
}
