/**
 * Shared types for the tab orchestrator
 */

// ============================================
// TASKS
// ============================================

export type TaskId = string;

/**
 * Dominant displayed state of a task, computed from its flags
 */
export type TaskState = 'idle' | 'active' | 'browsing' | 'downloading' | 'closed';

/**
 * Work state of a task when no page or download dominates it
 */
export type BaseTaskState = Extract<TaskState, 'idle' | 'active'>;

/**
 * Why a page is leased: an interactive browsing surface, or a transient
 * page opened for a background navigation
 */
export type PagePurpose = 'browse' | 'capture';

export type HandleState = 'live' | 'released' | 'invalidated';

/**
 * Isolated cookie/storage scope leased from the engine
 */
export interface ContextHandle {
  readonly id: string;
  readonly ownerId: TaskId;
  readonly engineContextId: string;
  /** Engine generation the context belongs to; bumped on crash and shutdown */
  readonly generation: number;
  readonly acquiredAt: number;
  state: HandleState;
}

/**
 * Renderable surface leased from a context
 */
export interface PageHandle {
  readonly id: string;
  readonly contextId: string;
  readonly enginePageId: string;
  readonly purpose: PagePurpose;
  readonly acquiredAt: number;
  state: HandleState;
}

/**
 * Read-only view of a task
 */
export interface TaskSnapshot {
  id: TaskId;
  url: string;
  state: TaskState;
  contextId: string | null;
  pageId: string | null;
  hasPage: boolean;
  activeJobCount: number;
  mediaCount: number;
  createdAt: number;
  lastActiveAt: number;
}

// ============================================
// MEDIA
// ============================================

export const MEDIA_TYPES = ['mp4', 'm3u8', 'mpd', 'other'] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

/**
 * A classified, deduplicated media resource seen on a task's page
 */
export interface MediaRecord {
  readonly url: string;
  readonly type: MediaType;
  /** Request headers the page sent, for authenticated replay */
  readonly headers: Readonly<Record<string, string>>;
  /** Owning task, or null for a download of a URL no task has seen */
  readonly taskId: TaskId | null;
  /** URL of the page the request was issued from */
  readonly pageUrl?: string;
  readonly contentType?: string;
  readonly discoveredAt: number;
}

// ============================================
// DOWNLOADS
// ============================================

export type JobStatus = 'queued' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed', 'cancelled']);

export interface DownloadJob {
  id: string;
  record: MediaRecord;
  status: JobStatus;
  /** Fraction in [0, 1]; never decreases */
  progress: number;
  destination: string;
  attempts: number;
  createdAt: number;
  updatedAt: number;
  lastError?: string;
}

// ============================================
// ENGINE COLLABORATOR
// ============================================

/**
 * A network response observed on a page
 */
export interface EngineResponse {
  url: string;
  status: number;
  method: string;
  contentType?: string;
  /** Engine resource type of the originating request (document, media, xhr, ...) */
  resourceType?: string;
  requestHeaders: Record<string, string>;
  /** URL of the frame that issued the request */
  frameUrl?: string;
}

export type ResponseListener = (response: EngineResponse) => void;

export interface EngineCookie {
  name: string;
  value: string;
}

/**
 * Black-box browser engine. Contexts and pages are addressed by the
 * opaque ids the driver hands out.
 */
export interface EngineDriver {
  start(): Promise<void>;
  stop(): Promise<void>;
  createContext(): Promise<string>;
  destroyContext(contextId: string): Promise<void>;
  createPage(contextId: string): Promise<string>;
  closePage(pageId: string): Promise<void>;
  navigate(pageId: string, url: string, options: { timeoutMs: number }): Promise<void>;
  /** Subscribe to a page's responses; returns the unsubscribe function */
  onResponse(pageId: string, listener: ResponseListener): () => void;
  /** Notified when the engine process goes away without stop() */
  onDisconnected(listener: (reason: string) => void): () => void;
  cookies(contextId: string, url: string): Promise<EngineCookie[]>;
}

// ============================================
// TRANSFER COLLABORATORS
// ============================================

export interface TransferFailure {
  message: string;
  /** HTTP status, when the failure came from a response */
  status?: number;
  /** Node error code or a tool-specific code such as MALFORMED_MANIFEST */
  code?: string;
}

export interface TransferResult {
  bytesWritten: number;
  error?: TransferFailure;
}

export interface TransferOptions {
  signal: AbortSignal;
  onProgress?: (fraction: number) => void;
}

/**
 * Direct streamed download of a single resource
 */
export interface MediaFetcher {
  fetch(
    url: string,
    headers: Record<string, string>,
    destination: string,
    options: TransferOptions
  ): Promise<TransferResult>;
}

/**
 * Segmented download and remux of an HLS/DASH manifest
 */
export interface MediaTranscoder {
  transcode(
    manifestUrl: string,
    headers: Record<string, string>,
    destination: string,
    options: TransferOptions
  ): Promise<TransferResult>;
}
