/**
 * Event and command types for the GUI/controller channel
 */

import type { ErrorCode } from './errors.js';
import type { JobStatus, MediaRecord, TaskId, TaskState } from './index.js';

export type EngineStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'crashed';

export type BusLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Notifications delivered to the GUI collaborator, in publish order
 */
export type OrchestratorEvent =
  | { type: 'task_created'; taskId: TaskId; url: string; state: TaskState }
  | { type: 'task_updated'; taskId: TaskId; state: TaskState }
  | { type: 'task_error'; taskId: TaskId; code: ErrorCode; message: string }
  | { type: 'log'; level: BusLogLevel; message: string }
  | { type: 'media_detected'; record: MediaRecord }
  | { type: 'download_status'; jobId: string; status: JobStatus; attempt: number }
  | { type: 'download_progress'; jobId: string; fraction: number }
  | { type: 'download_complete'; jobId: string; path: string }
  | { type: 'download_failed'; jobId: string; reason: string; code: ErrorCode }
  | { type: 'engine_status'; status: EngineStatus };

export type OrchestratorEventType = OrchestratorEvent['type'];

export type EventOf<T extends OrchestratorEventType> = Extract<OrchestratorEvent, { type: T }>;

/**
 * Listener signature; seq is the bus-wide delivery sequence number
 */
export type EventListener<E extends OrchestratorEvent = OrchestratorEvent> = (event: E, seq: number) => void;
