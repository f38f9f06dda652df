/**
 * Tab State Machine
 *
 * A task's state is a set of independent flags: the base work state
 * (idle or active), whether a browse page is attached, how many download
 * jobs are unfinished, and whether the task is closed. The displayed state
 * is the dominant one, by precedence closed > browsing > downloading > base.
 *
 * Every transition validates before it mutates, so a rejected transition
 * leaves all flags untouched.
 */

import { StateViolationError } from '../types/errors.js';
import type { BaseTaskState, TaskId, TaskState } from '../types/index.js';

export type TabTransition = 'attach_page' | 'detach_page' | 'navigate' | 'job_start' | 'job_finish' | 'reset_context' | 'close';

const ACTION_LABELS: Record<TabTransition, string> = {
  attach_page: 'attach a page',
  detach_page: 'detach a page',
  navigate: 'navigate',
  job_start: 'start a download',
  job_finish: 'finish a download',
  reset_context: 'reset the context',
  close: 'close',
};

export interface TabFlags {
  base: BaseTaskState;
  hasPage: boolean;
  activeJobCount: number;
  closed: boolean;
}

export function dominantState(flags: TabFlags): TaskState {
  if (flags.closed) return 'closed';
  if (flags.hasPage) return 'browsing';
  if (flags.activeJobCount > 0) return 'downloading';
  return flags.base;
}

export class TabStateMachine {
  private base: BaseTaskState = 'idle';
  private pageAttached = false;
  private jobs = 0;
  private closed = false;

  constructor(private readonly taskId: TaskId) {}

  get state(): TaskState {
    return dominantState(this.flags());
  }

  get baseState(): BaseTaskState {
    return this.base;
  }

  get hasPage(): boolean {
    return this.pageAttached;
  }

  get activeJobCount(): number {
    return this.jobs;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  flags(): TabFlags {
    return {
      base: this.base,
      hasPage: this.pageAttached,
      activeJobCount: this.jobs,
      closed: this.closed,
    };
  }

  can(transition: TabTransition): boolean {
    if (transition === 'close') {
      return true;
    }
    if (this.closed) {
      return false;
    }
    switch (transition) {
      case 'attach_page':
        return !this.pageAttached;
      case 'detach_page':
        return this.pageAttached;
      case 'reset_context':
        return !this.pageAttached;
      default:
        return true;
    }
  }

  /**
   * @throws StateViolationError when the transition is illegal now
   */
  assert(transition: TabTransition): void {
    if (!this.can(transition)) {
      throw new StateViolationError(ACTION_LABELS[transition], this.state, { taskId: this.taskId });
    }
  }

  attachPage(): void {
    this.assert('attach_page');
    this.pageAttached = true;
  }

  /**
   * Back to whatever dominated before the page was attached
   */
  detachPage(): void {
    this.assert('detach_page');
    this.pageAttached = false;
  }

  /**
   * Mark background work in progress. Returns the previous base state so a
   * failed navigation can restore it.
   */
  navigate(): BaseTaskState {
    this.assert('navigate');
    const previous = this.base;
    this.base = 'active';
    return previous;
  }

  restoreBase(previous: BaseTaskState): void {
    if (!this.closed) {
      this.base = previous;
    }
  }

  jobStarted(): void {
    this.assert('job_start');
    this.jobs++;
  }

  /**
   * Finishing a job on a closed task is a no-op: close already dropped
   * the count.
   */
  jobFinished(): void {
    if (this.closed || this.jobs === 0) {
      return;
    }
    this.jobs--;
  }

  /**
   * A fresh context carries no page and no navigation
   */
  resetContext(): void {
    this.assert('reset_context');
    this.base = 'idle';
  }

  /**
   * Terminal. Returns false when the task was already closed.
   */
  close(): boolean {
    if (this.closed) {
      return false;
    }
    this.closed = true;
    this.pageAttached = false;
    this.jobs = 0;
    return true;
  }
}
