/**
 * Controller - the command side of the GUI channel
 *
 * Commands arrive as untrusted values, are validated with zod and
 * dispatched to the core. Every outcome, including a failure, comes back as
 * a CommandResult; nothing thrown inside the core reaches the caller.
 */

import { z } from 'zod';
import { InvalidArgumentError, toStructuredError, type StructuredError } from '../types/errors.js';
import type { EngineStatus } from '../types/events.js';
import type { DownloadJob, MediaRecord, TaskId, TaskSnapshot } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { DownloadDispatcher } from './download-dispatcher.js';
import type { EngineSingleton } from './engine-singleton.js';
import { classifyUrl } from './media-classifier.js';
import type { TabManager } from './tab-manager.js';

// ============================================
// COMMAND SCHEMAS
// ============================================

const taskIdSchema = z.string().min(1, 'taskId is required');
const jobIdSchema = z.string().min(1, 'jobId is required');
const urlSchema = z.string().trim().min(1, 'url is required');

export const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('create_task'), url: urlSchema }),
  z.object({ type: z.literal('close_task'), taskId: taskIdSchema }),
  z.object({ type: z.literal('toggle_browse'), taskId: taskIdSchema }),
  z.object({ type: z.literal('attach_page'), taskId: taskIdSchema }),
  z.object({ type: z.literal('detach_page'), taskId: taskIdSchema }),
  z.object({ type: z.literal('navigate'), taskId: taskIdSchema, url: urlSchema }),
  z.object({ type: z.literal('reset_context'), taskId: taskIdSchema }),
  z.object({ type: z.literal('get_task'), taskId: taskIdSchema }),
  z.object({ type: z.literal('list_tasks') }),
  z.object({ type: z.literal('list_media'), taskId: taskIdSchema }),
  z.object({ type: z.literal('start_download'), url: z.string().url(), taskId: taskIdSchema.optional() }),
  z.object({ type: z.literal('cancel_download'), jobId: jobIdSchema }),
  z.object({ type: z.literal('pause_download'), jobId: jobIdSchema }),
  z.object({ type: z.literal('resume_download'), jobId: jobIdSchema }),
  z.object({ type: z.literal('get_download'), jobId: jobIdSchema }),
  z.object({ type: z.literal('list_downloads') }),
  z.object({ type: z.literal('restart_engine') }),
]);

export type OrchestratorCommand = z.infer<typeof commandSchema>;

export type CommandType = OrchestratorCommand['type'];

export type CommandData =
  | { taskId: TaskId }
  | { closed: TaskId }
  | TaskSnapshot
  | TaskSnapshot[]
  | MediaRecord[]
  | DownloadJob
  | DownloadJob[]
  | { engine: EngineStatus };

export type CommandResult =
  | { ok: true; data: CommandData }
  | { ok: false; error: StructuredError };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class Controller {
  constructor(
    private readonly tabs: TabManager,
    private readonly dispatcher: DownloadDispatcher,
    private readonly engine: EngineSingleton
  ) {}

  /**
   * Validate and run one command
   */
  async execute(input: unknown): Promise<CommandResult> {
    const parsed = commandSchema.safeParse(input);
    if (!parsed.success) {
      const error = new InvalidArgumentError(`Invalid command: ${formatIssues(parsed.error)}`);
      logger.controller.warn('Rejected command', { error: error.message });
      return { ok: false, error: toStructuredError(error) };
    }

    const command = parsed.data;
    try {
      const data = await this.dispatch(command);
      logger.controller.debug('Command completed', { operation: command.type });
      return { ok: true, data };
    } catch (error) {
      const structured = toStructuredError(error);
      if (structured.code === 'INTERNAL_ERROR') {
        logger.controller.error('Command failed', { operation: command.type, error });
      } else {
        logger.controller.info('Command refused', { operation: command.type, code: structured.code });
      }
      return { ok: false, error: structured };
    }
  }

  private async dispatch(command: OrchestratorCommand): Promise<CommandData> {
    switch (command.type) {
      case 'create_task':
        return { taskId: await this.tabs.create(command.url) };
      case 'close_task':
        await this.tabs.close(command.taskId);
        return { closed: command.taskId };
      case 'toggle_browse':
        return this.tabs.toggleBrowse(command.taskId);
      case 'attach_page':
        return this.tabs.attachPage(command.taskId);
      case 'detach_page':
        return this.tabs.detachPage(command.taskId);
      case 'navigate':
        return this.tabs.navigate(command.taskId, command.url);
      case 'reset_context':
        return this.tabs.resetContext(command.taskId);
      case 'get_task':
        return this.tabs.get(command.taskId);
      case 'list_tasks':
        return this.tabs.list();
      case 'list_media':
        return this.tabs.media(command.taskId);
      case 'start_download':
        return this.dispatcher.enqueue(this.resolveRecord(command.url, command.taskId));
      case 'cancel_download':
        return this.dispatcher.cancel(command.jobId);
      case 'pause_download':
        return this.dispatcher.pause(command.jobId);
      case 'resume_download':
        return this.dispatcher.resume(command.jobId);
      case 'get_download':
        return this.dispatcher.get(command.jobId);
      case 'list_downloads':
        return this.dispatcher.list();
      case 'restart_engine':
        await this.tabs.closeAll();
        await this.engine.restart();
        return { engine: this.engine.state };
    }
  }

  /**
   * The detected record for `url`, or an ad-hoc record classified from the
   * URL alone. A task id scopes the lookup and must name an open task.
   */
  private resolveRecord(url: string, taskId?: TaskId): MediaRecord {
    if (taskId !== undefined) {
      this.tabs.assertOpen(taskId, 'start a download');
    }
    const detected = this.tabs.findMedia(url, taskId);
    if (detected) {
      return detected;
    }
    if (!/^https?:\/\//i.test(url)) {
      throw new InvalidArgumentError(`Only http(s) media can be downloaded: ${url}`, { url });
    }
    return {
      url,
      type: classifyUrl(url),
      headers: {},
      taskId: taskId ?? null,
      discoveredAt: Date.now(),
    };
  }
}
