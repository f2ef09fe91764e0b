import { describeError } from '../errors.js';
import { getLogger, type Logger } from '../logger.js';
import type { ListClient } from '../todoist/types.js';

export const ERROR_TASK_MARKER = 'Shopping List Sync Error';

export type ErrorHandlingMode = 'log' | 'task' | 'both';

export interface ErrorReporter {
  report(error: Error): Promise<void>;
}

export interface TaskErrorReporterOptions {
  client: ListClient;
  mode: ErrorHandlingMode;
  systemProjectId?: string;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Leaves one open task in a system project when a cycle fails, so a broken
 * sync shows up in Todoist itself. Never throws.
 */
export class TaskErrorReporter implements ErrorReporter {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: TaskErrorReporterOptions) {
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.mode !== 'log' && !!this.options.systemProjectId;
  }

  async report(error: Error): Promise<void> {
    const { mode, systemProjectId, client } = this.options;
    if (mode === 'log') return;
    if (!systemProjectId) {
      this.logger.warn('ERROR_HANDLING_MODE creates tasks, but TODOIST_SYSTEM_PROJECT_ID is not configured');
      return;
    }

    try {
      const open = await client.fetchItems(systemProjectId);
      if (open.some((item) => item.content.includes(ERROR_TASK_MARKER))) {
        this.logger.info('Error task already exists in Todoist');
        return;
      }

      const content = `🔧 ${ERROR_TASK_MARKER}\n\nError occurred at ${this.now().toISOString()}\n\n${error.message}`;
      await client.addItem(systemProjectId, content, { priority: 4, dueString: 'today' });
      this.logger.info('Created error task in Todoist');
    } catch (err) {
      this.logger.error(`Failed to create error task in Todoist: ${describeError(err)}`);
    }
  }
}
