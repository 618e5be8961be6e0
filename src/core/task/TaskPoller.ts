// src/core/task/TaskPoller.ts

import type { TaskHandle, TaskID, TaskPollerOptions } from './types';
import type { Dispatcher } from '../http/Dispatcher';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { JsonObject, Result } from '../../utils/result';
import { failure, success } from '../../utils/result';
import { TaskStatusError } from '../../utils/errors';
import { taskStatusRequest } from '../requests/RequestBuilder';
import { withTaskSpan } from '../../observability/tracing';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// Metric label for a polled status; server strings never become label values
function statusLabel(status: unknown): 'published' | 'notPublished' | 'unexpected' {
  return status === 'published' || status === 'notPublished' ? status : 'unexpected';
}

/**
 * Extract the task handle from a write response tagged with `indexName`.
 */
export function taskHandleOf(result: Result<JsonObject>): TaskHandle | undefined {
  if (!result.ok) return undefined;

  const { indexName, taskID } = result.data;
  if (typeof indexName !== 'string') return undefined;
  if (typeof taskID !== 'number' && typeof taskID !== 'string') return undefined;

  return { indexName, taskID };
}

export class TaskPoller {
  private pollIntervalMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private dispatcher: Pick<Dispatcher, 'dispatch'>,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: TaskPollerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Poll the task until the service reports it published. There is no cap
   * on the number of polls; only a failed poll ends the wait early.
   */
  async waitTask(
    indexName: string,
    taskID: TaskID,
    pollIntervalMs: number = this.pollIntervalMs
  ): Promise<Result<void>> {
    return withTaskSpan(indexName, String(taskID), async (span) => {
      const { hostClass, spec } = taskStatusRequest(indexName, taskID);
      const startTime = Date.now();
      let polls = 0;

      for (;;) {
        const result = await this.dispatcher.dispatch(hostClass, spec);
        polls++;

        if (!result.ok) {
          this.metrics.incrementCounter('task_polls_total', { status: 'failed' });
          this.metrics.recordLatency('task_wait_duration', Date.now() - startTime, {
            outcome: 'failed',
          });
          this.logger.warn('Task poll failed', {
            indexName,
            taskID,
            polls,
            code: result.error.code,
          });
          return result;
        }

        const status = result.data.status;
        this.metrics.incrementCounter('task_polls_total', { status: statusLabel(status) });

        if (status === 'published') {
          this.metrics.recordLatency('task_wait_duration', Date.now() - startTime, {
            outcome: 'published',
          });
          span?.setAttribute('search.task_polls', polls);
          this.logger.debug('Task published', { indexName, taskID, polls });
          return success(undefined);
        }

        if (status !== 'notPublished') {
          this.logger.error('Unexpected task status', { indexName, taskID, status });
          return failure(new TaskStatusError(status, { indexName, taskID: String(taskID) }));
        }

        this.logger.debug('Task not yet published', { indexName, taskID, polls, pollIntervalMs });
        await this.sleep(pollIntervalMs);
      }
    });
  }

  /**
   * Wait on the task carried by a write result and hand the result back.
   * Results without a task, and failures, are returned as they are.
   */
  async wait(
    result: Result<JsonObject>,
    pollIntervalMs: number = this.pollIntervalMs
  ): Promise<Result<JsonObject>> {
    const handle = taskHandleOf(result);
    if (!handle) {
      return result;
    }

    const outcome = await this.waitTask(handle.indexName, handle.taskID, pollIntervalMs);
    return outcome.ok ? result : outcome;
  }
}
