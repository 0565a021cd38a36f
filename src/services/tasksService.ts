// src/services/tasksService.ts
import { setImmediate } from 'timers/promises';
import { AppConfig } from '../config/appConfig';
import { BatchRunner, OrderSubmitterLike } from '../import/batchRunner';
import { OrderSubmitter, OrderSubmitterOptions } from '../shopline/orderSubmitter';
import { TaskSnapshot, TaskStatus } from '../types/task';
import { createChildContextId, createContextId, errorMessage, logError, logInfo } from '../utils/logger';
import { TaskRegistry, taskRegistry } from './taskRegistry';

export interface StartSubmissionInput {
  filePath: string;
  accessToken: string;
  storeDomain: string;
}

export interface TasksServiceDeps {
  registry: TaskRegistry;
  config: Pick<AppConfig, 'resultsDir' | 'apiVersion' | 'pacingMs' | 'requestTimeoutMs'>;
  createSubmitter: (options: OrderSubmitterOptions) => OrderSubmitterLike;
}

export interface TaskStatusView {
  id: string;
  status: TaskStatus;
  logs: readonly string[];
  error: string | null;
}

export class TasksService {
  constructor(private readonly deps: TasksServiceDeps) {}

  /**
   * Register a task and run the file in the background. Returns as soon as the
   * task exists; callers poll getTaskStatus() for progress.
   */
  startSubmissionTask(input: StartSubmissionInput): string {
    const taskId = this.deps.registry.create();
    const ctx = createContextId(`task-${taskId}`);

    logInfo(ctx, 'Starting submission task', {
      taskId,
      filePath: input.filePath,
      storeDomain: input.storeDomain
    });

    void this.execute(taskId, input, ctx);

    return taskId;
  }

  /**
   * Runs one task to its end state. Never rejects: fatal errors are recorded on
   * the task as Failed.
   */
  async execute(taskId: string, input: StartSubmissionInput, ctx: string): Promise<void> {
    const { registry, config } = this.deps;

    try {
      // The caller gets its task id back before the submitter or the file is touched.
      await setImmediate();

      const submitter = this.deps.createSubmitter({
        accessToken: input.accessToken,
        storeDomain: input.storeDomain,
        apiVersion: config.apiVersion,
        timeoutMs: config.requestTimeoutMs
      });

      const runner = new BatchRunner({
        submitter,
        resultsDir: config.resultsDir,
        pacingMs: config.pacingMs,
        runId: `task${taskId}`,
        ctx: createChildContextId(ctx, `batch-${taskId}`)
      });

      const resultFile = await runner.run(input.filePath, registry.sinkFor(taskId));
      registry.markCompleted(taskId, resultFile);

      logInfo(ctx, 'Submission task completed', { taskId, resultFile });
    } catch (err) {
      const message = errorMessage(err);
      logError(ctx, 'Submission task failed', { taskId, error: message });
      registry.markFailed(taskId, message);
    }
  }

  getTaskStatus(taskId: string): TaskStatusView | undefined {
    const task = this.deps.registry.get(taskId);
    if (!task) return undefined;
    return { id: task.id, status: task.status, logs: task.logs, error: task.error };
  }

  getResultFile(taskId: string): string | undefined {
    const task = this.deps.registry.get(taskId);
    if (!task || task.status !== 'Completed' || !task.result_file) return undefined;
    return task.result_file;
  }

  listTasks(): TaskSnapshot[] {
    return this.deps.registry.list();
  }
}

export function createTasksService(
  config: TasksServiceDeps['config'],
  overrides: Partial<Omit<TasksServiceDeps, 'config'>> = {}
): TasksService {
  return new TasksService({
    registry: overrides.registry ?? taskRegistry,
    config,
    createSubmitter: overrides.createSubmitter ?? ((options) => new OrderSubmitter(options))
  });
}
