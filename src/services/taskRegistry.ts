// src/services/taskRegistry.ts
import { OutcomeSink } from '../import/batchRunner';
import { TaskRow, TaskSnapshot } from '../types/task';

/**
 * In-memory task table shared by the whole process.
 *
 * Ids are sequential ("1", "2", ...) and never reused. Entries are never removed,
 * so memory grows with every submitted file until the process restarts; fine for
 * a single-operator tool, not for a long-lived multi-tenant deployment.
 *
 * Each task is written only by the run that owns it (appendLog, markCompleted,
 * markFailed). Readers get copies, so a poll sees a log that only ever grows.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRow>();
  private nextId = 1;

  create(): string {
    const id = String(this.nextId++);
    this.tasks.set(id, {
      id,
      status: 'Processing',
      logs: [],
      result_file: null,
      error: null,
      created_at: new Date(),
      finished_at: null
    });
    return id;
  }

  get(id: string): TaskSnapshot | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task, logs: [...task.logs] } : undefined;
  }

  list(): TaskSnapshot[] {
    return Array.from(this.tasks.values())
      .reverse()
      .map((task) => ({ ...task, logs: [...task.logs] }));
  }

  appendLog(id: string, line: string): void {
    this.processing(id).logs.push(line);
  }

  markCompleted(id: string, resultFile: string): void {
    const task = this.processing(id);
    task.status = 'Completed';
    task.result_file = resultFile;
    task.finished_at = new Date();
  }

  markFailed(id: string, error: string): void {
    const task = this.processing(id);
    task.status = 'Failed';
    task.error = error;
    task.finished_at = new Date();
  }

  sinkFor(id: string): OutcomeSink {
    return { append: (line) => this.appendLog(id, line) };
  }

  private processing(id: string): TaskRow {
    const task = this.tasks.get(id);
    if (!task) throw new Error(`Unknown task ${id}`);
    if (task.status !== 'Processing') {
      throw new Error(`Task ${id} is already ${task.status}`);
    }
    return task;
  }
}

export const taskRegistry = new TaskRegistry();
export default taskRegistry;
