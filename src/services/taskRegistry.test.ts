import { describe, it, expect } from 'vitest';
import { TaskRegistry } from './taskRegistry';

describe('TaskRegistry', () => {
  it('hands out sequential ids starting in Processing', () => {
    const registry = new TaskRegistry();

    expect(registry.create()).toBe('1');
    expect(registry.create()).toBe('2');

    const task = registry.get('1');
    expect(task?.status).toBe('Processing');
    expect(task?.logs).toEqual([]);
    expect(task?.result_file).toBeNull();
    expect(task?.error).toBeNull();
    expect(task?.finished_at).toBeNull();
  });

  it('returns undefined for unknown ids', () => {
    expect(new TaskRegistry().get('42')).toBeUndefined();
  });

  it('gives readers copies that never shrink', () => {
    const registry = new TaskRegistry();
    const id = registry.create();

    registry.appendLog(id, 'first');
    const before = registry.get(id);
    registry.appendLog(id, 'second');

    expect(before?.logs).toEqual(['first']);
    expect(registry.get(id)?.logs).toEqual(['first', 'second']);
  });

  it('routes sink writes to the task log', () => {
    const registry = new TaskRegistry();
    const id = registry.create();

    registry.sinkFor(id).append('Order #1 created', true);

    expect(registry.get(id)?.logs).toEqual(['Order #1 created']);
  });

  it('marks completion with the result file', () => {
    const registry = new TaskRegistry();
    const id = registry.create();

    registry.markCompleted(id, '/tmp/results_x.json');

    const task = registry.get(id);
    expect(task?.status).toBe('Completed');
    expect(task?.result_file).toBe('/tmp/results_x.json');
    expect(task?.finished_at).toBeInstanceOf(Date);
  });

  it('marks failure with the error message', () => {
    const registry = new TaskRegistry();
    const id = registry.create();

    registry.markFailed(id, 'ENOENT: no such file');

    expect(registry.get(id)).toMatchObject({ status: 'Failed', error: 'ENOENT: no such file' });
  });

  it('refuses writes to finished or unknown tasks', () => {
    const registry = new TaskRegistry();
    const id = registry.create();
    registry.markCompleted(id, '/tmp/results_x.json');

    expect(() => registry.appendLog(id, 'late')).toThrow('Task 1 is already Completed');
    expect(() => registry.markFailed(id, 'late')).toThrow('Task 1 is already Completed');
    expect(() => registry.appendLog('9', 'x')).toThrow('Unknown task 9');
  });

  it('lists newest first', () => {
    const registry = new TaskRegistry();
    registry.create();
    registry.create();
    registry.create();

    expect(registry.list().map((t) => t.id)).toEqual(['3', '2', '1']);
  });
});
