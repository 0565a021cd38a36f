import fs from 'fs';
import os from 'os';
import path from 'path';
import { once } from 'events';
import { Server } from 'http';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createApp } from './app';
import { OrderSubmitterLike } from './import/batchRunner';
import { TaskRegistry } from './services/taskRegistry';
import { createTasksService } from './services/tasksService';
import { OrderPayload, SubmissionOutcome } from './types/order';

const CSV = [
  'customer_email,product_1_name,product_1_price',
  'a@example.com,Mug,12.50',
  'b@example.com,Mug,12.50'
].join('\n');

/** Holds every submit() until release() is called. */
class GatedSubmitter implements OrderSubmitterLike {
  private gate: Promise<void>;
  release: () => void = () => {};

  constructor(open: boolean) {
    this.gate = open
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
          this.release = () => resolve();
        });
  }

  async submit(payload: OrderPayload): Promise<SubmissionOutcome> {
    await this.gate;
    return { ok: true, status: 201, message: `Order for ${payload.customer.email} created` };
  }
}

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;
  let submitter: GatedSubmitter;

  async function start(open: boolean) {
    submitter = new GatedSubmitter(open);
    const tasks = createTasksService(
      {
        resultsDir: path.join(dir, 'results'),
        apiVersion: 'v20251201',
        pacingMs: 0,
        requestTimeoutMs: 5000
      },
      { registry: new TaskRegistry(), createSubmitter: () => submitter }
    );

    server = createApp({ tasks, uploadDir: path.join(dir, 'uploads'), accessLog: false }).listen(0);
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function uploadForm(fields: Record<string, string>, withFile = true): FormData {
    const form = new FormData();
    for (const [k, v] of Object.entries(fields)) form.append(k, v);
    if (withFile) form.append('csv_file', new Blob([CSV], { type: 'text/csv' }), 'orders.csv');
    return form;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'orders-api-'));
  });

  afterEach(async () => {
    submitter.release();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports health', async () => {
    await start(true);
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('accepts an upload, runs it and serves the result', async () => {
    await start(true);

    const res = await fetch(`${baseUrl}/tasks`, {
      method: 'POST',
      body: uploadForm({ access_token: 'test-token', store_domain: 'demo.myshopline.com' })
    });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({
      taskId: '1',
      statusUrl: '/tasks/1',
      downloadUrl: '/tasks/1/download'
    });

    await vi.waitFor(async () => {
      const status = await (await fetch(`${baseUrl}/tasks/1`)).json();
      expect(status).toMatchObject({ status: 'Completed' });
    });

    const status = await (await fetch(`${baseUrl}/tasks/1`)).json();
    expect(status).toEqual({
      id: '1',
      status: 'Completed',
      logs: ['Order for a@example.com created', 'Order for b@example.com created'],
      error: null
    });

    const download = await fetch(`${baseUrl}/tasks/1/download`);
    expect(download.status).toBe(200);
    expect(download.headers.get('content-disposition')).toMatch(
      /^attachment; filename="results_\d{8}_\d{6}_task1\.json"$/
    );
    expect(await download.json()).toEqual({
      logs: ['Order for a@example.com created', 'Order for b@example.com created']
    });

    const list = await (await fetch(`${baseUrl}/tasks`)).json();
    expect(list).toEqual([
      expect.objectContaining({ id: '1', status: 'Completed', logCount: 2 })
    ]);
  });

  it('is not downloadable while processing', async () => {
    await start(false);

    await fetch(`${baseUrl}/tasks`, {
      method: 'POST',
      body: uploadForm({ access_token: 'test-token', store_domain: 'demo.myshopline.com' })
    });

    const status = await (await fetch(`${baseUrl}/tasks/1`)).json();
    expect(status).toEqual({ id: '1', status: 'Processing', logs: [], error: null });

    const download = await fetch(`${baseUrl}/tasks/1/download`);
    expect(download.status).toBe(404);
    expect(await download.json()).toEqual({ error: 'Not ready' });

    submitter.release();
    await vi.waitFor(async () => {
      const done = await (await fetch(`${baseUrl}/tasks/1`)).json();
      expect(done).toMatchObject({ status: 'Completed' });
    });
  });

  it('requires token, domain and file', async () => {
    await start(true);

    const noFile = await fetch(`${baseUrl}/tasks`, {
      method: 'POST',
      body: uploadForm({ access_token: 'test-token', store_domain: 'demo.myshopline.com' }, false)
    });
    expect(noFile.status).toBe(400);
    expect(await noFile.json()).toEqual({ error: 'All fields are required' });

    const blankToken = await fetch(`${baseUrl}/tasks`, {
      method: 'POST',
      body: uploadForm({ access_token: '  ', store_domain: 'demo.myshopline.com' })
    });
    expect(blankToken.status).toBe(400);
    expect(fs.readdirSync(path.join(dir, 'uploads'))).toEqual([]);
  });

  it('answers 400 for an upload under the wrong field name', async () => {
    await start(true);

    const form = new FormData();
    form.append('access_token', 'test-token');
    form.append('store_domain', 'demo.myshopline.com');
    form.append('orders', new Blob([CSV], { type: 'text/csv' }), 'orders.csv');

    const res = await fetch(`${baseUrl}/tasks`, { method: 'POST', body: form });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Unexpected field' });
  });

  it('404s unknown tasks', async () => {
    await start(true);

    const res = await fetch(`${baseUrl}/tasks/7`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Invalid task ID' });
  });
});
