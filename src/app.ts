// src/app.ts
import fs from 'fs';
import path from 'path';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import multer from 'multer';

import { TasksService } from './services/tasksService';
import { errorMessage, logError, logInfo } from './utils/logger';

export interface AppDeps {
  tasks: TasksService;
  uploadDir: string;
  /** morgan format; false disables request logging. */
  accessLog?: string | false;
}

function textField(body: unknown, name: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value.trim() : '';
}

export function createApp(deps: AppDeps) {
  const app = express();
  const upload = multer({ dest: deps.uploadDir });

  app.use(cors());
  if (deps.accessLog !== false) {
    app.use(morgan(deps.accessLog ?? 'dev'));
  }

  // ==========================================================================
  // 1. HEALTH
  // ==========================================================================

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ==========================================================================
  // 2. TASKS
  // ==========================================================================

  app.post('/tasks', upload.single('csv_file'), (req, res) => {
    try {
      const accessToken = textField(req.body, 'access_token');
      const storeDomain = textField(req.body, 'store_domain');

      if (!accessToken || !storeDomain || !req.file) {
        if (req.file) fs.rmSync(req.file.path, { force: true });
        return res.status(400).json({ error: 'All fields are required' });
      }

      const taskId = deps.tasks.startSubmissionTask({
        filePath: req.file.path,
        accessToken,
        storeDomain
      });

      logInfo('api:tasks:create', 'Accepted upload', {
        taskId,
        originalName: req.file.originalname,
        size: req.file.size
      });

      res.status(202).json({
        taskId,
        statusUrl: `/tasks/${taskId}`,
        downloadUrl: `/tasks/${taskId}/download`
      });
    } catch (e) {
      logError('api:tasks:create', 'POST /tasks error', { error: errorMessage(e) });
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get('/tasks', (_req, res) => {
    const rows = deps.tasks.listTasks().map((t) => ({
      id: t.id,
      status: t.status,
      logCount: t.logs.length,
      createdAt: t.created_at,
      finishedAt: t.finished_at
    }));
    res.json(rows);
  });

  app.get('/tasks/:id', (req, res) => {
    const status = deps.tasks.getTaskStatus(req.params.id);
    if (!status) return res.status(404).json({ error: 'Invalid task ID' });
    res.json(status);
  });

  app.get('/tasks/:id/download', (req, res) => {
    const file = deps.tasks.getResultFile(req.params.id);
    if (!file) return res.status(404).json({ error: 'Not ready' });

    res.download(file, path.basename(file), (err) => {
      if (!err) return;
      logError('api:tasks:download', 'Failed to send result file', {
        taskId: req.params.id,
        error: err.message
      });
      if (!res.headersSent) res.status(500).json({ error: err.message });
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message });
    }
    logError('api', 'Unhandled request error', { error: errorMessage(err) });
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}
