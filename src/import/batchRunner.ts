// src/import/batchRunner.ts
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { OrderPayload, RawRecord, SubmissionOutcome } from '../types/order';
import { readOrderCsv } from '../utils/csvUtils';
import { formatFileTimestamp, sleep } from '../utils/dateUtils';
import { createContextId, errorMessage, logError, logInfo } from '../utils/logger';
import { normalizeRecord } from './normalizeRecord';

export const DEFAULT_PACING_MS = 200;

/** Receives one outcome line per input row, in row order. */
export interface OutcomeSink {
  append(line: string, ok: boolean): void;
}

/** The part of OrderSubmitter the runner needs. */
export interface OrderSubmitterLike {
  submit(payload: OrderPayload, ctx?: string): Promise<SubmissionOutcome>;
}

export interface BatchRunnerOptions {
  submitter: OrderSubmitterLike;
  resultsDir: string;
  /** Pause after each row before the next request goes out. */
  pacingMs?: number;
  /** Appended to the result filename so runs started in the same second do not collide. */
  runId?: string;
  ctx?: string;
}

export interface ResultArtifact {
  logs: string[];
}

export function resultFileName(runId: string, at: Date = new Date()): string {
  return `results_${formatFileTimestamp(at)}_${runId}.json`;
}

/**
 * Drives one CSV file through normalise -> submit, strictly one row at a time.
 * Row problems become outcome lines; only an unreadable or malformed input
 * file or a failed result write escapes run().
 */
export class BatchRunner {
  private readonly submitter: OrderSubmitterLike;
  private readonly resultsDir: string;
  private readonly pacingMs: number;
  private readonly runId: string;
  private readonly ctx: string;

  constructor(options: BatchRunnerOptions) {
    this.submitter = options.submitter;
    this.resultsDir = options.resultsDir;
    this.pacingMs = Math.max(0, options.pacingMs ?? DEFAULT_PACING_MS);
    this.runId = options.runId ?? randomUUID().slice(0, 8);
    this.ctx = options.ctx ?? createContextId('batch');
  }

  async run(filePath: string, sink: OutcomeSink): Promise<string> {
    const csv = await readOrderCsv(filePath);

    logInfo(this.ctx, 'CSV file loaded', {
      filePath,
      encoding: csv.encoding,
      rows: csv.rows.length
    });

    const logs: string[] = [];
    let failed = 0;

    for (let index = 0; index < csv.rows.length; index++) {
      const rowCtx = `${this.ctx}:row-${index + 1}`;
      const outcome = await this.processRow(csv.rows[index], rowCtx);

      if (!outcome.ok) failed++;
      logs.push(outcome.message);
      sink.append(outcome.message, outcome.ok);

      if (this.pacingMs > 0) {
        await sleep(this.pacingMs);
      }
    }

    const resultFile = this.writeResults(logs);

    logInfo(this.ctx, 'Batch finished', {
      rows: logs.length,
      succeeded: logs.length - failed,
      failed,
      resultFile
    });

    return resultFile;
  }

  private async processRow(
    record: RawRecord,
    rowCtx: string
  ): Promise<SubmissionOutcome> {
    let payload: OrderPayload;
    try {
      payload = normalizeRecord(record);
    } catch (err) {
      logError(rowCtx, 'Row rejected before submission', { error: errorMessage(err) });
      return { ok: false, status: null, message: `Error: ${errorMessage(err)}` };
    }

    try {
      return await this.submitter.submit(payload, rowCtx);
    } catch (err) {
      // OrderSubmitter never throws; another submitter might.
      logError(rowCtx, 'Submission threw', { error: errorMessage(err) });
      return { ok: false, status: null, message: `Request failed: ${errorMessage(err)}` };
    }
  }

  private writeResults(logs: string[]): string {
    fs.mkdirSync(this.resultsDir, { recursive: true });

    const file = path.resolve(this.resultsDir, resultFileName(this.runId));
    const artifact: ResultArtifact = { logs };
    fs.writeFileSync(file, JSON.stringify(artifact, null, 2));

    return file;
  }
}
