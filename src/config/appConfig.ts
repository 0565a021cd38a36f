// src/config/appConfig.ts
import { DEFAULT_PACING_MS } from '../import/batchRunner';
import { DEFAULT_API_VERSION, DEFAULT_TIMEOUT_MS } from '../shopline/orderSubmitter';

export interface AppConfig {
  port: number;
  uploadDir: string;
  resultsDir: string;
  apiVersion: string;
  pacingMs: number;
  requestTimeoutMs: number;
}

function numberFromEnv(raw: string | undefined, fallback: number, min = 0): number {
  if (raw == null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: numberFromEnv(env.PORT, 4000),
    uploadDir: env.UPLOAD_DIR || 'uploads',
    resultsDir: env.RESULTS_DIR || 'results',
    apiVersion: env.SHOPLINE_API_VERSION || DEFAULT_API_VERSION,
    pacingMs: numberFromEnv(env.SUBMIT_PACING_MS, DEFAULT_PACING_MS),
    // axios treats 0 as "no timeout"
    requestTimeoutMs: numberFromEnv(env.SHOPLINE_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 1)
  };
}
