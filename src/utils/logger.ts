// src/utils/logger.ts
import { randomUUID } from 'crypto';
import axios from 'axios';

export function createContextId(scope: string): string {
  return `${scope}:${randomUUID()}`;
}

export function createChildContextId(parentCtx: string, scope: string): string {
  return `${scope}:${parentCtx.split(':')[1] ?? randomUUID()}`;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function logInfo(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  console.log(
    JSON.stringify({
      ts: new Date().toISOString(),
      level: 'info',
      ctx,
      msg,
      meta
    })
  );
}

export function logError(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  console.error(
    JSON.stringify({
      ts: new Date().toISOString(),
      level: 'error',
      ctx,
      msg,
      meta
    })
  );
}

/**
 * Dedicated Shopline API error logger.
 * Extracts URL, status code and response body when the failure came from axios.
 */
export function logShoplineError(ctx: string, err: unknown): void {
  const res = axios.isAxiosError(err) ? err.response : undefined;

  logError(ctx, 'Shopline API Error', {
    url: res?.config?.url,
    method: res?.config?.method,
    status: res?.status,
    data: res?.data,
    message: errorMessage(err)
  });
}
