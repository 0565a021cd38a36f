// src/shopline/orderSubmitter.ts
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { OrderPayload, SubmissionOutcome } from '../types/order';
import { logError, logShoplineError, errorMessage } from '../utils/logger';

export const DEFAULT_API_VERSION = 'v20251201';
export const DEFAULT_TIMEOUT_MS = 30000;
export const MAX_ERROR_BODY_LENGTH = 1000;

export interface OrderSubmitterOptions {
  accessToken: string;
  storeDomain: string;
  apiVersion?: string;
  timeoutMs?: number;
  /** Replaces the network transport; tests answer requests in-process with this. */
  adapter?: AxiosAdapter;
}

export function normaliseStoreDomain(domain: string): string {
  return domain
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
}

export function truncateBody(body: string, max = MAX_ERROR_BODY_LENGTH): string {
  return body.length > max ? `${body.slice(0, max)}…` : body;
}

function bodyAsText(data: unknown): string {
  if (data == null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the display name (falling back to the numeric id) out of a create-order response.
 */
export function createdOrderReference(text: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const order = isRecord(parsed) ? parsed.order : undefined;
  if (!isRecord(order)) return undefined;

  const { name, id } = order;
  if (typeof name === 'string' && name !== '') return name;
  if (typeof id === 'string' || typeof id === 'number') return String(id);
  return undefined;
}

export function describeCreatedOrder(text: string): string {
  const ref = createdOrderReference(text);
  return ref ? `Order ${ref} created` : 'Order created (no reference returned)';
}

/**
 * One Shopline store connection. Built once per task and reused for every row,
 * so the keep-alive agents hold a single connection for the whole batch.
 */
export class OrderSubmitter {
  readonly storeDomain: string;
  readonly apiVersion: string;
  readonly baseUrl: string;
  private client: AxiosInstance;

  constructor(options: OrderSubmitterOptions) {
    if (!options.accessToken) throw new Error('Shopline access token is required');

    this.storeDomain = normaliseStoreDomain(options.storeDomain);
    if (!this.storeDomain) throw new Error('Shopline store domain is required');

    this.apiVersion = options.apiVersion || DEFAULT_API_VERSION;
    this.baseUrl = `https://${this.storeDomain}/admin/openapi/${this.apiVersion}`;

    this.client = axios.create({
      baseURL: this.baseUrl,
      headers: {
        Authorization: `Bearer ${options.accessToken}`,
        'Content-Type': 'application/json; charset=utf-8',
        Accept: 'application/json',
        'User-Agent': 'ShoplineBulkOrders/1.0'
      },
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      // Status codes are mapped in submit(); the body is kept as raw text.
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      adapter: options.adapter
    });
  }

  async submit(payload: OrderPayload, ctx = 'shopline:createOrder'): Promise<SubmissionOutcome> {
    try {
      const res = await this.client.post<unknown>('/orders.json', { order: payload });
      const body = bodyAsText(res.data);

      if (res.status === 200 || res.status === 201) {
        return { ok: true, status: res.status, message: describeCreatedOrder(body) };
      }

      logError(ctx, 'Shopline POST /orders.json rejected', {
        status: res.status,
        data: truncateBody(body)
      });
      return {
        ok: false,
        status: res.status,
        message: `Error ${res.status}: ${truncateBody(body)}`
      };
    } catch (err) {
      logShoplineError(ctx, err);
      return { ok: false, status: null, message: `Request failed: ${errorMessage(err)}` };
    }
  }
}
