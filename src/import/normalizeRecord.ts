// src/import/normalizeRecord.ts
import {
  FinancialStatus,
  OrderLineItem,
  OrderPayload,
  PRODUCT_SLOTS,
  RawRecord
} from '../types/order';
import { InvalidQuantityError } from './errors';

export const DEFAULT_COUNTRY = 'United States';
export const DEFAULT_QUANTITY = '1';

const EMPTY_TOKENS = new Set(['', 'nan', 'null']);

const FINANCIAL_STATUS_BY_PAYMENT: Record<string, FinancialStatus> = {
  COD: 'unpaid',
  PAID: 'paid'
};

/**
 * Trim a cell and treat blank / "nan" / "null" (any case) as missing.
 */
export function cleanValue(value: string | null | undefined, fallback = ''): string {
  if (value == null) return fallback;
  const s = String(value).trim();
  return EMPTY_TOKENS.has(s.toLowerCase()) ? fallback : s;
}

export function parseQuantity(column: string, raw: string): number {
  if (!/^\+?\d+$/.test(raw)) {
    throw new InvalidQuantityError(column, raw);
  }
  const qty = Number(raw);
  if (!Number.isSafeInteger(qty) || qty < 1) {
    throw new InvalidQuantityError(column, raw);
  }
  return qty;
}

export function mapFinancialStatus(paymentMethod: string | undefined): FinancialStatus {
  const key = cleanValue(paymentMethod).toUpperCase();
  return FINANCIAL_STATUS_BY_PAYMENT[key] ?? 'unpaid';
}

function buildLineItems(record: RawRecord): OrderLineItem[] {
  const items: OrderLineItem[] = [];

  for (const slot of PRODUCT_SLOTS) {
    const title = cleanValue(record[`product_${slot}_name` as const]);
    const price = cleanValue(record[`product_${slot}_price` as const]);
    if (!title || !price) continue;

    const qtyColumn = `product_${slot}_quantity` as const;
    items.push({
      title,
      price,
      quantity: parseQuantity(qtyColumn, cleanValue(record[qtyColumn], DEFAULT_QUANTITY)),
      requires_shipping: true,
      taxable: true
    });
  }

  return items;
}

/**
 * Turn one CSV row into a Shopline create-order body.
 * Only an unparsable quantity throws; every other field falls back to a default.
 */
export function normalizeRecord(record: RawRecord): OrderPayload {
  return {
    customer: {
      email: cleanValue(record.customer_email),
      first_name: cleanValue(record.customer_first_name),
      last_name: cleanValue(record.customer_last_name)
    },
    shipping_address: {
      address1: cleanValue(record.shipping_address1),
      city: cleanValue(record.shipping_city),
      province: cleanValue(record.shipping_state),
      country: cleanValue(record.shipping_country, DEFAULT_COUNTRY),
      zip: cleanValue(record.shipping_zip)
    },
    line_items: buildLineItems(record),
    financial_status: mapFinancialStatus(record.payment_method),
    fulfillment_status: 'unshipped',
    send_receipt: true
  };
}
