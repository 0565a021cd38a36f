// src/utils/csvUtils.ts

import fs from 'fs';
import Papa from 'papaparse';
import { ORDER_COLUMNS, RawRecord } from '../types/order';

export type CsvEncoding = 'utf-8' | 'latin1';

export interface DecodedCsv {
  text: string;
  encoding: CsvEncoding;
}

export interface OrderCsv {
  encoding: CsvEncoding;
  headers: string[];
  rows: RawRecord[];
}

export function normaliseHeaderName(header: string | null | undefined): string {
  if (!header) return '';

  return header
    .replace(/^\uFEFF/, '') // strip BOM
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_'); // "Customer Email" -> "customer_email"
}

/**
 * UTF-8 first (BOM dropped by the decoder), Latin-1 if the bytes are not valid UTF-8.
 */
export function decodeCsvBuffer(buf: Buffer): DecodedCsv {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buf);
    return { text, encoding: 'utf-8' };
  } catch {
    return { text: buf.toString('latin1'), encoding: 'latin1' };
  }
}

export class MalformedCsvError extends Error {
  constructor(detail: string) {
    super(`Malformed CSV: ${detail}`);
    this.name = 'MalformedCsvError';
  }
}

/**
 * Header-keyed CSV parse. Every cell stays a string; blank lines are skipped.
 * An unterminated quote would swallow the rest of the file into one row, so it
 * fails the whole parse.
 */
export function parseCsvText(text: string): {
  headers: string[];
  rows: Record<string, string>[];
} {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (h) => normaliseHeaderName(h)
  });

  const quoteError = result.errors.find((e) => e.type === 'Quotes');
  if (quoteError) {
    throw new MalformedCsvError(quoteError.message);
  }

  const headers = (result.meta.fields ?? []).filter((h) => h !== '');

  const rows = result.data.map((raw) => {
    const row: Record<string, string> = {};
    for (const h of headers) {
      row[h] = raw[h] ?? '';
    }
    return row;
  });

  return { headers, rows };
}

export function toRawRecord(row: Record<string, string>): RawRecord {
  const record: RawRecord = {};
  for (const column of ORDER_COLUMNS) {
    record[column] = row[column] ?? '';
  }
  return record;
}

/**
 * Read an orders CSV from disk. Rejects when the file cannot be read or parsed.
 */
export async function readOrderCsv(path: string): Promise<OrderCsv> {
  const buf = await fs.promises.readFile(path);
  const { text, encoding } = decodeCsvBuffer(buf);
  const { headers, rows } = parseCsvText(text);

  return { encoding, headers, rows: rows.map(toRawRecord) };
}
