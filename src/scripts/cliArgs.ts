// src/scripts/cliArgs.ts
import path from 'path';

export interface CliOptions {
  filePath: string;
  storeDomain: string;
  accessToken: string;
  pacingMs?: number;
}

export const USAGE = [
  'Usage:',
  '  submit-orders <orders.csv> --store <domain> [--token <token>] [--pacing-ms <ms>]',
  '',
  'The token falls back to SHOPLINE_ACCESS_TOKEN.',
  '',
  'Examples:',
  '  submit-orders orders.csv --store example.myshopline.com --token test-token',
  '  submit-orders orders.csv --store https://example.myshopline.com --pacing-ms 500'
].join('\n');

export function parseCliArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  if (!argv.length || argv[0].startsWith('--')) {
    throw new Error('Missing CSV file path');
  }

  const filePath = path.resolve(argv[0]);

  let storeDomain: string | undefined;
  let accessToken: string | undefined = env.SHOPLINE_ACCESS_TOKEN;
  let pacingMs: number | undefined;

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === '--store') {
      storeDomain = value;
      i++;
    } else if (arg === '--token') {
      accessToken = value;
      i++;
    } else if (arg === '--pacing-ms') {
      pacingMs = Number(value);
      if (!Number.isFinite(pacingMs) || pacingMs < 0) {
        throw new Error(`Invalid --pacing-ms value: ${value}`);
      }
      i++;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (!storeDomain) throw new Error('--store is required');
  if (!accessToken) throw new Error('--token or SHOPLINE_ACCESS_TOKEN is required');

  return { filePath, storeDomain, accessToken, pacingMs };
}
