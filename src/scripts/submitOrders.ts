#!/usr/bin/env node
// src/scripts/submitOrders.ts
import 'dotenv/config';
import { loadConfig } from '../config/appConfig';
import { BatchRunner } from '../import/batchRunner';
import { OrderSubmitter } from '../shopline/orderSubmitter';
import { CliOptions, parseCliArgs, USAGE } from './cliArgs';
import { createContextId, errorMessage, logError, logInfo } from '../utils/logger';

async function main() {
  const ctx = createContextId('submitOrdersCLI');

  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`${errorMessage(err)}\n\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();

  try {
    const runner = new BatchRunner({
      submitter: new OrderSubmitter({
        accessToken: options.accessToken,
        storeDomain: options.storeDomain,
        apiVersion: config.apiVersion,
        timeoutMs: config.requestTimeoutMs
      }),
      resultsDir: config.resultsDir,
      pacingMs: options.pacingMs ?? config.pacingMs,
      ctx
    });

    let failedRows = 0;
    const resultFile = await runner.run(options.filePath, {
      append: (line, ok) => {
        if (!ok) failedRows++;
        console.log(line);
      }
    });

    logInfo(ctx, 'Order submission completed', { resultFile, failedRows });

    if (failedRows > 0) {
      // non-zero exit to signal partial failure to CI/shell
      process.exitCode = 2;
    }
  } catch (err) {
    logError(ctx, 'Fatal error during order submission', { error: errorMessage(err) });
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
