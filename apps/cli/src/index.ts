#!/usr/bin/env tsx
/**
 * Personal finance ledger CLI
 *
 * Usage:
 *   npm start -- [ledger-file]
 *   LEDGER_FILE=~/ledger.txt LEDGER_CURRENCY=EUR npm start
 */

import { FlatFileLedgerRepository, LedgerError, LedgerService } from '@ledger/core';
import type { LedgerStore } from '@ledger/core';
import { createLogger, stderrDestination } from '@ledger/observability';
import { ConfigError, loadConfig } from './config.js';
import type { CliConfig } from './config.js';
import { LedgerMenu } from './menu.js';
import { createReadlinePrompt } from './prompt.js';

async function main(): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(process.env, process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  // stderr keeps log lines out of the menu
  const logger = createLogger({ level: config.logLevel }, stderrDestination());
  const service = new LedgerService({
    repository: new FlatFileLedgerRepository(logger),
    filePath: config.ledgerFile,
    logger,
  });

  let store: LedgerStore;
  try {
    store = await service.open();
  } catch (error) {
    if (error instanceof LedgerError) {
      logger.error({ err: error, path: config.ledgerFile }, 'Failed to load ledger');
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const prompt = createReadlinePrompt();
  try {
    const menu = new LedgerMenu({
      service,
      store,
      prompt,
      print: (line) => console.log(line),
      logger,
      currency: config.currency,
    });
    await menu.run();
    return 0;
  } finally {
    prompt.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  }
);
