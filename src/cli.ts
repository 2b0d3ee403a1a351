#!/usr/bin/env node
// src/cli.ts

import { startBridge, type Bridge } from './bridge.js';
import { USAGE, loadConfig, wantsHelp } from './config.js';
import { rootLogger } from './logger.js';

const logger = rootLogger.createLogger('Main');

function registerShutdown(bridge: Bridge): void {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    bridge.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (wantsHelp(argv)) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig(argv, process.env);
  rootLogger.setLevel(config.logLevel);
  if (!process.stdout.isTTY) rootLogger.disableColors();

  const bridge = await startBridge(config);
  registerShutdown(bridge);
}

main().catch((err: unknown) => {
  logger.error('Fatal error', err);
  process.exitCode = 1;
});
