#!/usr/bin/env node
import { KVStore } from './storage/KVStore';
import { CommandSession } from './server/CommandSession';
import { CLIParser } from './cli/CLIParser';
import { logger } from './common/Logger';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  logger.setLevel(options.logLevel);

  const store = new KVStore(options.config, { logger });
  await store.initialize();

  const session = new CommandSession(store, {
    input: process.stdin,
    output: process.stdout,
    logger,
  });

  const shutdown = (): void => {
    logger.info('session.interrupted');
    session.stop();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const reason = await session.run();
  const { keys, dataFile } = store.stats();
  await store.close();
  logger.info('session.ended', { reason, file: dataFile, keys });
}

main().catch((err) => {
  logger.error('fatal', {
    err_code: err instanceof Error ? err.name : 'UNKNOWN',
    err_message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
