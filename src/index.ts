#!/usr/bin/env node
import { loadConfig, validateConfig } from './config';
import { Logger } from './logging/logger';
import { buildProgram } from './cli/program';

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const logger = new Logger(config.logging);
  logger.debug('cli', 'Starting', { argv: process.argv.slice(2), database: config.database.path });

  try {
    await buildProgram({ config, logger, print: line => console.log(line) }).parseAsync(process.argv);
  } catch (error) {
    logger.fatal('cli', 'Command failed', error);
    throw error;
  }
}

main().catch((error) => {
  console.error('❌ Command failed:', error);
  process.exit(1);
});
