#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './program.js';
import { configureLoggerFromEnv } from './utils/logger.js';

async function main(): Promise<void> {
  configureLoggerFromEnv();
  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  console.error('CLI error:', error);
  process.exit(1);
});
