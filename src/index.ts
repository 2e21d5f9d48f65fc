#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { redactCommand } from '@/commands/redact';
import { initCommand } from '@/commands/init';
import { logger } from '@/utils/logger';

const program = new Command();

program
  .name('url-redact')
  .version(__PACKAGE_VERSION__)
  .description('Redact sensitive query parameters from URLs embedded in text');

program.addCommand(redactCommand, { isDefault: true });
program.addCommand(initCommand);

// Global error handler
process.on('unhandledRejection', (reason) => {
  logger.critical(`Unhandled rejection: ${String(reason)}`);
  process.exit(1);
});

// Interrupts exit with the conventional 128 + signal number
process.on('SIGINT', () => {
  logger.warn('Interrupted, shutting down.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  logger.warn('Terminated, shutting down.');
  process.exit(143);
});

program.parseAsync().catch((error: unknown) => {
  logger.critical(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
