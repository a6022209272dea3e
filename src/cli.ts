#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { initializeDatabase } from './adapters/db/sqlite.adapter.js';
import { validateCommand } from './commands/validate.js';
import { planCommand } from './commands/plan.js';
import { applyCommand } from './commands/apply.js';
import { runsCommand } from './commands/runs.js';

const program = new Command();

program
  .name('deckhand')
  .description('Validate deployment manifests and apply them to a hosting platform')
  .version('0.1.0');

program
  .command('validate')
  .description('Parse and validate a manifest')
  .argument('<file>', 'manifest file')
  .option('--strict', 'reject unknown fields')
  .option('--json', 'print the issues as JSON')
  .action((file: string, options: { strict?: boolean; json?: boolean }) => {
    process.exitCode = validateCommand(file, options, loadConfig());
  });

program
  .command('plan')
  .description('Show the actions an apply would take')
  .argument('<file>', 'manifest file')
  .option('--strict', 'reject unknown fields')
  .option('--revision <rev>', 'source revision to build')
  .action(async (file: string, options: { strict?: boolean; revision?: string }) => {
    initializeDatabase();
    process.exitCode = await planCommand(file, options, loadConfig());
  });

program
  .command('apply')
  .description('Apply a manifest, stopping at the first failing action')
  .argument('<file>', 'manifest file')
  .option('--strict', 'reject unknown fields')
  .option('--revision <rev>', 'source revision to build')
  .option('--timeout <duration>', 'per-action timeout, e.g. 90s or 5m')
  .action(async (file: string, options: { strict?: boolean; revision?: string; timeout?: string }) => {
    initializeDatabase();

    // First Ctrl-C stops after the running action; a second one exits
    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      console.error('Cancelling after the current action...');
      controller.abort();
    };
    process.on('SIGINT', onSigint);
    try {
      process.exitCode = await applyCommand(file, { ...options, signal: controller.signal }, loadConfig());
    } finally {
      process.off('SIGINT', onSigint);
    }
  });

program
  .command('runs')
  .description('List recent apply runs')
  .option('--service <name>', 'only runs for this service')
  .option('--limit <n>', 'maximum number of runs', (value) => parseInt(value, 10))
  .action((options: { service?: string; limit?: number }) => {
    initializeDatabase();
    process.exitCode = runsCommand(options);
  });

program.parseAsync().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
