#!/usr/bin/env node

import { Command } from 'commander';
import { createPrinter } from './banner';
import { ConfigError, validateEnv } from './config';
import { createLastQuery } from './last-query';
import { runReport } from './runner';
import { CLIOptions, SourceConfig, VERSION } from './types';

const printer = createPrinter();
const program = new Command();

program
  .name('userscope')
  .description('List local accounts with their privileges and last login')
  .option('-v, --version', 'Shows the version')
  .option('-s, --system-users', 'Show system users on the device')
  .option('-u, --users', 'Show users on this device. This is the default')
  .option('-a, --all-users', 'Show all users on this device')
  .option('-F, --show-full', 'Show the full user information')
  .action(runCli);

async function runCli(options: CLIOptions): Promise<void> {
  printer.printBanner(VERSION);

  // Version display never touches the system databases
  if (options.version) {
    printer.printLabel('Showing version');
    printer.printVersion(VERSION);
    return;
  }

  let config: SourceConfig;
  try {
    config = validateEnv();
  } catch (error) {
    if (error instanceof ConfigError) {
      printer.printError('Environment validation failed:');
      error.issues.forEach((issue) => printer.printInfo(issue));
      process.exit(1);
    }
    throw error;
  }

  const exitCode = await runReport(options, {
    config,
    queryLoginHistory: createLastQuery({ command: config.lastCommand, timeoutMs: config.lastTimeoutMs }),
    printer,
  });

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

program.parseAsync().catch((error: unknown) => {
  printer.printError(`Failed to build report: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
