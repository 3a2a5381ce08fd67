#!/usr/bin/env node
/**
 * dam-upload command-line entry point
 */

import chalk from 'chalk';
import { DamClient } from '../client.js';
import { loadConfigFromEnv } from '../config.js';
import { errorMessage } from '../utils/errors.js';
import { initLogger } from '../utils/logger.js';
import { USAGE, parseCliArgs } from './args.js';
import { runList, runStats, runUpload } from './commands.js';

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);

  if (command.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfigFromEnv();
  initLogger(config.debug ?? false);
  const context = { client: new DamClient(config) };

  switch (command.command) {
    case 'upload':
      return runUpload(context, command);
    case 'stats':
      return runStats(context);
    case 'list':
      return runList(context, command.limit);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red.bold('✗ ' + errorMessage(error)));
    process.exitCode = 1;
  }
);
