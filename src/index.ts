#!/usr/bin/env node
/**
 * Egeria CLI - Entry Point
 */

import { Command } from 'commander';
import { registerCommands } from './cli/commands';
import { getConfig } from './lib/config';
import Logger from './lib/logger';
import * as colors from './cli/colors';
import { errorMessage } from './lib/errors';

const config = getConfig();
Logger.reconfigure({
  logLevel: config.getLogLevel(),
  logFile: config.getLogFile(),
});

const program = registerCommands(new Command());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(colors.status.error(`✗ ${errorMessage(error)}`));
  process.exit(1);
});
