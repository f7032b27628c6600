/**
 * CLI Command Registration
 */

import { Command } from 'commander';
import pkg from '../../package.json';
import { configureColoredHelp } from './help-formatter';
import { createFormatsCommand } from './formats';
import { createReportCommand } from './report';
import { createCollectionsCommand } from './collections';
import { createElementCommand } from './element';
import { createOriginCommand } from './origin';
import { createConfigCommand } from './config';
import { CliContext, defaultContext } from './utils';

export function registerCommands(program: Command, context: CliContext = defaultContext): Command {
  program
    .name('egeria')
    .description('Egeria CLI - query open metadata and format it with configurable format sets')
    .version(pkg.version)
    .option('--url <url>', 'Platform URL (overrides EGERIA_PLATFORM_URL)')
    .option('--server <name>', 'View server name (overrides EGERIA_VIEW_SERVER)')
    .option('--user <id>', 'User id (overrides EGERIA_USER)')
    .option('--password <password>', 'User password (overrides EGERIA_USER_PASSWORD)')
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  const subcommands = [
    createOriginCommand(context),
    createConfigCommand(),
    createFormatsCommand(),
    createReportCommand(context),
    createCollectionsCommand(context),
    createElementCommand(context),
  ];

  subcommands.forEach(cmd => program.addCommand(cmd));

  // After the subcommands are attached, so nested commands are covered too
  configureColoredHelp(program);
  return program;
}
