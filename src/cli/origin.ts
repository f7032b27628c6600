/**
 * Platform origin check
 */

import { Command } from 'commander';
import * as colors from './colors';
import { setCommandHelp } from './help-formatter';
import { CliContext, connect, defaultContext, exitWithError } from './utils';

export function createOriginCommand(context: CliContext = defaultContext): Command {
  return setCommandHelp(
    new Command('origin'),
    'Check that the platform is reachable',
    'Check that the platform is reachable and print its origin string. Use this as a first diagnostic step before running other commands.'
  )
    .showHelpAfterError()
    .action(async (_options: Record<string, unknown>, command: Command) => {
      try {
        const client = await connect(context, command, false);
        console.log(colors.status.info(`Checking ${client.platformUrl} ...`));
        if (!client.verifiesCertificates) {
          console.log(colors.status.warning('Certificate verification is off'));
        }
        const origin = await client.getPlatformOrigin();
        console.log(colors.status.success('✓ Platform is reachable'));
        console.log(colors.ui.value(origin));
      } catch (error) {
        exitWithError('Platform origin check failed', error);
      }
    });
}
