/**
 * Element command: any metadata element by GUID
 */

import { Command } from 'commander';
import { setCommandHelp } from './help-formatter';
import { CliContext, connect, defaultContext, exitWithError, parseOutputMode, printOutputResult } from './utils';

export function createElementCommand(context: CliContext = defaultContext): Command {
  return setCommandHelp(
    new Command('element'),
    'Show any element by GUID',
    'Show any metadata element by GUID. Non-JSON output uses the format set registered for the element\'s type, or the Default set when there is none.'
  )
    .argument('<guid>', 'Element GUID')
    .option('-o, --output-format <mode>', 'Output mode (JSON, DICT, TABLE, LIST, MD, FORM, REPORT, MERMAID)', parseOutputMode, 'JSON')
    .option('-r, --report-spec <name>', 'Format set used to format the output')
    .option('--effective-time <iso>', 'Effective time for the lookup')
    .showHelpAfterError()
    .action(async (guid: string, options: { outputFormat: string; reportSpec?: string; effectiveTime?: string }, command: Command) => {
      try {
        const client = await connect(context, command);
        printOutputResult(await client.getElementByGuid(guid, options));
      } catch (error) {
        exitWithError(`Failed to get element ${guid}`, error);
      }
    });
}
