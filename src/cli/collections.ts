/**
 * Collection commands
 */

import { Command } from 'commander';
import { setCommandHelp } from './help-formatter';
import { CliContext, connect, defaultContext, exitWithError, parseInteger, parseOutputMode, printOutputResult } from './utils';

interface OutputFlags {
  outputFormat: string;
  reportSpec?: string;
}

interface FindFlags extends OutputFlags {
  startsWith?: boolean;
  endsWith?: boolean;
  ignoreCase?: boolean;
  pageSize?: number;
  startFrom?: number;
}

const OUTPUT_HELP = 'Output mode (JSON, DICT, TABLE, LIST, MD, FORM, REPORT, MERMAID)';

export function createCollectionsCommand(context: CliContext = defaultContext): Command {
  const collections = setCommandHelp(
    new Command('collections'),
    'Find and inspect collections',
    'Find and inspect collections: folders, digital products, agreements and other groupings of elements. JSON output returns the elements as the server sent them. Other modes format them with the Collections format set, or the set named by --report-spec.'
  )
    .alias('coll')
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  collections.addCommand(
    new Command('find')
      .description('Find collections whose properties match a search string')
      .argument('[search]', 'Search string (* or omitted for all)', '*')
      .option('-o, --output-format <mode>', OUTPUT_HELP, parseOutputMode, 'JSON')
      .option('-r, --report-spec <name>', 'Format set used to format the output')
      .option('--starts-with', 'Match at the start of values')
      .option('--ends-with', 'Match at the end of values')
      .option('--ignore-case', 'Case-insensitive match')
      .option('--page-size <n>', 'Maximum number of elements', parseInteger)
      .option('--start-from <n>', 'Index of the first element', parseInteger)
      .action(async (search: string, options: FindFlags, command: Command) => {
        try {
          const client = await connect(context, command);
          printOutputResult(await client.findCollections(search, {
            outputFormat: options.outputFormat,
            reportSpec: options.reportSpec,
            startsWith: options.startsWith,
            endsWith: options.endsWith,
            ignoreCase: options.ignoreCase,
            pageSize: options.pageSize,
            startFrom: options.startFrom,
          }));
        } catch (error) {
          exitWithError('Failed to find collections', error);
        }
      })
  );

  collections.addCommand(
    new Command('show')
      .description('Show one collection by GUID')
      .argument('<guid>', 'Collection GUID')
      .option('-o, --output-format <mode>', OUTPUT_HELP, parseOutputMode, 'JSON')
      .option('-r, --report-spec <name>', 'Format set used to format the output')
      .action(async (guid: string, options: OutputFlags, command: Command) => {
        try {
          const client = await connect(context, command);
          printOutputResult(await client.getCollectionByGuid(guid, options));
        } catch (error) {
          exitWithError(`Failed to get collection ${guid}`, error);
        }
      })
  );

  collections.addCommand(
    new Command('members')
      .description('List the members of a collection')
      .argument('<guid>', 'Collection GUID')
      .option('-o, --output-format <mode>', OUTPUT_HELP, parseOutputMode, 'JSON')
      .option('-r, --report-spec <name>', 'Format set used to format the output')
      .option('--page-size <n>', 'Maximum number of elements', parseInteger)
      .action(async (guid: string, options: OutputFlags & { pageSize?: number }, command: Command) => {
        try {
          const client = await connect(context, command);
          printOutputResult(await client.getCollectionMembers(guid, options));
        } catch (error) {
          exitWithError(`Failed to get members of ${guid}`, error);
        }
      })
  );

  return collections;
}
