/**
 * Report command: run a format set's action and print the result
 */

import { Command } from 'commander';
import { getConfig } from '../lib/config';
import { getRegistry } from '../formats/registry';
import { reportableFormatSets } from '../formats/catalog';
import { ReportParams, runReport } from '../formats/report-runner';
import * as colors from './colors';
import { setCommandHelp } from './help-formatter';
import { CliContext, collect, connect, defaultContext, exitWithError, parseInteger, parseOutputMode, parseParams } from './utils';

interface ReportOptions {
  outputFormat: string;
  param: string[];
  searchString?: string;
  pageSize?: number;
  startFrom?: number;
}

export function createReportCommand(context: CliContext = defaultContext): Command {
  return setCommandHelp(
    new Command('report'),
    'Run a report defined by a format set',
    'Run a report defined by a format set. The set\'s action is called with the given parameters and the results are shown with the set\'s columns. Without a name, lists the format sets that can be run as reports.'
  )
    .argument('[name]', 'Format set name or alias')
    .option('-o, --output-format <mode>', 'Output mode (JSON, DICT, TABLE, LIST, MD, FORM, REPORT, MERMAID)', parseOutputMode, 'TABLE')
    .option('-p, --param <key=value>', 'Action parameter (repeatable)', collect, [])
    .option('-s, --search-string <text>', 'Search string passed to the action')
    .option('--page-size <n>', 'Maximum number of elements', parseInteger)
    .option('--start-from <n>', 'Index of the first element', parseInteger)
    .showHelpAfterError()
    .action(async (name: string | undefined, options: ReportOptions, command: Command) => {
      if (!name) {
        console.log(colors.ui.title('Reports'));
        for (const reportName of reportableFormatSets(getRegistry())) {
          console.log(`  ${colors.ui.bullet('•')} ${colors.element.name(reportName)}`);
        }
        return;
      }

      try {
        const params: ReportParams = parseParams(options.param);
        if (options.searchString !== undefined) params.search_string = options.searchString;
        if (options.pageSize !== undefined) params.page_size = options.pageSize;
        if (options.startFrom !== undefined) params.start_from = options.startFrom;

        const client = await connect(context, command);
        const result = await runReport(client, name, {
          mode: options.outputFormat,
          params,
          width: getConfig().getConsoleWidth(),
        });

        switch (result.kind) {
          case 'empty':
            console.log(colors.status.dim(result.message));
            break;
          case 'json':
            console.log(JSON.stringify(result.data, null, 2));
            break;
          case 'text':
            console.log(result.content);
            break;
        }
      } catch (error) {
        exitWithError(`Report '${name}' failed`, error);
      }
    });
}
