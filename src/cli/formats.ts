/**
 * Format Set Commands
 *
 * Browse, document, export and install output format sets.
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from '../lib/config';
import { FormatSetRegistry, getRegistry, MergeReport } from '../formats/registry';
import { describe, findFormat, supportedModes } from '../formats/selector';
import { formatSetCatalogTable, formatSetMarkdown, FormatSetSummary, listFormatSets } from '../formats/catalog';
import { Format, FormatSet, toSerializable } from '../formats/schema';
import { Table } from '../lib/table';
import * as colors from './colors';
import { separator } from './colors';
import { setCommandHelp } from './help-formatter';
import { exitWithError } from './utils';

interface ListOptions {
  family?: boolean;
  markdown?: boolean;
  json?: boolean;
}

interface ShowOptions {
  outputFormat?: string;
  json?: boolean;
}

interface CatalogRow extends FormatSetSummary {
  modes: string;
}

function printFormat(format: Format): void {
  const tags = format.types.map(t => colors.modeColor(t)(t)).join(', ');
  console.log(`\n  ${colors.ui.key('Types:')} ${tags}`);
  for (const column of format.columns) {
    const flag = column.format ? colors.status.dim(' (formatted)') : '';
    console.log(`    ${colors.ui.bullet('•')} ${colors.ui.value(column.name)} ${colors.status.dim(column.key)}${flag}`);
  }
}

function printFormatSet(name: string, formatSet: FormatSet): void {
  console.log('\n' + separator());
  console.log(colors.ui.title(name));
  console.log(separator());
  console.log(`${colors.ui.key('Heading:')} ${colors.ui.value(formatSet.heading)}`);
  console.log(`${colors.ui.key('Description:')} ${colors.element.description(formatSet.description)}`);
  if (formatSet.target_type) {
    console.log(`${colors.ui.key('Target type:')} ${colors.element.type(formatSet.target_type)}`);
  }
  if (formatSet.family) {
    console.log(`${colors.ui.key('Family:')} ${colors.ui.value(formatSet.family)}`);
  }
  if (formatSet.aliases.length > 0) {
    console.log(`${colors.ui.key('Aliases:')} ${colors.ui.value(formatSet.aliases.join(', '))}`);
  }
  if (formatSet.action) {
    const { action } = formatSet;
    console.log(`${colors.ui.key('Action:')} ${colors.ui.command(action.function)}`);
    if (action.required_params.length > 0) {
      console.log(`  ${colors.ui.key('Required:')} ${action.required_params.join(', ')}`);
    }
    if (action.optional_params.length > 0) {
      console.log(`  ${colors.ui.key('Optional:')} ${action.optional_params.join(', ')}`);
    }
  }
  if (formatSet.get_additional_props) {
    console.log(`${colors.ui.key('Additional properties:')} ${colors.ui.command(formatSet.get_additional_props.function)}`);
  }
  formatSet.formats.forEach(printFormat);
  console.log('\n' + separator());
}

function printMergeReport(report: MergeReport): void {
  for (const name of report.merged) {
    console.log(`${colors.status.success('✓')} ${colors.ui.value(name)}`);
  }
  for (const rejected of report.rejected) {
    console.log(`${colors.status.error('✗')} ${colors.ui.value(rejected.name)}`);
    for (const issue of rejected.issues) {
      console.log(`    ${colors.status.dim(issue)}`);
    }
  }
}

export function createFormatsCommand(): Command {
  const formats = setCommandHelp(
    new Command('formats'),
    'Browse and manage output format sets',
    'Browse and manage output format sets. A format set names the columns shown for a kind of element in each output mode (DICT, TABLE, LIST, MD, FORM, REPORT, MERMAID). User sets are loaded from the format-set directory and override the built-in ones by name.'
  )
    .alias('fmt')
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  formats.addCommand(
    new Command('list')
      .alias('ls')
      .description('List registered format sets')
      .option('--family', 'Group by family')
      .option('--markdown', 'Print a markdown catalog table')
      .option('--json', 'Output as JSON')
      .action((options: ListOptions) => {
        try {
          const registry = getRegistry();
          if (options.markdown) {
            process.stdout.write(formatSetCatalogTable(registry));
            return;
          }

          const summaries = listFormatSets(registry, { byFamily: options.family });
          if (options.json) {
            console.log(JSON.stringify(summaries, null, 2));
            return;
          }

          const rows: CatalogRow[] = summaries.map(s => {
            const formatSet = registry.lookup(s.name);
            return { ...s, modes: formatSet ? supportedModes(formatSet).join(', ') : '' };
          });
          const table = new Table<CatalogRow>({
            columns: [
              ...(options.family ? [{ header: 'Family', field: 'family' as const, type: 'value' as const, width: 'auto' as const }] : []),
              { header: 'Name', field: 'name', type: 'name', width: 'auto', maxWidth: 32 },
              { header: 'Target', field: 'target_type', type: 'type', width: 'auto', maxWidth: 24 },
              { header: 'Modes', field: 'modes', type: 'text', width: 'flex', priority: 1 },
              { header: 'Description', field: 'description', type: 'text', width: 'flex', priority: 2 },
            ],
            emptyMessage: 'No format sets registered',
          });
          console.log(table.render(rows).join('\n'));
        } catch (error) {
          exitWithError('Failed to list format sets', error);
        }
      })
  );

  formats.addCommand(
    new Command('show')
      .description('Show one format set, by name or alias')
      .argument('<name>', 'Format set name or alias')
      .option('-o, --output-format <mode>', 'Only the format chosen for this output mode')
      .option('--json', 'Output as JSON')
      .action((name: string, options: ShowOptions) => {
        const found = describe(getRegistry(), name);
        if (!found) {
          exitWithError(`Format set '${name}' not found`, `No format set or alias named '${name}'`);
        }

        if (options.outputFormat) {
          const format = findFormat(found.formatSet, options.outputFormat);
          if (!format) {
            exitWithError(
              `No ${options.outputFormat.toUpperCase()} format in '${found.name}'`,
              `Available formats: ${supportedModes(found.formatSet).join(', ')}`
            );
          }
          if (options.json) {
            console.log(JSON.stringify(format, null, 2));
          } else {
            console.log(colors.ui.title(found.name));
            printFormat(format);
          }
          return;
        }

        if (options.json) {
          console.log(JSON.stringify({ name: found.name, ...toSerializable(found.formatSet) }, null, 2));
        } else {
          printFormatSet(found.name, found.formatSet);
        }
      })
  );

  formats.addCommand(
    new Command('doc')
      .description('Print a markdown document describing every format set')
      .action(() => {
        process.stdout.write(formatSetMarkdown(getRegistry()));
      })
  );

  formats.addCommand(
    new Command('export')
      .description('Write format sets to a JSON file (all when no names are given)')
      .argument('<file>', 'Output file')
      .argument('[names...]', 'Format set names or aliases')
      .action((file: string, names: string[]) => {
        try {
          const written = getRegistry().saveToFile(file, names.length > 0 ? names : undefined);
          if (written.length === 0) {
            exitWithError('Nothing exported', 'None of the requested format sets exist');
          }
          console.log(colors.status.success(`✓ Exported ${written.length} format set(s) to ${file}`));
        } catch (error) {
          exitWithError('Failed to export format sets', error);
        }
      })
  );

  formats.addCommand(
    new Command('import')
      .description('Validate a JSON file of format sets and install it in the user format-set directory')
      .argument('<file>', 'JSON file of format sets')
      .option('--replace', 'Overwrite an installed file of the same name')
      .action((file: string, options: { replace?: boolean }) => {
        try {
          const scratch = new FormatSetRegistry();
          const report = scratch.mergeFromFile(file);
          printMergeReport(report);
          if (report.merged.length === 0) {
            exitWithError('Nothing imported', `No valid format sets in ${file}`);
          }

          const target = path.join(getConfig().getUserFormatSetsDir(), path.basename(file));
          if (fs.existsSync(target) && !options.replace) {
            exitWithError('Not imported', `${target} already exists (use --replace to overwrite)`);
          }
          scratch.saveToFile(target, report.merged);
          console.log(colors.status.success(`✓ Installed ${report.merged.length} format set(s) in ${target}`));
        } catch (error) {
          exitWithError('Failed to import format sets', error);
        }
      })
  );

  formats.addCommand(
    new Command('validate')
      .description('Check a JSON file of format sets without installing it')
      .argument('<file>', 'JSON file of format sets')
      .action((file: string) => {
        try {
          const report = new FormatSetRegistry().mergeFromFile(file);
          printMergeReport(report);
          if (report.rejected.length > 0) {
            exitWithError('Validation failed', `${report.rejected.length} format set(s) rejected`);
          }
          console.log(colors.status.success(`✓ ${report.merged.length} valid format set(s)`));
        } catch (error) {
          exitWithError('Validation failed', error);
        }
      })
  );

  return formats;
}
