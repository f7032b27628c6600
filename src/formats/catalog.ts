/**
 * Format Set Catalog
 *
 * Listings and documentation of what a registry holds.
 */

import { FormatSet, WILDCARD_MODE } from './schema';
import { FormatSetRegistry } from './registry';
import { escapeTableCell } from './renderer';

export interface FormatSetSummary {
  name: string;
  family: string;
  heading: string;
  description: string;
  aliases: string[];
  target_type: string;
}

export const UNGROUPED_FAMILY = 'Other';

function summarize(name: string, formatSet: FormatSet): FormatSetSummary {
  return {
    name,
    family: formatSet.family || UNGROUPED_FAMILY,
    heading: formatSet.heading,
    description: formatSet.description,
    aliases: [...formatSet.aliases],
    target_type: formatSet.target_type ?? '',
  };
}

/**
 * Summaries in registration order, or by family then name
 * (case-insensitive) when `byFamily` is set
 */
export function listFormatSets(registry: FormatSetRegistry, options: { byFamily?: boolean } = {}): FormatSetSummary[] {
  const summaries = registry.entries().map(([name, fs]) => summarize(name, fs));
  if (options.byFamily) {
    summaries.sort((a, b) =>
      a.family.toLowerCase().localeCompare(b.family.toLowerCase()) ||
      a.name.toLowerCase().localeCompare(b.name.toLowerCase())
    );
  }
  return summaries;
}

/**
 * | Family | Report Name | Description |
 */
export function formatSetCatalogTable(registry: FormatSetRegistry): string {
  const lines = [
    '| Family | Report Name | Description |',
    '|---|---|---|',
    ...listFormatSets(registry, { byFamily: true }).map(s =>
      `| ${escapeTableCell(s.family)} | ${escapeTableCell(s.name)} | ${escapeTableCell(s.description)} |`
    ),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Markdown document describing every registered set, sorted by name
 */
export function formatSetMarkdown(registry: FormatSetRegistry): string {
  const lines: string[] = ['# Available Output Format Sets', ''];
  const entries = registry.entries().sort(([a], [b]) => a.localeCompare(b));

  for (const [name, fs] of entries) {
    lines.push(`## ${name}`);
    lines.push(`- Heading: ${fs.heading}`);
    lines.push(`- Description: ${fs.description}`);
    if (fs.target_type) lines.push(`- Target type: ${fs.target_type}`);
    if (fs.family) lines.push(`- Family: ${fs.family}`);
    if (fs.aliases.length > 0) lines.push(`- Aliases: ${fs.aliases.join(', ')}`);
    if (fs.action) lines.push(`- Action: ${fs.action.function}`);
    lines.push('- Formats:');
    for (const format of fs.formats) {
      lines.push(`  - Types: ${format.types.join(', ')}`);
      lines.push('    - Columns:');
      for (const column of format.columns) {
        lines.push(`      - ${column.name} (${column.key})`);
      }
    }
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Sets that can drive a report: an action plus a DICT (or wildcard)
 * format
 */
export function reportableFormatSets(registry: FormatSetRegistry): string[] {
  return registry.entries()
    .filter(([, fs]) =>
      fs.action !== undefined &&
      fs.formats.some(f => f.types.includes('DICT') || f.types.includes(WILDCARD_MODE))
    )
    .map(([name]) => name);
}
