/**
 * Output Renderer
 *
 * Projected rows + output mode → final representation. Pure and
 * synchronous; the only ambient input is the clock used in FORM and
 * REPORT preambles, which callers may supply.
 */

import { ProjectedRow, rowToRecord, rowValue } from './projector';
import { renderTable } from './table-output';

export const MD_SEPARATOR = '\n---\n\n';
export const MISSING_MERMAID = '___';

export type RenderResult =
  | { kind: 'json'; mode: string; data: Record<string, string>[] }
  | { kind: 'text'; mode: string; content: string }
  | { kind: 'mermaid'; mode: 'MERMAID'; diagrams: string[] };

export interface RenderContext {
  /** Entity kind shown in headings, e.g. "Collection" */
  kindName: string;
  searchString?: string;
  /** Clock for preambles */
  now?: Date;
  /** Terminal width for TABLE */
  width?: number;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * yyyy-mm-dd HH:MM in local time
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function pluralize(kind: string): string {
  return kind.endsWith('y') ? `${kind.slice(0, -1)}ies` : `${kind}s`;
}

function searchLabel(searchString: string | undefined): string {
  return searchString ? searchString : 'All';
}

export function makePreamble(kind: string, mode: string, searchString: string | undefined, now: Date): string {
  const search = searchLabel(searchString);
  if (mode === 'FORM') {
    return `\n# Update ${kind} Form - created at ${formatTimestamp(now)}\n` +
      `\t ${kind} found from the search string:  \`${search}\`\n\n`;
  }
  if (mode === 'REPORT') {
    return `# ${kind} Report - created at ${formatTimestamp(now)}\n` +
      `\t${kind}  found from the search string:  \`${search}\`\n\n`;
  }
  return '\n';
}

/**
 * "## Name\nvalue\n\n". REPORT drops empty values.
 */
export function makeMdAttribute(name: string, value: string, mode: string): string {
  const text = value.trim();
  if (mode === 'REPORT' && text === '') return '';
  return `## ${name}\n${text}\n\n`;
}

export function escapeTableCell(text: string): string {
  return text.replace(/\n/g, ' ').replace(/\|/g, '\\|');
}

function renderEntityMarkdown(rows: ProjectedRow[], mode: string, kind: string): string {
  return rows.map(row => {
    let md = mode === 'REPORT'
      ? `# ${kind} Name: ${rowValue(row, 'display_name') || rowValue(row, 'qualified_name')}\n\n`
      : `# Update ${kind}\n\n`;
    for (const column of row) {
      md += makeMdAttribute(column.name, column.value, mode);
    }
    return md;
  }).join(MD_SEPARATOR);
}

/**
 * Markdown table: title, search line, header, separator, one row per entity
 */
export function renderMarkdownTable(rows: ProjectedRow[], columns: { name: string }[], kind: string, searchString?: string): string {
  const plural = pluralize(kind);
  let md = `# ${plural} Table\n\n`;
  md += `${plural} found from the search string: \`${searchLabel(searchString)}\`\n\n`;
  md += '| ' + columns.map(c => `${c.name} | `).join('') + '\n';
  md += '|' + columns.map(() => '-------------|').join('') + '\n';
  for (const row of rows) {
    md += '| ' + row.map(c => `${c.format ? escapeTableCell(c.value) : c.value} | `).join('') + '\n';
  }
  return md;
}

function mermaidOf(row: ProjectedRow): string {
  const column = row.find(c => c.key.toLowerCase().includes('mermaid') && c.value !== '');
  return column ? column.value : MISSING_MERMAID;
}

/**
 * Render projected rows. `columns` gives the header order for LIST and
 * TABLE when `rows` is empty.
 */
export function render(rows: ProjectedRow[], mode: string, columns: { name: string; key: string; format: boolean }[], context: RenderContext): RenderResult {
  const upper = mode.toUpperCase();
  const kind = context.kindName;

  switch (upper) {
    case 'MERMAID':
      return { kind: 'mermaid', mode: 'MERMAID', diagrams: rows.map(mermaidOf) };
    case 'DICT':
    case 'JSON':
      return { kind: 'json', mode: upper, data: rows.map(rowToRecord) };
    case 'LIST':
      return { kind: 'text', mode: upper, content: renderMarkdownTable(rows, columns, kind, context.searchString) };
    case 'TABLE':
      return { kind: 'text', mode: upper, content: renderTable(rows, columns, context.width) };
    default: {
      const preamble = makePreamble(kind, upper, context.searchString, context.now ?? new Date());
      return { kind: 'text', mode: upper, content: preamble + renderEntityMarkdown(rows, upper, kind) };
    }
  }
}
