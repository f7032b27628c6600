/**
 * Table utility tests
 */

import ansis from 'ansis';
import { Table } from '../../src/lib/table';

interface Row {
  name: string;
  count: number;
}

function plain(lines: string[]): string[] {
  return lines.map(line => ansis.strip(line));
}

describe('Table', () => {
  it('should render header, separators, rows and a footer', () => {
    const table = new Table<Row>({
      terminalWidth: 40,
      columns: [
        { header: 'Name', field: 'name', width: 8 },
        { header: 'Count', field: 'count', width: 5, align: 'right' },
      ],
    });

    expect(plain(table.render([{ name: 'alpha', count: 3 }]))).toEqual([
      '\n' + '─'.repeat(36),
      'Name' + ' '.repeat(6) + 'Count',
      '─'.repeat(36),
      'alpha' + ' '.repeat(9) + '3',
      '─'.repeat(36),
      '\nShowing 1 row(s)\n',
    ]);
  });

  it('should truncate long values with an ellipsis and flatten newlines', () => {
    const table = new Table<Row>({
      terminalWidth: 40,
      showSeparator: false,
      columns: [
        { header: 'Name', field: 'name', width: 8 },
        { header: 'Count', field: row => `${row.count}\n items`, width: 10 },
      ],
    });

    expect(plain(table.render([{ name: 'abcdefghijkl', count: 2 }]))).toEqual([
      'Name' + ' '.repeat(6) + 'Count' + ' '.repeat(5),
      'abcde...  2 items',
    ]);
  });

  it('should share remaining width between flex columns by priority', () => {
    const table = new Table<Row>({
      terminalWidth: 46,
      showSeparator: false,
      columns: [
        { header: 'A', field: 'name', priority: 1 },
        { header: 'B', field: 'count', priority: 3 },
      ],
    });

    const header = plain(table.render([{ name: 'x', count: 1 }]))[0];

    expect(header.indexOf('B')).toBe(12);
    expect(header).toHaveLength(42);
  });

  it('should size auto columns to their content', () => {
    const table = new Table<Row>({
      terminalWidth: 80,
      showSeparator: false,
      columns: [
        { header: 'N', field: 'name', width: 'auto' },
        { header: 'Count', field: 'count', width: 'auto' },
      ],
    });

    expect(plain(table.render([{ name: 'gamma', count: 10 }]))).toEqual([
      'N' + ' '.repeat(6) + 'Count',
      'gamma  10',
    ]);
  });

  it('should apply a custom formatter before truncation', () => {
    const table = new Table<Row>({
      terminalWidth: 40,
      showHeader: false,
      showSeparator: false,
      columns: [{ header: 'Count', field: 'count', width: 6, customFormat: v => `#${String(v)}` }],
    });

    expect(plain(table.render([{ name: 'a', count: 7 }]))).toEqual(['#7']);
  });

  it('should show the empty message when there are no rows', () => {
    const table = new Table<Row>({ columns: [{ header: 'Name', field: 'name' }], emptyMessage: 'Nothing here' });

    expect(plain(table.render([]))).toEqual(['\nNothing here\n']);
  });
});
