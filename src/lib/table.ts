/**
 * Table Utility for CLI Output
 *
 * Column widths are distributed across the terminal: fixed columns first,
 * then auto-fit columns, then the remainder shared by flex columns in
 * proportion to their priority. Padding measures visible width, so
 * colored and wide characters line up.
 */

import stringWidth from 'string-width';
import * as colors from '../cli/colors';
import { separator } from '../cli/colors';

/**
 * Column width strategy
 * - number: fixed width in characters
 * - 'auto': fit to content
 * - 'flex': flexible, shares remaining space
 */
export type ColumnWidth = number | 'auto' | 'flex';

export type ColumnAlign = 'left' | 'right' | 'center';

/**
 * Semantic column types for consistent formatting
 */
export type ColumnType =
  | 'text'           // Plain text with default color
  | 'name'           // Display or qualified name
  | 'guid'           // Element GUID
  | 'type'           // Open metadata type name
  | 'status'         // Element status
  | 'timestamp'      // Date/time (dimmed)
  | 'count'          // Numeric count
  | 'value';         // Generic value

export interface TableColumn<T> {
  header: string;

  /** Field accessor - key name or function */
  field: keyof T | ((row: T) => unknown);

  /** Semantic type for formatting (applied after truncation) */
  type?: ColumnType;

  /** Column width strategy (default: flex) */
  width?: ColumnWidth;

  minWidth?: number;

  /** Maximum column width (for flex and auto columns) */
  maxWidth?: number;

  /** Priority for flex space distribution (higher = more space, default: 1) */
  priority?: number;

  align?: ColumnAlign;

  /** Custom formatter; returns the RAW string, styling is applied after */
  customFormat?: (value: unknown, row: T) => string;

  /** Truncate with ellipsis if exceeds width (default: true) */
  truncate?: boolean;
}

export interface TableConfig<T> {
  columns: TableColumn<T>[];

  /** Spacing between columns (default: 2) */
  spacing?: number;

  showHeader?: boolean;

  showSeparator?: boolean;

  /** Terminal width (auto-detected if not provided) */
  terminalWidth?: number;

  /** Message when there are no rows (default: 'No data') */
  emptyMessage?: string;
}

/**
 * Type formatters - apply color/style to raw truncated strings
 */
const typeFormatters: Record<ColumnType, (value: string, rawValue: unknown) => string> = {
  text: (v) => v,
  name: (v) => colors.element.name(v),
  guid: (v) => colors.element.guid(v),
  type: (v) => colors.element.type(v),
  status: (v) => {
    switch (v.toUpperCase()) {
      case 'ACTIVE': return colors.status.success(v);
      case 'DRAFT':
      case 'PROPOSED': return colors.status.warning(v);
      case 'DELETED':
      case 'DEPRECATED': return colors.status.error(v);
      default: return colors.status.dim(v);
    }
  },
  timestamp: (v, raw) => {
    if (v === '') return v;
    // Parse the untruncated value
    const d = new Date(typeof raw === 'string' || typeof raw === 'number' ? raw : v);
    if (isNaN(d.getTime())) {
      return colors.status.dim(v);
    }
    return colors.status.dim(d.toLocaleString('en-US', {
      year: 'numeric',
      month: 'short',
      day: 'numeric',
      hour: '2-digit',
      minute: '2-digit'
    }));
  },
  count: (v) => {
    const n = parseInt(v, 10);
    return isNaN(n) ? v : colors.coloredCount(n);
  },
  value: (v) => colors.ui.value(v)
};

export class Table<T> {
  private config: Required<TableConfig<T>>;

  constructor(config: TableConfig<T>) {
    this.config = {
      spacing: 2,
      showHeader: true,
      showSeparator: true,
      terminalWidth: process.stdout.columns || 120,
      emptyMessage: 'No data',
      ...config
    };
  }

  /**
   * Render table to string array (one line per array element)
   */
  render(data: T[]): string[] {
    if (data.length === 0) {
      return [colors.status.dim(`\n${this.config.emptyMessage}\n`)];
    }

    const lines: string[] = [];
    const columnWidths = this.calculateColumnWidths(data);
    const columnSpacing = ' '.repeat(this.config.spacing);
    const sepWidth = Math.max(10, this.config.terminalWidth - 4);

    if (this.config.showHeader) {
      if (this.config.showSeparator) {
        lines.push('\n' + separator(sepWidth));
      }

      const headerRow = this.config.columns.map((col, i) =>
        this.padCell(colors.ui.header(this.fit(col.header, columnWidths[i])), columnWidths[i], col.align || 'left')
      ).join(columnSpacing);

      lines.push(headerRow);

      if (this.config.showSeparator) {
        lines.push(separator(sepWidth));
      }
    }

    for (const row of data) {
      const cells = this.config.columns.map((col, i) => {
        const rawValue = this.getCellValue(row, col);

        // 1. raw string
        let stringValue = this.toText(rawValue, row, col);

        // 2. truncate plain text
        if (col.truncate !== false) {
          stringValue = this.fit(stringValue, columnWidths[i]);
        }

        // 3. style
        const formatted = col.type
          ? typeFormatters[col.type](stringValue, rawValue)
          : stringValue;

        // 4. pad to visible width
        return this.padCell(formatted, columnWidths[i], col.align || 'left');
      });

      lines.push(cells.join(columnSpacing).trimEnd());
    }

    if (this.config.showSeparator) {
      lines.push(separator(sepWidth));
      lines.push(colors.status.dim(`\nShowing ${data.length} row(s)\n`));
    }

    return lines;
  }

  /**
   * Print table directly to console
   */
  print(data: T[]): void {
    console.log(this.render(data).join('\n'));
  }

  private getCellValue(row: T, col: TableColumn<T>): unknown {
    if (typeof col.field === 'function') {
      return col.field(row);
    }
    return row[col.field];
  }

  private toText(rawValue: unknown, row: T, col: TableColumn<T>): string {
    if (col.customFormat) {
      return col.customFormat(rawValue, row);
    }
    return rawValue === undefined || rawValue === null ? '' : String(rawValue);
  }

  private fit(text: string, width: number): string {
    const flat = text.replace(/\s*\n\s*/g, ' ');
    if (stringWidth(flat) <= width) return flat;
    if (width <= 3) return flat.substring(0, width);
    return flat.substring(0, width - 3) + '...';
  }

  /**
   * Calculate column widths based on data and terminal size
   */
  private calculateColumnWidths(data: T[]): number[] {
    const { columns, spacing, terminalWidth } = this.config;

    const fixedWidths: (number | null)[] = columns.map(col =>
      typeof col.width === 'number' ? col.width : null
    );

    const autoWidths: (number | null)[] = columns.map(col => {
      if (col.width !== 'auto') return null;
      const maxContentWidth = Math.max(
        stringWidth(col.header),
        ...data.map(row => stringWidth(this.toText(this.getCellValue(row, col), row, col)))
      );
      return Math.min(col.maxWidth || Infinity, Math.max(col.minWidth || 0, maxContentWidth));
    });

    const totalSpacing = spacing * (columns.length - 1);
    const usedWidth = fixedWidths.reduce((sum: number, w) => sum + (w || 0), 0) +
                      autoWidths.reduce((sum: number, w) => sum + (w || 0), 0) +
                      totalSpacing + 4; // margins

    const remainingWidth = Math.max(0, terminalWidth - usedWidth);

    const flexColumns = columns
      .map((col, i) => ({ col, i }))
      .filter(({ col }) => col.width === 'flex' || col.width === undefined);

    if (flexColumns.length === 0) {
      return columns.map((_, i) => fixedWidths[i] ?? autoWidths[i] ?? 10);
    }

    const totalPriority = flexColumns.reduce((sum, { col }) => sum + (col.priority || 1), 0);

    const flexWidths: number[] = columns.map(() => 0);
    flexColumns.forEach(({ col, i }) => {
      const share = Math.floor((remainingWidth * (col.priority || 1)) / totalPriority);
      flexWidths[i] = Math.min(col.maxWidth || Infinity, Math.max(col.minWidth || 0, share));
    });

    return columns.map((_, i) => fixedWidths[i] ?? autoWidths[i] ?? flexWidths[i]);
  }

  private padCell(text: string, width: number, align: ColumnAlign): string {
    const padding = Math.max(0, width - stringWidth(text));

    switch (align) {
      case 'right':
        return ' '.repeat(padding) + text;
      case 'center': {
        const leftPad = Math.floor(padding / 2);
        return ' '.repeat(leftPad) + text + ' '.repeat(padding - leftPad);
      }
      case 'left':
      default:
        return text + ' '.repeat(padding);
    }
  }
}
