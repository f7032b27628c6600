/**
 * TABLE mode: projected rows as a colored terminal table
 */

import { ColumnType, Table, TableColumn } from '../lib/table';
import { ProjectedRow } from './projector';

function columnType(key: string): ColumnType {
  const k = key.toLowerCase();
  if (k === 'guid') return 'guid';
  if (k === 'display_name' || k === 'qualified_name') return 'name';
  if (k === 'type_name') return 'type';
  if (k === 'status') return 'status';
  if (k.endsWith('_time')) return 'timestamp';
  return 'text';
}

export function renderTable(
  rows: ProjectedRow[],
  columns: { name: string; key: string; format: boolean }[],
  width?: number
): string {
  const tableColumns: TableColumn<ProjectedRow>[] = columns.map((column, index) => ({
    header: column.name,
    field: (row: ProjectedRow) => row[index]?.value ?? '',
    type: columnType(column.key),
    width: column.key.toLowerCase() === 'guid' ? 36 : 'flex',
    minWidth: Math.min(column.name.length, 12),
    priority: column.format ? 2 : 1,
  }));

  const table = new Table<ProjectedRow>({
    columns: tableColumns,
    emptyMessage: 'No elements found',
    ...(width !== undefined ? { terminalWidth: width } : {}),
  });
  return table.render(rows).join('\n');
}
