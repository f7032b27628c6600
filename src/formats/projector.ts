/**
 * Column Projector
 *
 * Turns one raw element plus a Format into ordered (column, value) pairs.
 * Every column of the Format appears in the result, in declaration order;
 * values that can't be found are ''.
 *
 * Resolution order for a column key:
 *   1. header fields, for the reserved keys below
 *   2. properties (raw key, or its snake_case form)
 *   3. derived fields (subject_area, mermaid)
 *   4. top-level element fields; relationship lists are rolled up
 *   5. the format set's additional-properties provider
 */

import { EgeriaElement, isRecord } from '../types';
import { Format } from './schema';
import { AdditionalPropsProvider } from './providers';
import { formatValue, rollUpRelated, toCamelCase, toSnakeCase } from './values';

export interface ProjectedColumn {
  name: string;
  key: string;
  value: string;
  format: boolean;
}

export type ProjectedRow = ProjectedColumn[];

export interface ProjectOptions {
  provider?: AdditionalPropsProvider;
  mode?: string;
}

/** Keys where the element header takes precedence over properties */
export const HEADER_KEYS: readonly string[] = [
  'guid',
  'GUID',
  'type_name',
  'created_by',
  'create_time',
  'updated_by',
  'update_time',
  'version',
  'metadata_collection_id',
  'metadata_collection_name',
  'classifications',
];

function classificationNames(list: unknown): string[] {
  if (!Array.isArray(list)) return [];
  return list
    .map(c => (isRecord(c) && typeof c.classificationName === 'string' ? c.classificationName : ''))
    .filter(name => name !== '');
}

/**
 * Header-derived values, keyed by column key. Only present values appear.
 */
export function headerValues(element: EgeriaElement): Map<string, string> {
  const values = new Map<string, string>();
  const header = element.elementHeader;
  if (!isRecord(header)) return values;

  const put = (key: string, value: unknown) => {
    const text = formatValue(value);
    if (text !== '') values.set(key, text);
  };

  put('guid', header.guid);
  put('GUID', header.guid);
  put('type_name', isRecord(header.type) ? header.type.typeName : undefined);

  const versions = header.versions;
  if (isRecord(versions)) {
    put('created_by', versions.createdBy);
    put('create_time', versions.createTime);
    put('updated_by', versions.updatedBy);
    put('update_time', versions.updateTime);
    put('version', versions.version);
  }

  const origin = header.origin;
  if (isRecord(origin)) {
    put('metadata_collection_id', origin.homeMetadataCollectionId);
    put('metadata_collection_name', origin.homeMetadataCollectionName);
  }

  const names = [
    ...classificationNames(header.classifications),
    ...classificationNames(header.collectionCategories),
  ];
  put('classifications', [...new Set(names)]);

  return values;
}

/**
 * Properties keyed both by their own name and by its snake_case form.
 * A literal key beats a converted one when both exist.
 */
export function flattenProperties(element: EgeriaElement): Map<string, unknown> {
  const flat = new Map<string, unknown>();
  const props = element.properties;
  if (!isRecord(props)) return flat;

  for (const [key, value] of Object.entries(props)) {
    flat.set(toSnakeCase(key), value);
  }
  for (const [key, value] of Object.entries(props)) {
    flat.set(key, value);
  }
  return flat;
}

function derivedValue(element: EgeriaElement, key: string): string | undefined {
  if (key === 'subject_area') {
    const subjectArea = element.elementHeader?.subjectArea;
    if (isRecord(subjectArea) && isRecord(subjectArea.classificationProperties)) {
      return formatValue(subjectArea.classificationProperties.subjectAreaName);
    }
    return undefined;
  }
  if (key === 'mermaid') {
    return formatValue(element.mermaidGraph);
  }
  return undefined;
}

function topLevelValue(element: EgeriaElement, key: string): string | undefined {
  for (const field of [key, toCamelCase(key)]) {
    if (field === 'elementHeader' || field === 'properties') continue;
    const value = element[field];
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      const rolled = rollUpRelated(value);
      return rolled !== '' ? rolled : formatValue(value);
    }
    return formatValue(value);
  }
  return undefined;
}

/**
 * Project one element through a Format
 */
export function projectElement(element: EgeriaElement, format: Format, options: ProjectOptions = {}): ProjectedRow {
  const header = headerValues(element);
  const props = flattenProperties(element);
  let extra: Record<string, string> | undefined;

  return format.columns.map(column => {
    const { key } = column;
    let value: string | undefined;

    if (HEADER_KEYS.includes(key) || key.toLowerCase() === 'guid') {
      value = header.get(key) ?? header.get(key.toLowerCase());
    }
    if (value === undefined && props.has(key)) {
      const text = formatValue(props.get(key));
      if (text !== '') value = text;
    }
    if (value === undefined) {
      value = derivedValue(element, key);
    }
    if (value === undefined || value === '') {
      value = topLevelValue(element, key) ?? value;
    }
    if ((value === undefined || value === '') && options.provider) {
      if (!extra) extra = options.provider.extract(element, options.mode ?? 'DICT');
      value = extra[key] ?? value;
    }

    return { name: column.name, key, value: value ?? '', format: column.format };
  });
}

export function projectElements(
  elements: EgeriaElement[],
  format: Format,
  options: ProjectOptions = {}
): ProjectedRow[] {
  return elements.map(element => projectElement(element, format, options));
}

/**
 * Column name → value mapping. A later column with the same name wins.
 */
export function rowToRecord(row: ProjectedRow): Record<string, string> {
  const record: Record<string, string> = {};
  for (const column of row) {
    record[column.name] = column.value;
  }
  return record;
}

/**
 * Value of the first column with this key, or ''
 */
export function rowValue(row: ProjectedRow, key: string): string {
  return row.find(c => c.key === key)?.value ?? '';
}
