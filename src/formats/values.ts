/**
 * Value helpers shared by the projector and the providers
 */

import { isRecord } from '../types';

export function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

export function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

/**
 * Display string for any JSON value. Missing values become ''.
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).filter(v => v !== '').join(', ');
  }
  if (isRecord(value)) {
    return Object.entries(value)
      .map(([k, v]) => `${k}=${formatValue(v)}`)
      .join(', ');
  }
  return String(value);
}

/**
 * Label for one relationship item: the related element's qualified name,
 * else its display name, else its guid
 */
function relatedLabel(item: unknown): string {
  if (!isRecord(item)) return '';
  const related = item.relatedElement;
  if (!isRecord(related)) return '';

  const props = related.properties;
  if (isRecord(props)) {
    if (typeof props.qualifiedName === 'string' && props.qualifiedName) return props.qualifiedName;
    if (typeof props.displayName === 'string' && props.displayName) return props.displayName;
  }
  const header = related.elementHeader;
  if (isRecord(header) && typeof header.guid === 'string') return header.guid;
  return '';
}

/**
 * Join the labels of a relationship list with ", "
 */
export function rollUpRelated(items: unknown[]): string {
  return items.map(relatedLabel).filter(label => label !== '').join(', ');
}
