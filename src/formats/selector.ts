/**
 * Format Set Selector
 *
 * Resolves (kind name, output mode) to one concrete Format.
 */

import { Format, FormatSet, WILDCARD_MODE } from './schema';
import { DEFAULT_SET_NAME, FormatSetRegistry } from './registry';

export type SelectionFailureReason = 'unknown-kind' | 'unsupported-mode';

export interface SelectionSuccess {
  ok: true;
  /** Name the caller asked for */
  kindName: string;
  /** Registry key that answered (differs on alias or fallback) */
  resolvedName: string;
  formatSet: FormatSet;
  format: Format;
  mode: string;
  usedFallback: boolean;
}

export interface SelectionFailure {
  ok: false;
  reason: SelectionFailureReason;
  message: string;
}

export type SelectionResult = SelectionSuccess | SelectionFailure;

export interface DescribeResult {
  name: string;
  formatSet: FormatSet;
}

export function noMatchMessage(kindName: string, mode: string): string {
  return `No matching column set found for kind='${kindName}' and output type='${mode}'.`;
}

/**
 * First Format whose types contain the mode or the wildcard
 */
export function findFormat(formatSet: FormatSet, mode: string): Format | undefined {
  const wanted = mode.toUpperCase();
  return formatSet.formats.find(f => f.types.includes(wanted) || f.types.includes(WILDCARD_MODE));
}

/**
 * Pick the Format to render `kindName` in `mode`. Unknown kinds fall back
 * to the "Default" set. Never throws.
 */
export function select(registry: FormatSetRegistry, kindName: string, outputMode: string): SelectionResult {
  const mode = outputMode.toUpperCase();

  let resolvedName = registry.resolveName(kindName);
  let usedFallback = false;
  if (resolvedName === undefined && registry.has(DEFAULT_SET_NAME)) {
    resolvedName = DEFAULT_SET_NAME;
    usedFallback = true;
  }

  const formatSet = resolvedName === undefined ? undefined : registry.lookup(resolvedName);
  if (resolvedName === undefined || formatSet === undefined) {
    return { ok: false, reason: 'unknown-kind', message: noMatchMessage(kindName, mode) };
  }

  const format = findFormat(formatSet, mode);
  if (!format) {
    return { ok: false, reason: 'unsupported-mode', message: noMatchMessage(kindName, mode) };
  }

  return { ok: true, kindName, resolvedName, formatSet, format, mode, usedFallback };
}

/**
 * Discovery lookup: the set itself, no Format and no Default fallback
 */
export function describe(registry: FormatSetRegistry, name: string): DescribeResult | undefined {
  const resolved = registry.resolveName(name);
  const formatSet = resolved === undefined ? undefined : registry.lookup(resolved);
  if (resolved === undefined || formatSet === undefined) return undefined;
  return { name: resolved, formatSet };
}

/**
 * Distinct output types a set declares, sorted
 */
export function supportedModes(formatSet: FormatSet): string[] {
  return [...new Set(formatSet.formats.flatMap(f => f.types))].sort();
}
