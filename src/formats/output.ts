/**
 * Output Generator
 *
 * Select, project and render in one call. This is what every client
 * method that takes an output mode goes through.
 */

import { EgeriaElement } from '../types';
import { formatValue } from './values';
import { FormatSetRegistry } from './registry';
import { select } from './selector';
import { projectElements } from './projector';
import { createDefaultProviders, ProviderRegistry } from './providers';
import { MISSING_MERMAID, render, RenderResult } from './renderer';

export const DEFAULT_KIND = 'Referenceable';

export const NO_ELEMENTS_FOUND = 'No elements found';

export type OutputResult =
  | { kind: 'raw'; elements: EgeriaElement[] }
  | RenderResult
  | { kind: 'empty'; message: string }
  | { kind: 'error'; message: string };

export interface GenerateOutputRequest {
  registry: FormatSetRegistry;
  elements: EgeriaElement[];
  mode: string;
  /** Kind of the returned elements; defaults to Referenceable */
  kindName?: string;
  /** Format set name that takes precedence over kindName */
  formatSet?: string;
  /** Label used in headings; defaults to the kind name */
  displayKind?: string;
  searchString?: string;
  providers?: ProviderRegistry;
  now?: Date;
  width?: number;
}

/**
 * The server-generated diagram of an element, or the placeholder
 */
export function elementMermaid(element: EgeriaElement): string {
  return formatValue(element.mermaidGraph) || MISSING_MERMAID;
}

export function generateOutput(request: GenerateOutputRequest): OutputResult {
  const mode = request.mode.toUpperCase();
  if (mode === 'JSON') {
    return { kind: 'raw', elements: request.elements };
  }

  const kindName = request.formatSet || request.kindName || DEFAULT_KIND;
  const selection = select(request.registry, kindName, mode);
  if (!selection.ok) {
    return { kind: 'error', message: selection.message };
  }

  // Diagrams come from the raw elements whatever the Format's columns
  if (mode === 'MERMAID') {
    return { kind: 'mermaid', mode: 'MERMAID', diagrams: request.elements.map(elementMermaid) };
  }

  const providers = request.providers ?? createDefaultProviders();
  const reference = selection.formatSet.get_additional_props?.function;
  const provider = reference ? providers.resolve(reference) : undefined;

  const rows = projectElements(request.elements, selection.format, { provider, mode });
  return render(rows, mode, selection.format.columns, {
    kindName: request.displayKind || request.kindName || selection.formatSet.target_type || kindName,
    searchString: request.searchString,
    now: request.now,
    width: request.width,
  });
}
