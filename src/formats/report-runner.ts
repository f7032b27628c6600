/**
 * Report Runner
 *
 * Runs a format set's action against the platform and shapes the result
 * for the requested mode. Actions are declared as `Class.method` names and
 * dispatched through ACTIONS; adding a new action means adding a row there.
 */

import { EgeriaClient } from '../api/client';
import { ReportSpecError } from '../lib/errors';
import { getLogger } from '../lib/logger';
import { EgeriaElement, JsonObject } from '../types';
import { FormatSetRegistry, getRegistry } from './registry';
import { describe, findFormat, supportedModes } from './selector';
import { generateOutput, NO_ELEMENTS_FOUND, OutputResult } from './output';
import { ProviderRegistry } from './providers';

export type ReportParams = Record<string, unknown>;

export type ReportResult =
  | { kind: 'empty'; message: string }
  | { kind: 'json'; data: unknown[] }
  | { kind: 'text'; mime: 'text/markdown' | 'text/plain'; content: string };

export interface RunReportOptions {
  /** Output mode, DICT by default */
  mode?: string;
  params?: ReportParams;
  registry?: FormatSetRegistry;
  providers?: ProviderRegistry;
  now?: Date;
  width?: number;
}

type ActionHandler = (client: EgeriaClient, params: ReportParams) => Promise<OutputResult>;

// ========== Parameter readers ==========

function str(params: ReportParams, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  return String(value);
}

function num(params: ReportParams, key: string): number | undefined {
  const value = params[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return undefined;
}

function bool(params: ReportParams, key: string): boolean | undefined {
  const value = params[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
  }
  return undefined;
}

function list(params: ReportParams, key: string): string[] | undefined {
  const value = params[key];
  if (Array.isArray(value)) return value.map(String);
  if (typeof value === 'string') {
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
  }
  return undefined;
}

function required(params: ReportParams, key: string): string {
  const value = str(params, key);
  if (value === undefined) {
    throw new ReportSpecError(`Missing parameter '${key}'`, { parameter: key });
  }
  return value;
}

/** snake_case report parameters to client search options; raw elements only */
function searchOptions(params: ReportParams) {
  return {
    outputFormat: 'JSON',
    startsWith: bool(params, 'starts_with'),
    endsWith: bool(params, 'ends_with'),
    ignoreCase: bool(params, 'ignore_case'),
    startFrom: num(params, 'start_from'),
    pageSize: num(params, 'page_size'),
    metadataElementTypeName: str(params, 'metadata_element_type_name'),
    metadataElementSubtypeNames: list(params, 'metadata_element_subtypes'),
    includeOnlyClassifiedElements: list(params, 'include_only_classified_elements'),
    asOfTime: str(params, 'as_of_time'),
    effectiveTime: str(params, 'effective_time'),
  };
}

function pagingOptions(params: ReportParams) {
  return {
    outputFormat: 'JSON',
    startFrom: num(params, 'start_from'),
    pageSize: num(params, 'page_size'),
    asOfTime: str(params, 'as_of_time'),
    effectiveTime: str(params, 'effective_time'),
  };
}

function searchString(params: ReportParams): string {
  return str(params, 'search_string') ?? '*';
}

// ========== Action table ==========

export const ACTIONS: Readonly<Record<string, ActionHandler>> = {
  'ClassificationManager.get_elements_by_property_value': (client, params) =>
    client.getElementsByPropertyValue(
      required(params, 'property_value'),
      list(params, 'property_names') ?? ['displayName', 'qualifiedName'],
      { ...pagingOptions(params), metadataElementTypeName: str(params, 'metadata_element_type_name') }
    ),
  'ActorManager.find_actor_profiles': (client, params) =>
    client.findActorProfiles(searchString(params), searchOptions(params)),
  'AutomatedCuration.find_technology_types': (client, params) =>
    client.findTechnologyTypes(searchString(params), searchOptions(params)),
  'ExternalReference.find_external_references': (client, params) =>
    client.findExternalReferences(searchString(params), searchOptions(params)),
  'ProjectManager.find_projects': (client, params) =>
    client.findProjects(searchString(params), searchOptions(params)),
  'GlossaryManager.find_glossaries': (client, params) =>
    client.findGlossaries(searchString(params), searchOptions(params)),
  'GlossaryManager.find_glossary_terms': (client, params) =>
    client.findGlossaryTerms(searchString(params), searchOptions(params)),
  'CollectionManager.find_collections': (client, params) =>
    client.findCollections(searchString(params), searchOptions(params)),
  'CollectionManager.get_collection_members': (client, params) =>
    client.getCollectionMembers(required(params, 'collection_guid'), pagingOptions(params)),
  'GovernanceOfficer.find_governance_definitions': (client, params) =>
    client.findGovernanceDefinitions(searchString(params), searchOptions(params)),
};

export function supportedActions(): string[] {
  return Object.keys(ACTIONS).sort();
}

// ========== Runner ==========

/**
 * Required and optional params that were given, then the set's own
 * spec_params on top
 */
export function buildCallParams(
  reportName: string,
  action: { required_params: string[]; optional_params: string[]; spec_params: JsonObject },
  params: ReportParams
): ReportParams {
  const callParams: ReportParams = {};
  for (const key of action.required_params) {
    const value = params[key];
    if (value !== undefined && value !== null) {
      callParams[key] = value;
    } else if (!(key in action.spec_params)) {
      getLogger().warn(`Required parameter '${key}' not provided for format set '${reportName}'.`);
    }
  }
  for (const key of action.optional_params) {
    const value = params[key];
    if (value !== undefined && value !== null) callParams[key] = value;
  }
  return { ...callParams, ...action.spec_params };
}

export async function runReport(
  client: EgeriaClient,
  reportName: string,
  options: RunReportOptions = {}
): Promise<ReportResult> {
  const registry = options.registry ?? getRegistry();
  const described = describe(registry, reportName);
  if (!described) {
    throw new ReportSpecError(`Unknown report spec '${reportName}'`, { reportName });
  }
  const { name, formatSet } = described;

  const mode = (options.mode ?? 'DICT').toUpperCase();
  const selectionMode = mode === 'JSON' ? 'DICT' : mode;
  if (!findFormat(formatSet, selectionMode)) {
    throw new ReportSpecError(
      `Output format '${mode}' is not supported by report spec '${name}'. ` +
        `Available formats: ${supportedModes(formatSet).join(', ')}`,
      { reportName: name, mode }
    );
  }

  const action = formatSet.action;
  if (!action) {
    throw new ReportSpecError(`Output format set '${name}' does not have an action property.`, { reportName: name });
  }
  const handler = ACTIONS[action.function];
  if (!handler) {
    throw new ReportSpecError(`Action '${action.function}' of report spec '${name}' is not supported`, {
      reportName: name,
      action: action.function,
    });
  }

  const callParams = buildCallParams(name, action, options.params ?? {});
  getLogger().debug(`Running report '${name}' as ${mode}`, { action: action.function });

  const result = await handler(client, callParams);
  const elements: EgeriaElement[] = result.kind === 'raw' ? result.elements : [];
  if (elements.length === 0) {
    return { kind: 'empty', message: NO_ELEMENTS_FOUND };
  }
  if (mode === 'JSON') {
    return { kind: 'json', data: elements };
  }

  const output = generateOutput({
    registry,
    providers: options.providers,
    elements,
    mode,
    formatSet: name,
    searchString: str(callParams, 'search_string'),
    now: options.now,
    width: options.width,
  });

  switch (output.kind) {
    case 'json':
      return { kind: 'json', data: output.data };
    case 'mermaid':
      return { kind: 'text', mime: 'text/markdown', content: output.diagrams.join('\n\n') };
    case 'text': {
      if (mode === 'TABLE') {
        return { kind: 'text', mime: 'text/plain', content: output.content };
      }
      const preamble = formatSet.heading && formatSet.description
        ? `# ${formatSet.heading}\n${formatSet.description}\n\n`
        : '';
      const content = output.content.startsWith('#') ? output.content : preamble + output.content;
      return { kind: 'text', mime: 'text/markdown', content };
    }
    case 'empty':
      return { kind: 'empty', message: output.message };
    case 'error':
      throw new ReportSpecError(output.message, { reportName: name, mode });
    case 'raw':
      return { kind: 'json', data: output.elements };
  }
}
