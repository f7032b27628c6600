/**
 * Types shared by the REST client, the format-set machinery and the CLI
 */

import type { AxiosInstance } from 'axios';
import type { FormatSetRegistry } from '../formats/registry';
import type { ProviderRegistry } from '../formats/providers';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ========== Entity elements (as returned by the view services) ==========

/**
 * One element returned by a find/get call. Only the parts the projector
 * reads are typed; everything else stays `unknown` and is narrowed on use.
 */
export interface EgeriaElement {
  elementHeader?: ElementHeader;
  properties?: JsonObject;
  [key: string]: unknown;
}

export interface ElementHeader {
  guid?: string;
  type?: { typeName?: string; [key: string]: unknown };
  versions?: ElementVersions;
  origin?: ElementOrigin;
  classifications?: unknown;
  subjectArea?: unknown;
  collectionCategories?: unknown;
  [key: string]: unknown;
}

export interface ElementVersions {
  createdBy?: string;
  updatedBy?: string;
  createTime?: string;
  updateTime?: string;
  version?: number;
}

export interface ElementOrigin {
  homeMetadataCollectionId?: string;
  homeMetadataCollectionName?: string;
}

/**
 * Shallow shape check; nested fields are still narrowed where read
 */
export function isEgeriaElement(value: unknown): value is EgeriaElement {
  if (!isRecord(value)) return false;
  const { elementHeader, properties } = value;
  return (elementHeader === undefined || isRecord(elementHeader)) &&
    (properties === undefined || isRecord(properties));
}

export function toElements(value: unknown): EgeriaElement[] {
  if (Array.isArray(value)) return value.filter(isEgeriaElement);
  return isEgeriaElement(value) ? [value] : [];
}

// ========== Client configuration ==========

export interface ClientConfig {
  /** Platform root, e.g. https://localhost:9443 */
  platformUrl: string;
  viewServer: string;
  userId: string;
  userPassword?: string;
  timeoutSeconds?: number;
  /** Reject self-signed platform certificates (default true) */
  verifySsl?: boolean;
  /** Pre-built axios instance (tests inject one with a custom adapter) */
  httpClient?: AxiosInstance;
  /** Format sets used for non-JSON output; the process-wide registry by default */
  registry?: FormatSetRegistry;
  providers?: ProviderRegistry;
}

// ========== Request bodies ==========

export interface SearchStringRequestBody {
  class: 'SearchStringRequestBody';
  searchString: string | null;
  startsWith?: boolean;
  endsWith?: boolean;
  ignoreCase?: boolean;
  startFrom?: number;
  pageSize?: number;
  metadataElementTypeName?: string;
  metadataElementSubtypeNames?: string[];
  includeOnlyClassifiedElements?: string[];
  asOfTime?: string;
  effectiveTime?: string;
}

export interface FilterRequestBody {
  class: 'FilterRequestBody';
  filter: string;
  startFrom?: number;
  pageSize?: number;
  metadataElementTypeName?: string;
  asOfTime?: string;
  effectiveTime?: string;
}

export interface ResultsRequestBody {
  class: 'ResultsRequestBody';
  startFrom?: number;
  pageSize?: number;
  asOfTime?: string;
  effectiveTime?: string;
}

export interface FindPropertyNamesProperties {
  class: 'FindPropertyNamesProperties';
  propertyValue: string;
  propertyNames: string[];
  metadataElementTypeName?: string;
  startFrom?: number;
  pageSize?: number;
  asOfTime?: string;
  effectiveTime?: string;
}

export interface EffectiveTimeQueryRequestBody {
  class: 'EffectiveTimeQueryRequestBody';
  effectiveTime?: string;
}

export interface GetRequestBody {
  class: 'GetRequestBody';
  asOfTime?: string;
  effectiveTime?: string;
}

// ========== Call options ==========

export interface SearchOptions {
  startsWith?: boolean;
  endsWith?: boolean;
  ignoreCase?: boolean;
  startFrom?: number;
  pageSize?: number;
  metadataElementTypeName?: string;
  metadataElementSubtypeNames?: string[];
  /** Classification names an element must carry */
  includeOnlyClassifiedElements?: string[];
  asOfTime?: string;
  effectiveTime?: string;
}

export interface PagingOptions {
  startFrom?: number;
  pageSize?: number;
  asOfTime?: string;
  effectiveTime?: string;
}

export interface OutputOptions {
  /** Output mode; JSON (default) returns raw elements */
  outputFormat?: string;
  /** Format set name that overrides the kind's own */
  reportSpec?: string;
}
