/**
 * Egeria REST Client
 *
 * Wraps the view-service endpoints of an Egeria platform. Requests are
 * JSON POSTs to
 *
 *   {platform}/servers/{viewServer}/api/open-metadata/{service}/...
 *
 * authenticated with a bearer token from {platform}/api/token. A body
 * whose relatedHTTPCode is not 200 is a failure even on HTTP 200.
 */

import axios, { AxiosInstance } from 'axios';
import * as https from 'https';
import {
  ClientConfig,
  EffectiveTimeQueryRequestBody,
  EgeriaElement,
  FilterRequestBody,
  FindPropertyNamesProperties,
  GetRequestBody,
  isRecord,
  JsonObject,
  OutputOptions,
  PagingOptions,
  ResultsRequestBody,
  SearchOptions,
  SearchStringRequestBody,
  toElements,
} from '../types';
import {
  EgeriaApiError,
  EgeriaClientError,
  EgeriaConnectionError,
  EgeriaError,
  EgeriaNotFoundError,
  EgeriaUnauthorizedError,
} from '../lib/errors';
import { getConfig } from '../lib/config';
import { getLogger } from '../lib/logger';
import { FormatSetRegistry, getRegistry } from '../formats/registry';
import { ProviderRegistry } from '../formats/providers';
import { generateOutput, NO_ELEMENTS_FOUND, OutputResult } from '../formats/output';

export const DEFAULT_USER_ID = 'erinoverview';

export type FindOptions = SearchOptions & OutputOptions;
export type PagedOutputOptions = PagingOptions & OutputOptions;

/** Format set and heading label used when presenting a family of results */
interface Presentation {
  formatSet: string;
  displayKind: string;
  searchString?: string;
}

/**
 * Drop keys whose value is undefined or null
 */
export function slimBody(body: object): JsonObject {
  return Object.fromEntries(
    Object.entries(body).filter(([, value]) => value !== undefined && value !== null)
  );
}

function searchBody(searchString: string, options: SearchOptions): SearchStringRequestBody {
  return {
    class: 'SearchStringRequestBody',
    searchString: searchString === '*' || searchString === '' ? null : searchString,
    startsWith: options.startsWith,
    endsWith: options.endsWith,
    ignoreCase: options.ignoreCase,
    startFrom: options.startFrom ?? 0,
    pageSize: options.pageSize ?? 0,
    metadataElementTypeName: options.metadataElementTypeName,
    metadataElementSubtypeNames: options.metadataElementSubtypeNames,
    includeOnlyClassifiedElements: options.includeOnlyClassifiedElements,
    asOfTime: options.asOfTime,
    effectiveTime: options.effectiveTime,
  };
}

/**
 * Map an axios failure to the client's error hierarchy
 */
export function toEgeriaError(error: unknown): unknown {
  if (error instanceof EgeriaError || !axios.isAxiosError(error)) {
    return error;
  }

  const url = error.config?.url;
  if (!error.response) {
    return new EgeriaConnectionError(
      `Cannot reach Egeria platform${url ? ` (${url})` : ''}: ${error.message}`,
      { url, code: error.code },
      error
    );
  }

  const status = error.response.status;
  const data: unknown = error.response.data;
  const serverMessage = isRecord(data) && typeof data.exceptionErrorMessage === 'string'
    ? data.exceptionErrorMessage
    : undefined;
  const message = serverMessage ?? `Request failed with status ${status}`;

  if (status === 401 || status === 403) {
    return new EgeriaUnauthorizedError(message, status, { url }, error);
  }
  if (status === 404) {
    return new EgeriaNotFoundError(message, { url }, error);
  }
  return new EgeriaClientError(message, status, { url }, error);
}

export class EgeriaClient {
  private client: AxiosInstance;
  private config: ClientConfig;
  private token: string | null = null;

  constructor(config: ClientConfig) {
    this.config = config;
    this.client = config.httpClient ?? axios.create({
      baseURL: config.platformUrl.replace(/\/+$/, ''),
      timeout: (config.timeoutSeconds ?? 30) * 1000,
      headers: { 'Content-Type': 'application/json' },
      ...(config.verifySsl === false ? { httpsAgent: new https.Agent({ rejectUnauthorized: false }) } : {}),
    });

    this.client.interceptors.request.use((requestConfig) => {
      if (this.token) {
        requestConfig.headers.Authorization = `Bearer ${this.token}`;
      }
      return requestConfig;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(toEgeriaError(error))
    );
  }

  get platformUrl(): string {
    return this.config.platformUrl;
  }

  get viewServer(): string {
    return this.config.viewServer;
  }

  get userId(): string {
    return this.config.userId;
  }

  get verifiesCertificates(): boolean {
    return this.config.verifySsl !== false;
  }

  /** True when a password is configured, so a token can be requested */
  get hasCredentials(): boolean {
    return Boolean(this.config.userPassword);
  }

  // ========== Authentication ==========

  /**
   * Exchange user id and password for a bearer token; later requests
   * carry it
   */
  async createBearerToken(): Promise<string> {
    if (!this.config.userPassword) {
      throw new EgeriaUnauthorizedError('No password configured (set EGERIA_USER_PASSWORD)', 401);
    }
    const response = await this.client.post<string>(
      '/api/token',
      { userId: this.config.userId, password: this.config.userPassword },
      { responseType: 'text' }
    );
    const token = typeof response.data === 'string' ? response.data.trim() : '';
    if (!token) {
      throw new EgeriaUnauthorizedError('Token request returned an empty token', 401);
    }
    this.token = token;
    getLogger().debug(`Bearer token created for ${this.config.userId}`);
    return token;
  }

  setBearerToken(token: string): void {
    this.token = token;
  }

  getToken(): string | null {
    return this.token;
  }

  // ========== Platform ==========

  async getPlatformOrigin(): Promise<string> {
    const response = await this.client.get<string>(
      `/open-metadata/platform-services/users/${encodeURIComponent(this.config.userId)}/server-platform/origin`,
      { responseType: 'text' }
    );
    return String(response.data).trim();
  }

  // ========== Collections ==========

  async findCollections(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('collection-manager', 'collections/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Collections', displayKind: 'Collection', searchString });
  }

  async getCollectionsByName(name: string, options: FindOptions = {}): Promise<OutputResult> {
    const body: FilterRequestBody = {
      class: 'FilterRequestBody',
      filter: name,
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? 0,
      metadataElementTypeName: options.metadataElementTypeName,
      asOfTime: options.asOfTime,
      effectiveTime: options.effectiveTime,
    };
    const elements = await this.findRequest(this.viewUrl('collection-manager', 'collections/by-name'), body);
    return this.present(elements, options, { formatSet: 'Collections', displayKind: 'Collection', searchString: name });
  }

  async getCollectionByGuid(guid: string, options: PagedOutputOptions = {}): Promise<OutputResult> {
    const body: GetRequestBody = {
      class: 'GetRequestBody',
      asOfTime: options.asOfTime,
      effectiveTime: options.effectiveTime,
    };
    const element = await this.getRequest(
      this.viewUrl('collection-manager', `collections/${encodeURIComponent(guid)}/retrieve`),
      body
    );
    return this.present(element ? [element] : [], options, { formatSet: 'Collections', displayKind: 'Collection', searchString: guid });
  }

  async getCollectionMembers(collectionGuid: string, options: PagedOutputOptions = {}): Promise<OutputResult> {
    const body: ResultsRequestBody = {
      class: 'ResultsRequestBody',
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? 0,
      asOfTime: options.asOfTime,
      effectiveTime: options.effectiveTime,
    };
    const elements = await this.findRequest(
      this.viewUrl('collection-manager', `collections/${encodeURIComponent(collectionGuid)}/members`),
      body
    );
    return this.present(elements, options, { formatSet: 'Collection Members', displayKind: 'Member', searchString: collectionGuid });
  }

  async findDigitalProducts(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('collection-manager', 'collections/by-search-string'),
      searchBody(searchString, { ...options, metadataElementSubtypeNames: ['DigitalProduct'] })
    );
    return this.present(elements, options, { formatSet: 'Digital-Products', displayKind: 'Digital Product', searchString });
  }

  async findAgreements(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('collection-manager', 'collections/by-search-string'),
      searchBody(searchString, { ...options, metadataElementSubtypeNames: ['Agreement'] })
    );
    return this.present(elements, options, { formatSet: 'Agreements', displayKind: 'Agreement', searchString });
  }

  // ========== Glossaries ==========

  async findGlossaries(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('glossary-browser', 'glossaries/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Glossaries', displayKind: 'Glossary', searchString });
  }

  async findGlossaryTerms(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('glossary-browser', 'glossaries/terms/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Glossary-Terms', displayKind: 'Term', searchString });
  }

  // ========== Other find services ==========

  async findProjects(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('project-manager', 'projects/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Projects', displayKind: 'Project', searchString });
  }

  async findGovernanceDefinitions(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('governance-officer', 'governance-definitions/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Governance Definitions', displayKind: 'Governance Definition', searchString });
  }

  async findExternalReferences(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('external-references', 'external-references/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'ExternalReference', displayKind: 'External Reference', searchString });
  }

  async findActorProfiles(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('actor-manager', 'actor-profiles/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Actor-Profiles', displayKind: 'Actor Profile', searchString });
  }

  async findTechnologyTypes(searchString = '*', options: FindOptions = {}): Promise<OutputResult> {
    const elements = await this.findRequest(
      this.viewUrl('automated-curation', 'technology-types/by-search-string'),
      searchBody(searchString, options)
    );
    return this.present(elements, options, { formatSet: 'Tech-Types', displayKind: 'Technology Type', searchString });
  }

  // ========== Generic elements ==========

  async getElementsByPropertyValue(
    propertyValue: string,
    propertyNames: string[],
    options: PagedOutputOptions & { metadataElementTypeName?: string } = {}
  ): Promise<OutputResult> {
    const body: FindPropertyNamesProperties = {
      class: 'FindPropertyNamesProperties',
      propertyValue,
      propertyNames,
      metadataElementTypeName: options.metadataElementTypeName,
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? 0,
      asOfTime: options.asOfTime,
      effectiveTime: options.effectiveTime,
    };
    const elements = await this.findRequest(
      this.viewUrl('classification-manager', 'elements/by-exact-property-value'),
      body
    );
    return this.present(elements, options, {
      formatSet: options.metadataElementTypeName ?? 'Referenceable',
      displayKind: options.metadataElementTypeName ?? 'Element',
      searchString: propertyValue,
    });
  }

  /**
   * Any element by GUID. Non-JSON output is formatted with the set that
   * matches the element's own type name.
   */
  async getElementByGuid(guid: string, options: OutputOptions & { effectiveTime?: string } = {}): Promise<OutputResult> {
    const body: EffectiveTimeQueryRequestBody = {
      class: 'EffectiveTimeQueryRequestBody',
      effectiveTime: options.effectiveTime,
    };
    const element = await this.getRequest(
      this.viewUrl('classification-manager', `elements/${encodeURIComponent(guid)}?forLineage=false&forDuplicateProcessing=false`),
      body
    );
    const typeName = element?.elementHeader?.type?.typeName;
    return this.present(element ? [element] : [], options, {
      formatSet: typeName ?? 'Referenceable',
      displayKind: typeName ?? 'Element',
      searchString: guid,
    });
  }

  // ========== Plumbing ==========

  private viewUrl(service: string, path: string): string {
    return `/servers/${encodeURIComponent(this.config.viewServer)}/api/open-metadata/${service}/${path}`;
  }

  private async post(url: string, body: object): Promise<JsonObject> {
    const response = await this.client.post<unknown>(url, slimBody(body));
    return this.unwrap(response.data, url);
  }

  /**
   * Check relatedHTTPCode and return the body
   */
  private unwrap(data: unknown, url: string): JsonObject {
    if (!isRecord(data)) {
      throw new EgeriaApiError(`Unexpected response from ${url}`, 500, { url });
    }
    const related = data.relatedHTTPCode;
    if (typeof related === 'number' && related !== 200) {
      const message = typeof data.exceptionErrorMessage === 'string'
        ? data.exceptionErrorMessage
        : `Request to ${url} failed with relatedHTTPCode ${related}`;
      throw new EgeriaApiError(message, related, {
        url,
        userAction: typeof data.exceptionUserAction === 'string' ? data.exceptionUserAction : undefined,
        className: typeof data.exceptionClassName === 'string' ? data.exceptionClassName : undefined,
      });
    }
    return data;
  }

  private async findRequest(url: string, body: object): Promise<EgeriaElement[]> {
    const data = await this.post(url, body);
    return toElements(data.elements);
  }

  private async getRequest(url: string, body: object): Promise<EgeriaElement | undefined> {
    const data = await this.post(url, body);
    return toElements(data.element)[0];
  }

  private registry(): FormatSetRegistry {
    return this.config.registry ?? getRegistry();
  }

  private providers(): ProviderRegistry | undefined {
    return this.config.providers;
  }

  private present(elements: EgeriaElement[], options: OutputOptions, presentation: Presentation): OutputResult {
    const mode = (options.outputFormat ?? 'JSON').toUpperCase();
    if (mode === 'JSON') {
      return { kind: 'raw', elements };
    }
    if (elements.length === 0) {
      return { kind: 'empty', message: NO_ELEMENTS_FOUND };
    }
    getLogger().debug(`Formatting ${elements.length} element(s) as ${mode}`, {
      formatSet: options.reportSpec ?? presentation.formatSet,
    });
    return generateOutput({
      registry: this.registry(),
      providers: this.providers(),
      elements,
      mode,
      kindName: presentation.formatSet,
      formatSet: options.reportSpec,
      displayKind: presentation.displayKind,
      searchString: presentation.searchString,
    });
  }
}

/**
 * Create client from configuration.
 * Priority: explicit overrides > environment > config file > defaults
 */
export function createClientFromEnv(overrides: Partial<ClientConfig> = {}): EgeriaClient {
  const config = getConfig();
  return new EgeriaClient({
    ...overrides,
    platformUrl: overrides.platformUrl ?? config.getPlatformUrl(),
    viewServer: overrides.viewServer ?? config.getViewServer(),
    userId: overrides.userId ?? config.getUserId() ?? DEFAULT_USER_ID,
    userPassword: overrides.userPassword ?? config.getUserPassword(),
    timeoutSeconds: overrides.timeoutSeconds ?? config.getRequestTimeoutSeconds(),
    verifySsl: overrides.verifySsl ?? config.getVerifySsl(),
  });
}
