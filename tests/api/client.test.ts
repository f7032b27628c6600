/**
 * Egeria REST client tests, against an in-process platform stand-in
 */

import { StubPlatform, viewPath } from '../helpers/stub-platform';
import { FormatSetRegistry } from '../../src/formats/registry';
import { createClientFromEnv, slimBody } from '../../src/api/client';
import { resetConfig } from '../../src/lib/config';
import {
  EgeriaApiError,
  EgeriaConnectionError,
  EgeriaNotFoundError,
  EgeriaUnauthorizedError,
} from '../../src/lib/errors';
import { EgeriaElement } from '../../src/types';

const SEARCH_PATH = viewPath('collection-manager', 'collections/by-search-string');

const sales: EgeriaElement = {
  elementHeader: { guid: 'coll-1', type: { typeName: 'Collection' } },
  properties: { displayName: 'Sales', qualifiedName: 'Collection::Sales' },
};

const term: EgeriaElement = {
  elementHeader: { guid: 'term-1', type: { typeName: 'GlossaryTerm' } },
  properties: { displayName: 'Revenue', summary: 'Money in' },
};

function testRegistry(): FormatSetRegistry {
  const registry = new FormatSetRegistry();
  registry.merge({
    Collections: {
      target_type: 'Collection',
      formats: [
        { types: ['DICT', 'LIST'], columns: [{ name: 'Name', key: 'display_name' }, { name: 'GUID', key: 'GUID' }] },
      ],
    },
    Brief: { columns: [{ name: 'Qualified', key: 'qualified_name' }] },
    Terms: {
      aliases: ['GlossaryTerm'],
      columns: [{ name: 'Term', key: 'display_name' }, { name: 'Summary', key: 'summary' }],
    },
  });
  return registry;
}

describe('slimBody', () => {
  it('should drop null and undefined values only', () => {
    expect(slimBody({ a: null, b: undefined, c: 0, d: false, e: '' })).toEqual({ c: 0, d: false, e: '' });
  });
});

describe('EgeriaClient', () => {
  let platform: StubPlatform;

  beforeEach(() => {
    platform = new StubPlatform();
  });

  describe('authentication', () => {
    it('should exchange credentials for a token sent on later requests', async () => {
      platform
        .on('POST', '/api/token', { data: 'token-abc\n' })
        .onElements(SEARCH_PATH, []);
      const client = platform.client({ userPassword: 'test-secret', registry: testRegistry() });

      expect(client.hasCredentials).toBe(true);
      await expect(client.createBearerToken()).resolves.toBe('token-abc');
      await client.findCollections();

      expect(platform.requests[0]).toEqual({
        method: 'POST',
        url: '/api/token',
        body: { userId: 'erinoverview', password: 'test-secret' },
        authorization: undefined,
      });
      expect(platform.requests[1].authorization).toBe('Bearer token-abc');
      expect(client.getToken()).toBe('token-abc');
    });

    it('should refuse to request a token without a password', async () => {
      const client = platform.client();

      expect(client.hasCredentials).toBe(false);
      await expect(client.createBearerToken()).rejects.toThrow(
        'No password configured (set EGERIA_USER_PASSWORD)'
      );
      expect(platform.requests).toHaveLength(0);
    });

    it('should reject an empty token', async () => {
      platform.on('POST', '/api/token', { data: '  ' });
      const client = platform.client({ userPassword: 'test-secret' });

      await expect(client.createBearerToken()).rejects.toBeInstanceOf(EgeriaUnauthorizedError);
    });
  });

  describe('platform origin', () => {
    it('should return the trimmed origin text', async () => {
      platform.on('GET', '/open-metadata/platform-services/users/erinoverview/server-platform/origin', {
        data: 'Egeria OMAG Server Platform (version 5.2)\n',
      });

      await expect(platform.client().getPlatformOrigin()).resolves.toBe('Egeria OMAG Server Platform (version 5.2)');
    });
  });

  describe('request bodies', () => {
    it('should omit the search string for "*" and default paging to 0', async () => {
      platform.onElements(SEARCH_PATH, []);

      await platform.client().findCollections('*', { startsWith: true, pageSize: 10 });

      expect(platform.lastRequest()).toMatchObject({
        method: 'POST',
        url: SEARCH_PATH,
        body: { class: 'SearchStringRequestBody', startsWith: true, startFrom: 0, pageSize: 10 },
      });
      expect(platform.lastRequest()?.body).not.toHaveProperty('searchString');
    });

    it('should restrict digital product searches to their subtype', async () => {
      platform.onElements(SEARCH_PATH, []);

      await platform.client().findDigitalProducts('Sales');

      expect(platform.lastRequest()?.body).toEqual({
        class: 'SearchStringRequestBody',
        searchString: 'Sales',
        startFrom: 0,
        pageSize: 0,
        metadataElementSubtypeNames: ['DigitalProduct'],
      });
    });

    it('should pass classification filters in the search body', async () => {
      platform.onElements(SEARCH_PATH, []);

      await platform.client().findCollections('Sales', { includeOnlyClassifiedElements: ['Confidentiality'] });

      expect(platform.lastRequest()?.body).toEqual({
        class: 'SearchStringRequestBody',
        searchString: 'Sales',
        startFrom: 0,
        pageSize: 0,
        includeOnlyClassifiedElements: ['Confidentiality'],
      });
    });

    it('should post exact property searches to the classification manager', async () => {
      const path = viewPath('classification-manager', 'elements/by-exact-property-value');
      platform.onElements(path, []);

      await platform.client().getElementsByPropertyValue('Sales', ['displayName'], { metadataElementTypeName: 'Collection' });

      expect(platform.lastRequest()?.body).toEqual({
        class: 'FindPropertyNamesProperties',
        propertyValue: 'Sales',
        propertyNames: ['displayName'],
        metadataElementTypeName: 'Collection',
        startFrom: 0,
        pageSize: 0,
      });
    });

    it('should address the configured view server', async () => {
      const path = viewPath('collection-manager', 'collections/coll-1/members', 'other-view');
      platform.onElements(path, []);

      await platform.client({ viewServer: 'other-view' }).getCollectionMembers('coll-1');

      expect(platform.lastRequest()?.url).toBe(path);
      expect(platform.lastRequest()?.body).toEqual({ class: 'ResultsRequestBody', startFrom: 0, pageSize: 0 });
    });
  });

  describe('failures', () => {
    it('should raise an API error when relatedHTTPCode is not 200', async () => {
      platform.on('POST', SEARCH_PATH, {
        data: {
          relatedHTTPCode: 400,
          exceptionErrorMessage: 'OMAG-COMMON-400-001 The search string is invalid',
          exceptionUserAction: 'Correct the search string',
        },
      });

      const failure = platform.client().findCollections('[');

      await expect(failure).rejects.toBeInstanceOf(EgeriaApiError);
      await expect(failure).rejects.toMatchObject({
        message: 'OMAG-COMMON-400-001 The search string is invalid',
        relatedHTTPCode: 400,
        context: { url: SEARCH_PATH, userAction: 'Correct the search string', relatedHTTPCode: 400 },
      });
    });

    it('should map 401 to an unauthorized error with the server message', async () => {
      platform.on('POST', SEARCH_PATH, { status: 401, data: { exceptionErrorMessage: 'Token expired' } });

      const failure = platform.client().findCollections();

      await expect(failure).rejects.toBeInstanceOf(EgeriaUnauthorizedError);
      await expect(failure).rejects.toMatchObject({ message: 'Token expired', status: 401 });
    });

    it('should map 404 to a not-found error', async () => {
      platform.on('POST', SEARCH_PATH, { status: 404, data: '' });

      const failure = platform.client().findCollections();

      await expect(failure).rejects.toBeInstanceOf(EgeriaNotFoundError);
      await expect(failure).rejects.toMatchObject({ message: 'Request failed with status 404', status: 404 });
    });

    it('should map an unreachable platform to a connection error', async () => {
      platform.goOffline();

      const failure = platform.client().findCollections();

      await expect(failure).rejects.toBeInstanceOf(EgeriaConnectionError);
      await expect(failure).rejects.toThrow(`Cannot reach Egeria platform (${SEARCH_PATH}): connect ECONNREFUSED`);
    });
  });

  describe('output modes', () => {
    it('should return raw elements for the default JSON mode', async () => {
      platform.onElements(SEARCH_PATH, [sales]);

      await expect(platform.client().findCollections()).resolves.toEqual({ kind: 'raw', elements: [sales] });
    });

    it('should report an empty result for formatted modes', async () => {
      platform.onElements(SEARCH_PATH, []);

      await expect(platform.client({ registry: testRegistry() }).findCollections('*', { outputFormat: 'DICT' }))
        .resolves.toEqual({ kind: 'empty', message: 'No elements found' });
    });

    it('should format through the method\'s own format set', async () => {
      platform.onElements(SEARCH_PATH, [sales]);

      const result = await platform.client({ registry: testRegistry() }).findCollections('Sales', { outputFormat: 'dict' });

      expect(result).toEqual({ kind: 'json', mode: 'DICT', data: [{ Name: 'Sales', GUID: 'coll-1' }] });
    });

    it('should head LIST output with the search string', async () => {
      platform.onElements(SEARCH_PATH, [sales]);

      const result = await platform.client({ registry: testRegistry() }).findCollections('Sales', { outputFormat: 'LIST' });

      expect(result).toEqual({
        kind: 'text',
        mode: 'LIST',
        content:
          '# Collections Table\n\n' +
          'Collections found from the search string: `Sales`\n\n' +
          '| Name | GUID | \n' +
          '|-------------|-------------|\n' +
          '| Sales | coll-1 | \n',
      });
    });

    it('should let a report spec override the method\'s format set', async () => {
      platform.onElements(SEARCH_PATH, [sales]);

      const result = await platform.client({ registry: testRegistry() })
        .findCollections('Sales', { outputFormat: 'DICT', reportSpec: 'Brief' });

      expect(result).toEqual({ kind: 'json', mode: 'DICT', data: [{ Qualified: 'Collection::Sales' }] });
    });

    it('should format a single element by its own type name', async () => {
      const path = viewPath('classification-manager', 'elements/term-1');
      platform.on('POST', path, { data: { relatedHTTPCode: 200, element: term } });

      const result = await platform.client({ registry: testRegistry() })
        .getElementByGuid('term-1', { outputFormat: 'DICT', effectiveTime: '2025-01-01T00:00:00Z' });

      expect(platform.lastRequest()).toMatchObject({
        url: `${path}?forLineage=false&forDuplicateProcessing=false`,
        body: { class: 'EffectiveTimeQueryRequestBody', effectiveTime: '2025-01-01T00:00:00Z' },
      });
      expect(result).toEqual({ kind: 'json', mode: 'DICT', data: [{ Term: 'Revenue', Summary: 'Money in' }] });
    });
  });
});

describe('createClientFromEnv', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    delete process.env.EGERIA_VERIFY_SSL;
    resetConfig();
  });

  it('should verify certificates by default', () => {
    expect(createClientFromEnv().verifiesCertificates).toBe(true);
  });

  it('should take certificate verification from the environment', () => {
    process.env.EGERIA_VERIFY_SSL = 'false';

    expect(createClientFromEnv().verifiesCertificates).toBe(false);
    expect(createClientFromEnv({ verifySsl: true }).verifiesCertificates).toBe(true);
  });
});
