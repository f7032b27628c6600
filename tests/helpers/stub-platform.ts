/**
 * In-process platform stand-in
 *
 * An axios instance whose adapter answers from registered routes instead
 * of the network. Every request is recorded with its parsed JSON body.
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { EgeriaClient } from '../../src/api/client';
import { createBuiltinRegistry } from '../../src/formats/registry';
import { ClientConfig } from '../../src/types';

export const STUB_PLATFORM_URL = 'https://platform.test:9443';

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
  authorization?: string;
}

export interface StubReply {
  status?: number;
  data: unknown;
}

export type StubHandler = (request: RecordedRequest) => StubReply;

interface Route {
  method: string;
  path: string;
  handler: StubHandler;
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string' || data === '') return data;
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    return data;
  }
}

export class StubPlatform {
  readonly requests: RecordedRequest[] = [];
  private routes: Route[] = [];
  private offline = false;

  /**
   * Answer `method path` (path without query string) with a fixed reply
   * or a handler
   */
  on(method: string, path: string, reply: StubReply | StubHandler): this {
    const handler = typeof reply === 'function' ? reply : () => reply;
    this.routes.push({ method: method.toUpperCase(), path, handler });
    return this;
  }

  /** Answer a POST with `{relatedHTTPCode: 200, elements}` */
  onElements(path: string, elements: unknown[]): this {
    return this.on('POST', path, { data: { class: 'OpenMetadataElementsResponse', relatedHTTPCode: 200, elements } });
  }

  /** Fail every request as if the platform were unreachable */
  goOffline(): this {
    this.offline = true;
    return this;
  }

  lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  httpClient(): AxiosInstance {
    return axios.create({
      baseURL: STUB_PLATFORM_URL,
      adapter: (config) => this.handle(config),
    });
  }

  /**
   * Client wired to this stand-in, with the built-in format sets unless a
   * registry is given
   */
  client(overrides: Partial<ClientConfig> = {}): EgeriaClient {
    return new EgeriaClient({
      platformUrl: STUB_PLATFORM_URL,
      viewServer: 'qs-view-server',
      userId: 'erinoverview',
      registry: overrides.registry ?? createBuiltinRegistry(),
      ...overrides,
      httpClient: this.httpClient(),
    });
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const auth = config.headers.Authorization;
    const request: RecordedRequest = {
      method,
      url,
      body: parseBody(config.data),
      authorization: typeof auth === 'string' ? auth : undefined,
    };
    this.requests.push(request);

    if (this.offline) {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    }

    const path = url.split('?')[0];
    const route = this.routes.find(r => r.method === method && r.path === path);
    const reply = route ? route.handler(request) : { status: 404, data: { exceptionErrorMessage: `No route for ${method} ${path}` } };
    const status = reply.status ?? 200;

    const response: AxiosResponse = {
      data: reply.data,
      status,
      statusText: String(status),
      headers: {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
    }
    return response;
  }
}

export function viewPath(service: string, path: string, server = 'qs-view-server'): string {
  return `/servers/${server}/api/open-metadata/${service}/${path}`;
}

