/**
 * Helpers shared by the CLI commands
 */

import { Command, InvalidArgumentError } from 'commander';
import { createClientFromEnv, EgeriaClient } from '../api/client';
import { EgeriaApiError, EgeriaClientError, EgeriaError, errorMessage } from '../lib/errors';
import { OutputResult } from '../formats/output';
import { ReportParams } from '../formats/report-runner';
import { isOutputMode, OUTPUT_MODES } from '../formats/schema';
import { ClientConfig } from '../types';
import * as colors from './colors';

/** Connection flags accepted by the root program */
export interface ConnectionOptions {
  url?: string;
  server?: string;
  user?: string;
  password?: string;
}

/**
 * Dependencies the commands reach through, replaceable in tests
 */
export interface CliContext {
  createClient(overrides: Partial<ClientConfig>): EgeriaClient;
}

export const defaultContext: CliContext = {
  createClient: createClientFromEnv,
};

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Connection flags of the root program as seen from a subcommand
 */
export function connectionOptions(command: Command): ConnectionOptions {
  const options: Record<string, unknown> = command.optsWithGlobals();
  return {
    url: stringOption(options, 'url'),
    server: stringOption(options, 'server'),
    user: stringOption(options, 'user'),
    password: stringOption(options, 'password'),
  };
}

export function clientOverrides(options: ConnectionOptions): Partial<ClientConfig> {
  const overrides: Partial<ClientConfig> = {};
  if (options.url) overrides.platformUrl = options.url;
  if (options.server) overrides.viewServer = options.server;
  if (options.user) overrides.userId = options.user;
  if (options.password) overrides.userPassword = options.password;
  return overrides;
}

/**
 * Client for a subcommand, with a bearer token when credentials are
 * configured
 */
export async function connect(context: CliContext, command: Command, authenticate = true): Promise<EgeriaClient> {
  const client = context.createClient(clientOverrides(connectionOptions(command)));
  if (authenticate && client.hasCredentials) {
    await client.createBearerToken();
  }
  return client;
}

/**
 * Print an error (with server details when present) and exit non-zero
 */
export function exitWithError(label: string, error: unknown): never {
  console.error(colors.status.error(`✗ ${label}`));
  console.error(colors.status.error(errorMessage(error)));

  if (error instanceof EgeriaApiError) {
    console.error(colors.status.dim(`  relatedHTTPCode: ${error.relatedHTTPCode}`));
  } else if (error instanceof EgeriaClientError) {
    console.error(colors.status.dim(`  HTTP status: ${error.status}`));
  }
  if (error instanceof EgeriaError) {
    const userAction = error.context.userAction;
    if (typeof userAction === 'string' && userAction) {
      console.error(colors.status.dim(`  ${userAction}`));
    }
  }
  process.exit(1);
}

/**
 * Print whatever a client call produced
 */
export function printOutputResult(result: OutputResult): void {
  switch (result.kind) {
    case 'raw':
      console.log(JSON.stringify(result.elements, null, 2));
      return;
    case 'json':
      console.log(JSON.stringify(result.data, null, 2));
      return;
    case 'text':
      console.log(result.content);
      return;
    case 'mermaid':
      console.log(result.diagrams.join('\n\n'));
      return;
    case 'empty':
      console.log(colors.status.dim(result.message));
      return;
    case 'error':
      exitWithError('Cannot format output', result.message);
  }
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * key=value pairs from --param flags
 */
export function parseParams(pairs: string[]): ReportParams {
  const params: ReportParams = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid parameter '${pair}' (expected key=value)`);
    }
    params[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return params;
}

export function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Commander parser for --output-format
 */
export function parseOutputMode(value: string): string {
  const mode = value.toUpperCase();
  if (!isOutputMode(mode)) {
    throw new InvalidArgumentError(`Choose one of ${OUTPUT_MODES.join(', ')}.`);
  }
  return mode;
}
