/**
 * Run the CLI in process and capture what it prints
 */

import ansis from 'ansis';
import { Command } from 'commander';
import { registerCommands } from '../../src/cli/commands';
import { CliContext } from '../../src/cli/utils';
import { StubPlatform } from './stub-platform';

export class CliExit extends Error {
  constructor(public readonly code: number) {
    super(`process.exit(${code})`);
  }
}

export interface CliRun {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface StubContext extends CliContext {
  overrides: unknown[];
}

/**
 * Context whose clients talk to the given stand-in
 */
export function stubContext(platform: StubPlatform): StubContext {
  const overrides: unknown[] = [];
  return {
    overrides,
    createClient: (given) => {
      overrides.push(given);
      return platform.client(given);
    },
  };
}

export async function runCli(args: string[], context?: CliContext): Promise<CliRun> {
  const out: string[] = [];
  const err: string[] = [];
  const spies = [
    jest.spyOn(console, 'log').mockImplementation((...data: unknown[]) => {
      out.push(data.map(String).join(' ') + '\n');
    }),
    jest.spyOn(console, 'error').mockImplementation((...data: unknown[]) => {
      err.push(data.map(String).join(' ') + '\n');
    }),
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      out.push(String(chunk));
      return true;
    }),
    jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      err.push(String(chunk));
      return true;
    }),
    jest.spyOn(process, 'exit').mockImplementation((code?: number | string | null): never => {
      throw new CliExit(typeof code === 'number' ? code : 0);
    }),
  ];

  let exitCode = 0;
  try {
    await registerCommands(new Command(), context).exitOverride().parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CliExit) {
      exitCode = error.code;
    } else if (isCommanderExit(error)) {
      exitCode = error.exitCode;
    } else {
      throw error;
    }
  } finally {
    spies.forEach(spy => spy.mockRestore());
  }

  return { stdout: ansis.strip(out.join('')), stderr: ansis.strip(err.join('')), exitCode };
}

function isCommanderExit(error: unknown): error is { exitCode: number } {
  return typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number';
}
