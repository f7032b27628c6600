/**
 * Format Set Registry
 *
 * Maps kind names (and their aliases) to FormatSets. Every mutation builds
 * new maps and swaps them in, so a caller iterating `entries()` keeps a
 * consistent view while a merge runs.
 *
 * Alias resolution: an exact key always wins. Otherwise the alias index
 * answers; when two sets declare the same alias, the one registered first
 * keeps it.
 */

import * as fs from 'fs';
import * as path from 'path';
import builtinFormatSets from './data/builtin-format-sets.json';
import { FormatSet, parseFormatSetFile, toSerializable } from './schema';
import { FormatSetFileError, errorMessage } from '../lib/errors';
import { getLogger } from '../lib/logger';
import { getConfig } from '../lib/config';

export const DEFAULT_SET_NAME = 'Default';

export interface RejectedEntry {
  name: string;
  issues: string[];
}

export interface MergeReport {
  source: string;
  merged: string[];
  rejected: RejectedEntry[];
}

export interface DirectoryLoadReport {
  directory: string;
  files: MergeReport[];
  failed: { file: string; message: string }[];
}

export class FormatSetRegistry {
  private sets: ReadonlyMap<string, FormatSet> = new Map();
  private aliasIndex: ReadonlyMap<string, string> = new Map();

  constructor(initial?: Iterable<[string, FormatSet]>) {
    if (initial) {
      this.swap(new Map(initial));
    }
  }

  // ========== Reads ==========

  /**
   * FormatSet for an exact key, else for an alias; undefined when neither
   */
  lookup(name: string): FormatSet | undefined {
    const canonical = this.resolveName(name);
    return canonical === undefined ? undefined : this.sets.get(canonical);
  }

  /**
   * Canonical key a name or alias refers to
   */
  resolveName(name: string): string | undefined {
    if (this.sets.has(name)) return name;
    return this.aliasIndex.get(name);
  }

  has(name: string): boolean {
    return this.resolveName(name) !== undefined;
  }

  names(): string[] {
    return [...this.sets.keys()];
  }

  entries(): [string, FormatSet][] {
    return [...this.sets.entries()];
  }

  get size(): number {
    return this.sets.size;
  }

  snapshot(): Record<string, FormatSet> {
    const out: Record<string, FormatSet> = {};
    for (const [name, formatSet] of this.sets) {
      out[name] = toSerializable(formatSet);
    }
    return out;
  }

  // ========== Mutations ==========

  /**
   * Insert or overwrite. An overwritten entry keeps its position.
   */
  register(name: string, formatSet: FormatSet): void {
    const next = new Map(this.sets);
    next.set(name, formatSet);
    this.swap(next);
  }

  unregister(name: string): boolean {
    if (!this.sets.has(name)) return false;
    const next = new Map(this.sets);
    next.delete(name);
    this.swap(next);
    return true;
  }

  clear(): void {
    this.swap(new Map());
  }

  /**
   * Validate a record of declarations and register every valid one
   * (last write wins). Invalid entries are logged and reported, never
   * registered.
   */
  merge(raw: unknown, source = 'runtime'): MergeReport {
    const logger = getLogger();
    const entries = parseFormatSetFile(raw);
    if (entries === undefined) {
      throw new FormatSetFileError(`Format sets from ${source} must be a JSON object keyed by kind name`, source);
    }

    const next = new Map(this.sets);
    const report: MergeReport = { source, merged: [], rejected: [] };

    for (const { name, result } of entries) {
      if (!result.ok) {
        logger.warn(`Rejected format set '${name}' from ${source}`, { issues: result.issues });
        report.rejected.push({ name, issues: result.issues });
        continue;
      }
      for (const warning of result.warnings) {
        logger.warn(`Format set '${name}' from ${source}: ${warning}`);
      }
      next.set(name, result.formatSet);
      report.merged.push(name);
    }

    this.swap(next);
    logger.debug(`Merged ${report.merged.length} format set(s) from ${source}`);
    return report;
  }

  mergeFromFile(filePath: string): MergeReport {
    return this.merge(readJsonFile(filePath), filePath);
  }

  /**
   * Clear the registry, then load a single file
   */
  replaceFromFile(filePath: string): MergeReport {
    const raw = readJsonFile(filePath);
    this.clear();
    return this.merge(raw, filePath);
  }

  /**
   * Merge every *.json file in a directory, in file-name order. A bad file
   * is logged and reported; the rest still load.
   */
  loadDirectory(directory: string): DirectoryLoadReport {
    const report: DirectoryLoadReport = { directory, files: [], failed: [] };
    if (!fs.existsSync(directory)) {
      getLogger().debug(`Format set directory ${directory} does not exist`);
      return report;
    }

    const files = fs.readdirSync(directory)
      .filter(f => f.toLowerCase().endsWith('.json'))
      .sort();

    for (const file of files) {
      const fullPath = path.join(directory, file);
      try {
        report.files.push(this.mergeFromFile(fullPath));
      } catch (error) {
        const message = errorMessage(error);
        getLogger().error(`Could not load format sets from ${fullPath}: ${message}`);
        report.failed.push({ file: fullPath, message });
      }
    }
    return report;
  }

  /**
   * Write sets to a JSON file in canonical form. Unknown names are logged
   * and skipped; nothing is written when no set remains.
   *
   * @returns the names written
   */
  saveToFile(filePath: string, names?: string[]): string[] {
    const selected = names ?? this.names();
    const out: Record<string, FormatSet> = {};

    for (const name of selected) {
      const canonical = this.resolveName(name);
      const formatSet = canonical === undefined ? undefined : this.sets.get(canonical);
      if (canonical === undefined || formatSet === undefined) {
        getLogger().warn(`Format set '${name}' not found; skipping`);
        continue;
      }
      out[canonical] = toSerializable(formatSet);
    }

    const written = Object.keys(out);
    if (written.length === 0) {
      getLogger().warn(`No format sets to save to ${filePath}`);
      return written;
    }

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, JSON.stringify(out, null, 2) + '\n', 'utf-8');
    getLogger().info(`Saved ${written.length} format set(s) to ${filePath}`);
    return written;
  }

  private swap(next: Map<string, FormatSet>): void {
    const aliases = new Map<string, string>();
    for (const [name, formatSet] of next) {
      for (const alias of formatSet.aliases) {
        if (!aliases.has(alias)) {
          aliases.set(alias, name);
        }
      }
    }
    this.sets = next;
    this.aliasIndex = aliases;
  }
}

function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new FormatSetFileError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, error);
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new FormatSetFileError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, filePath, error);
  }
}

/**
 * Registry holding only the sets shipped with the package
 */
export function createBuiltinRegistry(): FormatSetRegistry {
  const registry = new FormatSetRegistry();
  registry.merge(builtinFormatSets, 'built-in format sets');
  return registry;
}

let globalRegistry: FormatSetRegistry | null = null;

/**
 * Process-wide registry. Built on first use, in this order:
 *   1. built-in sets
 *   2. every *.json in the user format-set directory
 *   3. each file listed in the report-formats setting
 * Later sources overwrite earlier ones by kind name.
 */
export function getRegistry(): FormatSetRegistry {
  if (!globalRegistry) {
    const config = getConfig();
    const registry = createBuiltinRegistry();
    registry.loadDirectory(config.getUserFormatSetsDir());
    for (const file of config.getReportFormatFiles()) {
      try {
        registry.mergeFromFile(file);
      } catch (error) {
        getLogger().error(`Could not load format sets from ${file}: ${errorMessage(error)}`);
      }
    }
    globalRegistry = registry;
  }
  return globalRegistry;
}

/**
 * Discard the process-wide registry; the next getRegistry() rebuilds it
 */
export function resetRegistry(): void {
  globalRegistry = null;
}
