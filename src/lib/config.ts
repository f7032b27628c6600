/**
 * Configuration Manager for the egeria CLI
 *
 * Manages user configuration stored at ~/.config/egeria/config.json
 * (or $XDG_CONFIG_HOME/egeria/config.json).
 *
 * Resolution order for every setting: environment variable, then the
 * config file, then the built-in default. Passwords are read from the
 * environment only and never written to disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { getLogger, LogLevel } from './logger';

const configSchema = z.object({
  platform_url: z.string().optional(),
  view_server: z.string().optional(),
  user_id: z.string().optional(),
  user_format_sets_dir: z.string().optional(),
  report_formats_json: z.array(z.string()).optional(),
  console_width: z.number().int().positive().optional(),
  request_timeout_seconds: z.number().positive().optional(),
  verify_ssl: z.boolean().optional(),
  log_level: z.enum(['error', 'warn', 'info', 'verbose', 'debug']).optional(),
  log_file: z.string().optional(),
});

export type EgeriaConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof EgeriaConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'platform_url',
  'view_server',
  'user_id',
  'user_format_sets_dir',
  'report_formats_json',
  'console_width',
  'request_timeout_seconds',
  'verify_ssl',
  'log_level',
  'log_file',
];

export const DEFAULT_PLATFORM_URL = 'https://localhost:9443';
export const DEFAULT_VIEW_SERVER = 'qs-view-server';
export const DEFAULT_CONSOLE_WIDTH = 200;
export const DEFAULT_TIMEOUT_SECONDS = 30;

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private config: EgeriaConfig;

  constructor() {
    const xdgConfig = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
    this.configDir = path.join(xdgConfig, 'egeria');
    this.configPath = path.join(this.configDir, 'config.json');
    this.config = this.load();
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk, falling back to defaults on a missing
   * or unreadable file
   */
  private load(): EgeriaConfig {
    try {
      if (fs.existsSync(this.configPath)) {
        const data: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        const parsed = configSchema.safeParse(data);
        if (parsed.success) {
          return parsed.data;
        }
        getLogger().warn(`Ignoring invalid config at ${this.configPath}`, {
          issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
        });
      }
    } catch (error) {
      getLogger().warn(`Failed to load config from ${this.configPath}`, { error: String(error) });
    }

    return this.getDefaultConfig();
  }

  private getDefaultConfig(): EgeriaConfig {
    return {};
  }

  /**
   * Save configuration to disk
   */
  save(): void {
    try {
      if (!fs.existsSync(this.configDir)) {
        fs.mkdirSync(this.configDir, { recursive: true });
      }
      fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to save config to ${this.configPath}: ${error}`);
    }
  }

  getAll(): EgeriaConfig {
    return { ...this.config };
  }

  get<K extends ConfigKey>(key: K): EgeriaConfig[K] {
    return this.config[key];
  }

  /**
   * Set a value from its command-line text form. Numbers and lists
   * (comma separated) are converted according to the key.
   */
  set(key: ConfigKey, raw: string): void {
    const candidate: Record<string, unknown> = { ...this.config };
    switch (key) {
      case 'console_width':
      case 'request_timeout_seconds':
        candidate[key] = Number(raw);
        break;
      case 'report_formats_json':
        candidate[key] = splitList(raw);
        break;
      case 'verify_ssl':
        candidate[key] = raw === 'true' ? true : raw === 'false' ? false : raw;
        break;
      default:
        candidate[key] = raw;
    }

    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new Error(`Invalid value for ${key}: ${issue ? issue.message : raw}`);
    }
    this.config = parsed.data;
    this.save();
  }

  delete(key: ConfigKey): void {
    const next = { ...this.config };
    delete next[key];
    this.config = next;
    this.save();
  }

  // Effective values (environment > file > default)

  getPlatformUrl(): string {
    return process.env.EGERIA_PLATFORM_URL
      || process.env.EGERIA_VIEW_SERVER_URL
      || this.config.platform_url
      || DEFAULT_PLATFORM_URL;
  }

  getViewServer(): string {
    return process.env.EGERIA_VIEW_SERVER || this.config.view_server || DEFAULT_VIEW_SERVER;
  }

  getUserId(): string | undefined {
    return process.env.EGERIA_USER || this.config.user_id;
  }

  getUserPassword(): string | undefined {
    return process.env.EGERIA_USER_PASSWORD;
  }

  getUserFormatSetsDir(): string {
    return process.env.EGERIA_FORMAT_SETS_DIR
      || this.config.user_format_sets_dir
      || path.join(this.configDir, 'format-sets');
  }

  getReportFormatFiles(): string[] {
    const fromEnv = process.env.EGERIA_REPORT_FORMATS_JSON;
    if (fromEnv) {
      return splitList(fromEnv);
    }
    return this.config.report_formats_json ?? [];
  }

  getConsoleWidth(): number {
    return positiveNumber(process.env.EGERIA_CONSOLE_WIDTH) ?? this.config.console_width ?? DEFAULT_CONSOLE_WIDTH;
  }

  getRequestTimeoutSeconds(): number {
    return positiveNumber(process.env.EGERIA_TIMEOUT_SECONDS)
      ?? this.config.request_timeout_seconds
      ?? DEFAULT_TIMEOUT_SECONDS;
  }

  /** Only the exact strings "true" and "false" count in the environment */
  getVerifySsl(): boolean {
    const fromEnv = process.env.EGERIA_VERIFY_SSL;
    if (fromEnv === 'false') return false;
    if (fromEnv === 'true') return true;
    return this.config.verify_ssl ?? true;
  }

  getLogLevel(): LogLevel {
    const fromEnv = process.env.EGERIA_LOG_LEVEL;
    const level = configSchema.shape.log_level.safeParse(fromEnv);
    if (fromEnv && level.success && level.data) {
      return level.data;
    }
    return this.config.log_level ?? 'info';
  }

  getLogFile(): string | undefined {
    return process.env.EGERIA_LOG_FILE || this.config.log_file;
  }
}

function splitList(raw: string): string[] {
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function positiveNumber(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

/**
 * Drop the cached instance so the next getConfig() re-reads the
 * environment and file
 */
export function resetConfig(): void {
  globalConfig = null;
}
