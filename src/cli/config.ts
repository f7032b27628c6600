/**
 * Configuration Commands
 */

import { Command } from 'commander';
import { CONFIG_KEYS, ConfigKey, getConfig, isConfigKey } from '../lib/config';
import { Table } from '../lib/table';
import * as colors from './colors';
import { separator } from './colors';
import { setCommandHelp } from './help-formatter';
import { exitWithError } from './utils';

interface EffectiveRow {
  setting: string;
  value: string;
  source: string;
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    exitWithError(`Unknown configuration key '${key}'`, `Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

/**
 * Values the client and registry will actually use, with where each
 * one came from
 */
function effectiveRows(): EffectiveRow[] {
  const config = getConfig();
  const stored = config.getAll();
  const source = (envVars: string[], key: ConfigKey): string => {
    const env = envVars.find(name => process.env[name]);
    if (env) return env;
    return stored[key] !== undefined ? 'config file' : 'default';
  };

  return [
    { setting: 'platform_url', value: config.getPlatformUrl(), source: source(['EGERIA_PLATFORM_URL', 'EGERIA_VIEW_SERVER_URL'], 'platform_url') },
    { setting: 'view_server', value: config.getViewServer(), source: source(['EGERIA_VIEW_SERVER'], 'view_server') },
    { setting: 'user_id', value: config.getUserId() ?? '', source: source(['EGERIA_USER'], 'user_id') },
    { setting: 'user_format_sets_dir', value: config.getUserFormatSetsDir(), source: source(['EGERIA_FORMAT_SETS_DIR'], 'user_format_sets_dir') },
    { setting: 'report_formats_json', value: config.getReportFormatFiles().join(', '), source: source(['EGERIA_REPORT_FORMATS_JSON'], 'report_formats_json') },
    { setting: 'console_width', value: String(config.getConsoleWidth()), source: source(['EGERIA_CONSOLE_WIDTH'], 'console_width') },
    { setting: 'request_timeout_seconds', value: String(config.getRequestTimeoutSeconds()), source: source(['EGERIA_TIMEOUT_SECONDS'], 'request_timeout_seconds') },
    { setting: 'verify_ssl', value: String(config.getVerifySsl()), source: source(['EGERIA_VERIFY_SSL'], 'verify_ssl') },
    { setting: 'log_level', value: config.getLogLevel(), source: source(['EGERIA_LOG_LEVEL'], 'log_level') },
    { setting: 'log_file', value: config.getLogFile() ?? '', source: source(['EGERIA_LOG_FILE'], 'log_file') },
  ];
}

export function createConfigCommand(): Command {
  const configCommand = setCommandHelp(
    new Command('config'),
    'Manage CLI configuration',
    'Manage CLI configuration settings: platform URL, view server, user, format-set locations, console width and logging. Settings are stored in a JSON file (typically ~/.config/egeria/config.json). Environment variables take priority over stored values. Passwords are never stored.'
  )
    .alias('cfg')
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  configCommand.addCommand(
    new Command('show')
      .description('Show effective configuration values and their sources')
      .option('--json', 'Output the stored values as JSON')
      .action((options: { json?: boolean }) => {
        if (options.json) {
          console.log(JSON.stringify(getConfig().getAll(), null, 2));
          return;
        }

        const table = new Table<EffectiveRow>({
          columns: [
            { header: 'Setting', field: 'setting', type: 'value', width: 'auto' },
            { header: 'Value', field: 'value', type: 'text', width: 'flex', priority: 2 },
            { header: 'Source', field: 'source', type: 'text', width: 'auto' },
          ],
        });
        console.log('\n' + separator());
        console.log(colors.ui.title('Current Configuration'));
        console.log(separator());
        console.log(table.render(effectiveRows()).join('\n'));
        console.log(colors.status.dim(`\nConfig file: ${getConfig().getConfigPath()}`));
      })
  );

  configCommand.addCommand(
    new Command('set')
      .description('Set a configuration value. Lists are comma separated.')
      .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
      .argument('<value>', 'Value to store')
      .action((key: string, value: string) => {
        const configKey = requireKey(key);
        try {
          getConfig().set(configKey, value);
          console.log(colors.status.success(`✓ Set ${configKey}`));
        } catch (error) {
          exitWithError(`Failed to set ${configKey}`, error);
        }
      })
  );

  configCommand.addCommand(
    new Command('unset')
      .description('Remove a stored configuration value')
      .argument('<key>', 'Configuration key')
      .action((key: string) => {
        const configKey = requireKey(key);
        try {
          getConfig().delete(configKey);
          console.log(colors.status.success(`✓ Removed ${configKey}`));
        } catch (error) {
          exitWithError(`Failed to remove ${configKey}`, error);
        }
      })
  );

  configCommand.addCommand(
    new Command('path')
      .description('Print the configuration file path')
      .action(() => {
        console.log(getConfig().getConfigPath());
      })
  );

  return configCommand;
}
