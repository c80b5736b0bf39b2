/**
 * Config commands
 */

import { input, select } from '@inquirer/prompts';
import { Context } from '@permgraph/core';
import { Command } from 'commander';
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
  unsetConfigValue,
} from '../config/config-manager';
import { CONFIG_KEYS, type ConfigKey, type GlobalConfig, isConfigKey } from '../config/types';
import { CliError } from '../errors';
import { info, printJson, success } from '../utils/output';

function requireConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new CliError(`Invalid key: ${key} (valid keys: ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

function isPromptExit(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ExitPromptError' || err.message.includes('User force closed'));
}

export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage global configuration');

  // config init
  config
    .command('init')
    .description('Initialize configuration interactively')
    .action(async () => {
      try {
        const currentConfig = loadConfig();

        const snapshot = await input({
          message: 'Default snapshot file:',
          default: currentConfig.snapshot ?? '',
        });

        const contexts = await input({
          message: 'Default contexts (comma-separated key=value):',
          default: (currentConfig.contexts ?? []).join(','),
          validate: (value) => {
            for (const text of value.split(',').map((c) => c.trim()).filter((c) => c.length > 0)) {
              if (text.indexOf('=') <= 0 || text.endsWith('=')) {
                return `Invalid context: ${text}`;
              }
            }
            return true;
          },
        });

        const output = await select({
          message: 'Default output format:',
          choices: [
            { name: 'table', value: 'table' as const },
            { name: 'json', value: 'json' as const },
          ],
          default: currentConfig.output ?? 'table',
        });

        const contextList = contexts
          .split(',')
          .map((c) => c.trim())
          .filter((c) => c.length > 0)
          .map((c) => Context.parse(c).toString());

        const newConfig: GlobalConfig = {
          snapshot: snapshot || undefined,
          contexts: contextList.length > 0 ? contextList : undefined,
          output,
        };

        saveConfig(newConfig);
        success(`Configuration saved to ${getConfigPath()}`);
      } catch (err) {
        if (isPromptExit(err)) {
          info('Configuration cancelled');
          return;
        }
        throw err;
      }
    });

  // config show
  config
    .command('show')
    .description('Show current configuration')
    .action(() => {
      info(`Configuration file: ${getConfigPath()}`);
      printJson(loadConfig());
    });

  // config path
  config
    .command('path')
    .description('Print the configuration file path')
    .action(() => {
      console.log(getConfigPath());
    });

  // config set
  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string) => {
      const configKey = requireConfigKey(key);
      if (configKey === 'contexts') {
        for (const text of value.split(',').map((c) => c.trim()).filter((c) => c.length > 0)) {
          Context.parse(text);
        }
      }
      setConfigValue(configKey, value);
      success(`Set ${configKey} = ${value}`);
    });

  // config get
  config
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string) => {
      const value = getConfigValue(requireConfigKey(key));
      if (value === undefined) {
        throw new CliError(`Key not set: ${key}`);
      }
      console.log(Array.isArray(value) ? value.join(',') : value);
    });

  // config unset
  config
    .command('unset <key>')
    .description('Remove a configuration value')
    .action((key: string) => {
      const configKey = requireConfigKey(key);
      unsetConfigValue(configKey);
      success(`Unset ${configKey}`);
    });

  return config;
}
