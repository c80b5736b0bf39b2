/**
 * Global Configuration Manager
 * Manages ~/.permgraph/config.json (or $PERMGRAPH_HOME/config.json)
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { CliError } from '../errors';
import { isOutputFormat } from '../utils/output';
import type { ConfigKey, GlobalConfig } from './types';

export function getConfigDir(): string {
  return process.env.PERMGRAPH_HOME ?? join(homedir(), '.permgraph');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function parseConfig(raw: unknown): GlobalConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new CliError(`Invalid configuration in ${getConfigPath()}: expected an object`);
  }

  const config: GlobalConfig = {};
  if ('snapshot' in raw && typeof raw.snapshot === 'string') {
    config.snapshot = raw.snapshot;
  }
  if ('contexts' in raw && Array.isArray(raw.contexts)) {
    config.contexts = raw.contexts.filter((c): c is string => typeof c === 'string');
  }
  if ('output' in raw && isOutputFormat(raw.output)) {
    config.output = raw.output;
  }
  return config;
}

export function loadConfig(): GlobalConfig {
  const file = getConfigPath();
  if (!existsSync(file)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Cannot read configuration ${file}: ${reason}`);
  }
  return parseConfig(raw);
}

export function saveConfig(config: GlobalConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), `${JSON.stringify(config, null, 2)}\n`);
}

export function getConfigValue(key: ConfigKey): GlobalConfig[ConfigKey] {
  return loadConfig()[key];
}

/**
 * Set a value from its command-line form; contexts are comma-separated
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  const config = loadConfig();
  switch (key) {
    case 'snapshot':
      config.snapshot = value;
      break;
    case 'contexts':
      config.contexts = value
        .split(',')
        .map((c) => c.trim())
        .filter((c) => c.length > 0);
      break;
    case 'output':
      if (!isOutputFormat(value)) {
        throw new CliError(`Invalid output format: ${value} (expected json or table)`);
      }
      config.output = value;
      break;
  }
  saveConfig(config);
}

export function unsetConfigValue(key: ConfigKey): void {
  const config = loadConfig();
  delete config[key];
  saveConfig(config);
}
