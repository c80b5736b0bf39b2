import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CliError } from '../errors';
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
  unsetConfigValue,
} from './config-manager';

describe('Config Manager', () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'permgraph-config-'));
    vi.stubEnv('PERMGRAPH_HOME', join(home, 'nested'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(home, { recursive: true, force: true });
  });

  it('should return an empty config when no file exists', () => {
    expect(loadConfig()).toEqual({});
  });

  it('should create the directory on save', () => {
    saveConfig({ snapshot: 'groups.json', output: 'json' });
    expect(getConfigPath()).toBe(join(home, 'nested', 'config.json'));
    expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toEqual({
      snapshot: 'groups.json',
      output: 'json',
    });
  });

  it('should set values from their command-line form', () => {
    setConfigValue('contexts', ' world=nether,, server=lobby ');
    setConfigValue('output', 'table');
    expect(getConfigValue('contexts')).toEqual(['world=nether', 'server=lobby']);
    expect(loadConfig()).toEqual({ contexts: ['world=nether', 'server=lobby'], output: 'table' });

    unsetConfigValue('output');
    expect(getConfigValue('output')).toBeUndefined();
  });

  it('should reject an unknown output format', () => {
    expect(() => setConfigValue('output', 'yaml')).toThrow(CliError);
  });

  it('should drop fields of the wrong type', () => {
    saveConfig({});
    writeFileSync(getConfigPath(), JSON.stringify({ snapshot: 3, contexts: ['a=b', 4], output: 'xml', extra: true }));
    expect(loadConfig()).toEqual({ contexts: ['a=b'] });
  });

  it('should fail on a malformed file', () => {
    saveConfig({});
    writeFileSync(getConfigPath(), '{');
    expect(() => loadConfig()).toThrow(CliError);
    writeFileSync(getConfigPath(), '[]');
    expect(() => loadConfig()).toThrow('expected an object');
  });
});
