import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCli } from '../cli';

const prompts = vi.hoisted(() => ({ input: vi.fn(), select: vi.fn() }));

vi.mock('@inquirer/prompts', () => prompts);

describe('config init', () => {
  let home: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'permgraph-init-'));
    vi.stubEnv('PERMGRAPH_HOME', home);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    prompts.input.mockReset();
    prompts.select.mockReset();
    vi.unstubAllEnvs();
    rmSync(home, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<string[]> {
    const lines: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
      lines.push(parts.map(String).join(' '));
    });
    await createCli().exitOverride().parseAsync(['node', 'permgraph', ...args]);
    return lines;
  }

  it('should save the answers', async () => {
    prompts.input.mockResolvedValueOnce('groups.json').mockResolvedValueOnce('World=Nether, server=lobby');
    prompts.select.mockResolvedValueOnce('json');

    const lines = await run('config', 'init');

    const file = join(home, 'config.json');
    expect(lines).toEqual([`✓ Configuration saved to ${file}`]);
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual({
      snapshot: 'groups.json',
      contexts: ['world=nether', 'server=lobby'],
      output: 'json',
    });
    expect(prompts.input).toHaveBeenCalledTimes(2);
    expect(prompts.select).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Default output format:', default: 'table' })
    );
  });

  it('should leave out empty answers', async () => {
    prompts.input.mockResolvedValueOnce('').mockResolvedValueOnce('');
    prompts.select.mockResolvedValueOnce('table');

    await run('config', 'init');

    expect(JSON.parse(readFileSync(join(home, 'config.json'), 'utf-8'))).toEqual({ output: 'table' });
  });

  it('should report a cancelled prompt without saving', async () => {
    const exit = new Error('User force closed the prompt with SIGINT');
    exit.name = 'ExitPromptError';
    prompts.input.mockRejectedValueOnce(exit);

    expect(await run('config', 'init')).toEqual(['ℹ Configuration cancelled']);
    expect(existsSync(join(home, 'config.json'))).toBe(false);
  });

  it('should pass other prompt failures through', async () => {
    prompts.input.mockRejectedValueOnce(new Error('terminal unavailable'));
    await expect(run('config', 'init')).rejects.toThrow('terminal unavailable');
  });
});
