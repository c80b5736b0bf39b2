import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ContextSet } from '@permgraph/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findUser, loadSnapshot, parseSnapshot, SnapshotError } from './snapshot-loader';

const NOW = Date.parse('2030-01-01T00:00:00Z');

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof SnapshotError) {
      return err.issues;
    }
    throw err;
  }
  return expect.unreachable();
}

describe('parseSnapshot', () => {
  it('should read groups, users, aliases and permissions', () => {
    const snapshot = parseSnapshot(
      {
        groups: [
          { name: 'Default', nodes: ['chat.use'] },
          { name: 'vip', weight: 10, parents: ['default'], nodes: ['-build.tnt'] },
        ],
        users: [{ uuid: 'u-1', username: 'alice', groups: ['vip'] }],
        aliases: { 'cmd.gm': ['server.command.gamemode'] },
        permissions: [{ permission: 'chat.use', description: 'Chat' }, { permission: 'fly.use' }],
      },
      'inline',
      { now: NOW }
    );

    expect(snapshot.groups.map((g) => [g.name, g.weight])).toEqual([
      ['default', 0],
      ['vip', 10],
    ]);
    expect(snapshot.groups[1].nodes[0].isNegated()).toBe(true);

    const user = snapshot.users[0];
    expect(user.primaryGroup).toBe('default');
    expect(user.inheritedGroups).toEqual(['vip']);
    expect(Array.from(snapshot.aliases.getActualPermissions('cmd.gm'))).toEqual([
      'server.command.gamemode',
    ]);
    expect(snapshot.registry.get('fly.use')).toEqual({
      permission: 'fly.use',
      description: '',
      category: 'general',
      source: 'snapshot',
      isWildcard: false,
    });
  });

  it('should read node objects with value, contexts and expiry', () => {
    const snapshot = parseSnapshot(
      {
        users: [
          {
            uuid: 'u-1',
            nodes: [
              { permission: 'fly.use', value: false, contexts: { world: ['nether', 'end'], server: 'lobby' } },
              { permission: 'home.set', expiry: '2031-01-01T00:00:00Z' },
              { permission: 'kit.daily', expiresIn: '1d' },
            ],
          },
        ],
      },
      'inline',
      { now: NOW }
    );

    const [fly, home, kit] = snapshot.users[0].nodes;
    expect(fly.value).toBe(false);
    expect(fly.contexts.equals(ContextSet.of(['world', 'nether'], ['world', 'end'], ['server', 'lobby']))).toBe(true);
    expect(home.expiry).toBe(Date.parse('2031-01-01T00:00:00Z'));
    expect(kit.expiry).toBe(NOW + 86_400_000);
  });

  it('should collect every issue before failing', () => {
    const issues = issuesOf(() =>
      parseSnapshot(
        {
          groups: [
            { name: 'a', weight: 'heavy', nodes: [42, { permission: '' }] },
            { name: 'A' },
            { weight: 1 },
          ],
          users: [
            { username: 'nobody' },
            { uuid: 'u-1', groups: 'vip', nodes: [{ permission: 'x', expiry: 'soon' }, { permission: 'y', expiresIn: 'later' }] },
          ],
          aliases: { 'a.b': 'c.d' },
          permissions: [{ description: 'missing name' }],
        },
        'inline'
      )
    );

    expect(issues).toEqual([
      'groups[0].weight: must be a number',
      'groups[0].nodes[0]: node must be a string or an object',
      'groups[0].nodes[1]: permission cannot be empty',
      'groups[1]: duplicate group "A"',
      'groups[2]: name must be a non-empty string',
      'users[0]: uuid must be a non-empty string',
      'users[1].groups: must be an array of strings',
      'users[1].nodes[0]: expiry must be an ISO date string',
      'users[1].nodes[1]: expiresIn must be a duration such as 30m or 1d12h',
      'aliases.a.b: must be an array of strings',
      'permissions[0]: permission must be a non-empty string',
    ]);
  });

  it('should reject contexts without a value', () => {
    expect(
      issuesOf(() =>
        parseSnapshot({ users: [{ uuid: 'u-1', nodes: [{ permission: 'x', contexts: { world: '' } }] }] }, 'inline')
      )
    ).toEqual(['users[0].nodes[0]: context value cannot be empty']);
  });

  it('should reject a non-object snapshot', () => {
    expect(() => parseSnapshot([], 'inline')).toThrow(SnapshotError);
  });

  it('should summarise the issue count in the message', () => {
    expect(() => parseSnapshot({ groups: {} }, 'inline')).toThrow('Invalid snapshot inline: 1 issue');
  });
});

describe('loadSnapshot', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'permgraph-snapshot-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a file and find users by uuid or name', () => {
    const file = join(dir, 'snapshot.json');
    writeFileSync(file, JSON.stringify({ users: [{ uuid: 'u-1', username: 'Alice' }] }));
    const snapshot = loadSnapshot(file);
    expect(findUser(snapshot, 'u-1')?.username).toBe('Alice');
    expect(findUser(snapshot, 'ALICE')?.uuid).toBe('u-1');
    expect(findUser(snapshot, 'bob')).toBeUndefined();
  });

  it('should report unreadable and malformed files', () => {
    expect(() => loadSnapshot(join(dir, 'missing.json'))).toThrow(SnapshotError);

    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ not json');
    expect(() => loadSnapshot(file)).toThrow(`Snapshot ${file} is not valid JSON`);
  });
});
