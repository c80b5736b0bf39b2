import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../utils/logger';
import { PermissionRegistry } from './permission-registry';

function registry(): PermissionRegistry {
  const r = new PermissionRegistry();
  r.registerAll(
    {
      'build.place': 'Place blocks',
      'build.break': 'Break blocks',
      'build.*': 'All build permissions',
    },
    'Build'
  );
  r.register('chat.color', 'Colored chat messages', 'chat', 'chatplus');
  return r;
}

describe('PermissionRegistry', () => {
  it('should register once and normalise case', () => {
    const r = new PermissionRegistry();
    expect(r.register('Fly.Use', 'Fly', 'Movement')).toBe(true);
    expect(r.register('fly.use', 'Again', 'movement')).toBe(false);
    expect(r.get('FLY.USE')).toEqual({
      permission: 'fly.use',
      description: 'Fly',
      category: 'movement',
      source: 'permgraph',
      isWildcard: false,
    });
  });

  it('should log registrations at debug level', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    new PermissionRegistry({ logger }).register('a.b', 'A', 'misc');
    expect(logger.debug).toHaveBeenCalledWith('Registered permission', {
      permission: 'a.b',
      category: 'misc',
      source: 'permgraph',
    });
  });

  it('should group by category and source', () => {
    const r = registry();
    expect(r.size()).toBe(4);
    expect(r.getCategories()).toEqual(['build', 'chat']);
    expect(r.getByCategory('BUILD').map((p) => p.permission)).toEqual([
      'build.*',
      'build.break',
      'build.place',
    ]);
    expect(r.getBySource('ChatPlus').map((p) => p.permission)).toEqual(['chat.color']);
    expect(r.getByCategory('none')).toEqual([]);
  });

  it('should search names and descriptions', () => {
    const r = registry();
    expect(r.search('blocks').map((p) => p.permission)).toEqual(['build.break', 'build.place']);
    expect(r.search('CHAT').map((p) => p.permission)).toEqual(['chat.color']);
  });

  it('should unregister', () => {
    const r = registry();
    expect(r.unregister('build.break')).toBe(true);
    expect(r.unregister('build.break')).toBe(false);
    expect(r.isRegistered('build.break')).toBe(false);
    expect(r.getByCategory('build').map((p) => p.permission)).toEqual(['build.*', 'build.place']);
  });

  it('should list permissions covered by a wildcard', () => {
    const r = registry();
    expect(Array.from(r.getMatchingPermissions('*')).sort()).toEqual([
      'build.break',
      'build.place',
      'chat.color',
    ]);
    expect(Array.from(r.getMatchingPermissions('Build.*')).sort()).toEqual([
      'build.break',
      'build.place',
    ]);
    expect(r.getMatchingPermissions('build.place').size).toBe(0);
  });

  it('should clear everything', () => {
    const r = registry();
    r.clear();
    expect(r.size()).toBe(0);
    expect(r.getCategories()).toEqual([]);
  });
});
