import { describe, expect, it, vi } from 'vitest';
import { ContextSet } from '../types/context';
import { createGroupLoader, type Group } from '../types/group';
import { Node } from '../types/node';
import type { Logger } from '../utils/logger';
import { InheritanceGraph } from './inheritance-graph';

function group(name: string, weight: number, parents: string[] = [], nodes: Node[] = []): Group {
  return { name, weight, parents, nodes };
}

function names(groups: Group[]): string[] {
  return groups.map((g) => g.name);
}

describe('InheritanceGraph', () => {
  it('should order ancestors by weight, lowest first', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([
        group('admin', 100, ['mod']),
        group('mod', 50, ['default']),
        group('default', 0),
      ])
    );
    expect(names(graph.resolveInheritance(['admin'], ContextSet.empty()))).toEqual([
      'default',
      'mod',
      'admin',
    ]);
  });

  it('should terminate on cycles and list each group once', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([group('a', 10, ['b']), group('b', 20, ['a'])])
    );
    expect(names(graph.resolveInheritance(['a'], ContextSet.empty()))).toEqual(['a', 'b']);
  });

  it('should visit diamond ancestors once', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([
        group('top', 30, ['left', 'right']),
        group('left', 20, ['base']),
        group('right', 20, ['base']),
        group('base', 10),
      ])
    );
    expect(names(graph.resolveInheritance(['top'], ContextSet.empty()))).toEqual([
      'base',
      'left',
      'right',
      'top',
    ]);
  });

  it('should skip missing groups and log them', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const graph = new InheritanceGraph(createGroupLoader([group('vip', 10, ['ghost'])]), {
      logger,
    });
    expect(names(graph.resolveInheritance(['vip', 'missing'], ContextSet.empty()))).toEqual([
      'vip',
    ]);
    expect(logger.debug).toHaveBeenCalledWith('Skipping missing group', { group: 'missing' });
    expect(logger.debug).toHaveBeenCalledWith('Skipping missing group', { group: 'ghost' });
  });

  it('should keep discovery order for equal weights by default', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([group('zeta', 5), group('alpha', 5)])
    );
    expect(names(graph.resolveInheritance(['zeta', 'alpha'], ContextSet.empty()))).toEqual([
      'zeta',
      'alpha',
    ]);
  });

  it('should order equal weights by name when asked', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([group('zeta', 5), group('alpha', 5)]),
      { tieBreak: 'name' }
    );
    expect(names(graph.resolveInheritance(['zeta', 'alpha'], ContextSet.empty()))).toEqual([
      'alpha',
      'zeta',
    ]);
  });

  it('should sort a NaN weight as 0', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([group('high', 10), group('odd', Number.NaN), group('low', -5)])
    );
    expect(names(graph.resolveInheritance(['high', 'odd', 'low'], ContextSet.empty()))).toEqual([
      'low',
      'odd',
      'high',
    ]);
  });

  it('should follow group nodes only where their contexts apply', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([
        group('member', 10, [], [Node.builder('group.builder').world('creative').build()]),
        group('builder', 20),
      ])
    );
    expect(names(graph.resolveInheritance(['member'], ContextSet.empty()))).toEqual(['member']);
    expect(
      names(graph.resolveInheritance(['member'], ContextSet.of(['world', 'creative'])))
    ).toEqual(['member', 'builder']);
  });

  it('should drop expired group nodes using the clock', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([
        group('member', 10, [], [Node.builder('group.trial').expiry(1000).build()]),
        group('trial', 20),
      ]),
      { clock: () => 2000 }
    );
    expect(names(graph.resolveInheritance(['member'], ContextSet.empty()))).toEqual(['member']);
  });

  it('should collect applicable permission nodes in group order', () => {
    const nodes = [
      Node.of('chat.use'),
      Node.group('other'),
      Node.builder('fly.use').world('end').build(),
      Node.builder('old.perm').expiry(1).build(),
    ];
    const graph = new InheritanceGraph(createGroupLoader([]), { clock: () => 10 });
    const collected = graph.collectNodes([group('g', 0, [], nodes)], ContextSet.empty());
    expect(collected.map((n) => n.permission)).toEqual(['chat.use']);
  });

  it('should filter nodes the same way for any node list', () => {
    const graph = new InheritanceGraph(createGroupLoader([]), { clock: () => 10 });
    const nodes = [
      Node.of('chat.use'),
      Node.group('other'),
      Node.builder('fly.use').world('end').build(),
      Node.builder('old.perm').expiry(5).build(),
    ];
    expect(graph.filterNodes(nodes, ContextSet.of(['world', 'end'])).map((n) => n.permission)).toEqual([
      'chat.use',
      'fly.use',
    ]);
    expect(graph.filterNodes(nodes, ContextSet.empty(), 0).map((n) => n.permission)).toEqual([
      'chat.use',
      'old.perm',
    ]);
  });

  it('should detect a parent edge that would close a cycle', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([
        group('admin', 100, ['mod']),
        group('mod', 50, [], [Node.builder('group.default').world('end').build()]),
        group('default', 0),
      ])
    );
    const defaultGroup = group('default', 0);
    expect(graph.wouldCreateCycle(defaultGroup, 'Admin')).toBe(true);
    expect(graph.wouldCreateCycle(group('admin', 100), 'default')).toBe(false);
    expect(graph.wouldCreateCycle(group('solo', 0), 'solo')).toBe(true);
  });

  it('should report the inheritance chain for display', () => {
    const graph = new InheritanceGraph(
      createGroupLoader([group('mod', 50, ['default']), group('default', 0)])
    );
    expect(graph.getInheritanceChain('MOD')).toEqual(['default', 'mod']);
  });
});
