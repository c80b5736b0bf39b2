import { ContextSet, createGroupLoader, Node } from '@permgraph/core';
import { describe, expect, it } from 'vitest';
import { buildGroupTree } from './group';

describe('buildGroupTree', () => {
  const loader = createGroupLoader([
    { name: 'a', weight: 1, parents: ['b', 'ghost'], nodes: [] },
    { name: 'b', weight: 2, parents: ['a'], nodes: [Node.builder('group.c').world('end').build()] },
    { name: 'c', weight: 3, nodes: [] },
  ]);

  it('should stop at cycles and missing groups', () => {
    expect(buildGroupTree('A', loader, ContextSet.empty())).toEqual({
      name: 'a',
      weight: 1,
      parents: [
        {
          name: 'b',
          weight: 2,
          parents: [{ name: 'a', weight: 1, cycle: true, parents: [] }],
        },
        { name: 'ghost', weight: 0, missing: true, parents: [] },
      ],
    });
  });

  it('should follow context-bound parents', () => {
    const tree = buildGroupTree('b', loader, ContextSet.of(['world', 'end']));
    expect(tree.parents.map((p) => p.name)).toEqual(['a', 'c']);
  });
});
