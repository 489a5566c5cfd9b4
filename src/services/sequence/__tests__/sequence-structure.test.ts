import { describe, it, expect } from 'vitest';
import { CommentBlock, DelayBlock, createBlock, type BaseBlock } from '../../blocks/index.js';
import { buildBlockTree, countNodes, type BlockNode } from '../sequence-structure.js';

function blocks(...kinds: string[]): BaseBlock[] {
  return kinds.map((kind, index) => createBlock(kind, `${kind}-${index}`));
}

function shape(nodes: BlockNode[]): unknown[] {
  return nodes.map((node) => ({
    id: node.block.id,
    body: shape(node.body),
    ...(node.elseBody ? { else: shape(node.elseBody) } : {}),
  }));
}

describe('buildBlockTree', () => {
  it('keeps a flat list flat', () => {
    const tree = buildBlockTree([new DelayBlock('a'), new CommentBlock('b')]);
    expect(tree.errors).toEqual([]);
    expect(shape(tree.nodes)).toEqual([
      { id: 'a', body: [] },
      { id: 'b', body: [] },
    ]);
  });

  it('nests the blocks between a scope opener and its End', () => {
    const tree = buildBlockTree(blocks('loop', 'delay', 'end', 'comment'));
    expect(tree.errors).toEqual([]);
    expect(shape(tree.nodes)).toEqual([
      { id: 'loop-0', body: [{ id: 'delay-1', body: [] }] },
      { id: 'comment-3', body: [] },
    ]);
    expect(tree.nodes[1].index).toBe(3);
  });

  it('splits an If scope at its Else', () => {
    const tree = buildBlockTree(blocks('if', 'delay', 'else', 'comment', 'end'));
    expect(tree.errors).toEqual([]);
    expect(shape(tree.nodes)).toEqual([
      {
        id: 'if-0',
        body: [{ id: 'delay-1', body: [] }],
        else: [{ id: 'comment-3', body: [] }],
      },
    ]);
  });

  it('nests scopes', () => {
    const tree = buildBlockTree(blocks('loop', 'if', 'delay', 'end', 'end'));
    expect(shape(tree.nodes)).toEqual([
      {
        id: 'loop-0',
        body: [{ id: 'if-1', body: [{ id: 'delay-2', body: [] }] }],
      },
    ]);
    expect(countNodes(tree.nodes)).toBe(3);
  });

  it.each([
    [['end'], 'Block 0 (End): no open scope to close'],
    [['loop', 'delay'], 'Block 0 (Loop): scope is never closed (missing End)'],
    [['else'], 'Block 0 (Else): Else must be inside an If scope'],
    [['loop', 'else', 'end'], 'Block 1 (Else): Else must be inside an If scope'],
    [['if', 'else', 'else', 'end'], 'Block 2 (Else): If scope already has an Else'],
  ])('reports %j', (kinds, error) => {
    expect(buildBlockTree(blocks(...kinds)).errors).toEqual([error]);
  });
});
