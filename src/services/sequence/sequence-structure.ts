/**
 * Sequence Structure
 *
 * Turns the flat block list into a tree of scopes. Loop, While, If, Try and
 * Parallel open a scope that the next unmatched End closes; an Else inside an
 * If scope starts its else-body. Markers themselves do not become nodes.
 */

import type { BaseBlock } from '../blocks/index.js';

export interface BlockNode {
  block: BaseBlock;
  /** Position of the block in the flat sequence */
  index: number;
  body: BlockNode[];
  /** Present only on If nodes that have an Else */
  elseBody: BlockNode[] | null;
}

export interface BlockTree {
  nodes: BlockNode[];
  errors: string[];
}

interface OpenScope {
  node: BlockNode;
  inElse: boolean;
}

function location(block: BaseBlock, index: number): string {
  return `Block ${index} (${block.name})`;
}

export function buildBlockTree(blocks: readonly BaseBlock[]): BlockTree {
  const nodes: BlockNode[] = [];
  const errors: string[] = [];
  const open: OpenScope[] = [];

  const target = (): BlockNode[] => {
    const scope = open[open.length - 1];
    if (!scope) return nodes;
    return scope.inElse && scope.node.elseBody ? scope.node.elseBody : scope.node.body;
  };

  blocks.forEach((block, index) => {
    switch (block.structure) {
      case 'closes_scope': {
        if (!open.pop()) {
          errors.push(`${location(block, index)}: no open scope to close`);
        }
        return;
      }

      case 'branch': {
        const scope = open[open.length - 1];
        if (!scope || scope.node.block.kind !== 'if') {
          errors.push(`${location(block, index)}: Else must be inside an If scope`);
        } else if (scope.inElse) {
          errors.push(`${location(block, index)}: If scope already has an Else`);
        } else {
          scope.inElse = true;
          scope.node.elseBody = [];
        }
        return;
      }

      default: {
        const node: BlockNode = { block, index, body: [], elseBody: null };
        target().push(node);
        if (block.structure === 'opens_scope') {
          open.push({ node, inElse: false });
        }
      }
    }
  });

  for (const { node } of open) {
    errors.push(`${location(node.block, node.index)}: scope is never closed (missing End)`);
  }

  return { nodes, errors };
}

/**
 * Number of executable (non-marker) blocks in a tree
 */
export function countNodes(nodes: readonly BlockNode[]): number {
  return nodes.reduce(
    (total, node) => total + 1 + countNodes(node.body) + countNodes(node.elseBody ?? []),
    0
  );
}
