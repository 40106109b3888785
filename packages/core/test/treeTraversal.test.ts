import { describe, expect, it } from 'vitest';
import {
  bfsOrder,
  computePermutation,
  idOrder,
  invertPermutation,
  isPermutation,
  traversalOrders,
  walkBreadthFirst,
} from '../src/entities/TreeTraversal.js';
import { generateTree } from '../src/services/TreeGenerator.js';
import { createAlignedTree, createCrossedTree } from './treeFixtures.js';

describe('TreeTraversal', () => {
  describe('orders', () => {
    it('visits the aligned tree in identifier order', () => {
      const { topology } = createAlignedTree();

      expect(idOrder(topology)).toEqual([1, 2, 3, 4]);
      expect(bfsOrder(topology)).toEqual([1, 2, 3, 4]);
    });

    it('breaks BFS ties by ascending identifier', () => {
      const { topology } = createCrossedTree();

      expect(idOrder(topology)).toEqual([1, 2, 3, 4]);
      expect(bfsOrder(topology)).toEqual([1, 3, 4, 2]);
    });

    it('reports the depth of every visited node', () => {
      const visits: Array<[number, number]> = [];
      walkBreadthFirst(createCrossedTree().topology, (nodeId, depth) => visits.push([nodeId, depth]));

      expect(visits).toEqual([
        [1, 0],
        [3, 1],
        [4, 1],
        [2, 2],
      ]);
    });

    it('swaps write and read orders between conventions', () => {
      const { topology } = createCrossedTree();

      expect(traversalOrders(topology, 'id-to-bfs')).toEqual({ write: [1, 2, 3, 4], read: [1, 3, 4, 2] });
      expect(traversalOrders(topology, 'bfs-to-id')).toEqual({ write: [1, 3, 4, 2], read: [1, 2, 3, 4] });
    });
  });

  describe('permutation', () => {
    it('is the identity when both orders coincide', () => {
      expect(computePermutation(createAlignedTree().topology, 'id-to-bfs')).toEqual([0, 1, 2, 3]);
    });

    it('maps each write position to its read position', () => {
      const { topology } = createCrossedTree();

      expect(computePermutation(topology, 'id-to-bfs')).toEqual([0, 3, 1, 2]);
      expect(computePermutation(topology, 'bfs-to-id')).toEqual([0, 2, 3, 1]);
    });

    it('inverts one convention into the other', () => {
      const { topology } = createCrossedTree();
      const forward = computePermutation(topology, 'id-to-bfs');

      expect(invertPermutation(forward)).toEqual(computePermutation(topology, 'bfs-to-id'));
      expect(invertPermutation(invertPermutation(forward))).toEqual(forward);
    });

    it('is a bijection for generated trees', () => {
      for (const nodeCount of [1, 2, 7, 16, 64]) {
        const { tree } = generateTree(nodeCount, { seed: `perm-${nodeCount}` });
        const permutation = computePermutation(tree.topology, 'id-to-bfs');

        expect(permutation).toHaveLength(nodeCount);
        expect(isPermutation(permutation)).toBe(true);
      }
    });
  });

  describe('isPermutation', () => {
    it('accepts permutations', () => {
      expect(isPermutation([])).toBe(true);
      expect(isPermutation([2, 0, 1])).toBe(true);
    });

    it('rejects collisions and gaps', () => {
      expect(isPermutation([0, 0, 1])).toBe(false);
      expect(isPermutation([0, 3])).toBe(false);
      expect(isPermutation([0, -1])).toBe(false);
    });
  });
});
