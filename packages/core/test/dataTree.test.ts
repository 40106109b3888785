import { describe, expect, it } from 'vitest';
import { DataTree } from '../src/entities/DataTree.js';
import { InvalidArgumentError, InvalidTreeError, NodeNotFoundError } from '../src/errors/index.js';
import { createAlignedTree, createCrossedTree } from './treeFixtures.js';

describe('DataTree', () => {
  describe('construction', () => {
    it('makes one-sided edge listings symmetric', () => {
      const tree = DataTree.fromAdjacency({
        root: 1,
        adjacency: { 1: [3, 4], 2: [], 3: [], 4: [2] },
      });

      expect(tree.toAdjacency()).toEqual({
        root: 1,
        adjacency: { 1: [3, 4], 2: [4], 3: [1], 4: [1, 2] },
      });
    });

    it('ignores edges listed twice', () => {
      const tree = DataTree.fromAdjacency({ root: 5, adjacency: { 5: [6, 6], 6: [5] } });

      expect(tree.edgeCount).toBe(1);
      expect(tree.getNode(5).neighbours).toEqual([6]);
    });

    it('survives a JSON round trip', () => {
      const tree = createCrossedTree();
      const copy = DataTree.fromAdjacency(JSON.parse(JSON.stringify(tree.toAdjacency())));

      expect(copy.root).toBe(1);
      expect(copy.getBfsIds()).toEqual([1, 3, 4, 2]);
    });

    it('rejects structures that are not a single tree', () => {
      expect(() => DataTree.fromAdjacency({ root: 1, adjacency: { 1: [2, 3], 2: [3], 3: [] } })).toThrow(
        InvalidTreeError
      );
      expect(() => DataTree.fromAdjacency({ root: 1, adjacency: { 1: [2], 2: [], 3: [] } })).toThrow(
        InvalidTreeError
      );
      expect(() => DataTree.fromAdjacency('not a tree')).toThrow(InvalidTreeError);
    });

    it('lists every structural problem on the error', () => {
      try {
        DataTree.fromAdjacency({ root: 9, adjacency: { 1: [1] } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidTreeError);
        expect(error).toMatchObject({
          errors: ['Node 1 lists itself as a neighbour', 'Root 9 is not a node of the tree'],
        });
      }
    });
  });

  describe('queries', () => {
    it('reports size, root and edges', () => {
      const tree = createAlignedTree();

      expect(tree.size).toBe(4);
      expect(tree.root).toBe(1);
      expect(tree.edgeCount).toBe(3);
      expect(tree.has(3)).toBe(true);
      expect(tree.has(5)).toBe(false);
    });

    it('orders identifiers by value and by BFS', () => {
      const tree = DataTree.fromAdjacency({
        root: 7,
        adjacency: { 7: [1, 5, 3], 1: [6], 5: [4], 3: [], 6: [], 4: [] },
      });

      expect(tree.getSortedIds()).toEqual([1, 3, 4, 5, 6, 7]);
      expect(tree.getBfsIds()).toEqual([7, 1, 3, 5, 6, 4]);
    });

    it('walks nodes breadth first with their depth', () => {
      const visits: string[] = [];
      createCrossedTree().walkBreadthFirst((node, depth) => visits.push(`${node.identifier}@${depth}`));

      expect(visits).toEqual(['1@0', '3@1', '4@1', '2@2']);
    });

    it('throws for an unknown node', () => {
      expect(() => createAlignedTree().getNode(99)).toThrow(NodeNotFoundError);
    });

    it('exposes a frozen topology', () => {
      const { topology } = createCrossedTree();

      expect(Object.isFrozen(topology)).toBe(true);
      expect(Object.isFrozen(topology.nodeIds)).toBe(true);
      expect(Object.isFrozen(topology.neighbours.get(1))).toBe(true);
    });
  });

  describe('data slots', () => {
    it('starts with every slot empty', () => {
      expect(createCrossedTree().getData()).toEqual([null, null, null, null]);
    });

    it('writes and reads values in BFS order', () => {
      const tree = createCrossedTree();
      tree.writeData([10, 20, null, 40]);

      expect(tree.getData()).toEqual([10, 20, null, 40]);
      expect(tree.getNode(3).data).toBe(20);
      expect(tree.getNode(2).data).toBe(40);
    });

    it('clears every slot', () => {
      const tree = createCrossedTree();
      tree.writeData([1, 2, 3, 4]);
      tree.clearData();

      expect(tree.getData()).toEqual([null, null, null, null]);
    });

    it('rejects writes of the wrong length or type', () => {
      const tree = createCrossedTree();

      expect(() => tree.writeData([1, 2, 3])).toThrow(InvalidArgumentError);
      expect(() => tree.writeData([1, 2, 3, 4.5])).toThrow('Value at position 3 is not a safe integer or null');
    });
  });
});
