import { DataTree } from '../src/entities/DataTree.js';

/**
 * Tree whose BFS order equals its identifier order: 1-2, 1-3, 3-4
 */
export function createAlignedTree(): DataTree {
  return DataTree.fromAdjacency({
    root: 1,
    adjacency: { 1: [2, 3], 2: [1], 3: [1, 4], 4: [3] },
  });
}

/**
 * Tree whose BFS order [1, 3, 4, 2] differs from identifier order: 1-3, 1-4, 4-2
 */
export function createCrossedTree(): DataTree {
  return DataTree.fromAdjacency({
    root: 1,
    adjacency: { 1: [3, 4], 2: [4], 3: [1], 4: [1, 2] },
  });
}

export function sampleValues(length: number, offset = 0): number[] {
  return Array.from({ length }, (_, i) => ((i + offset) * 7919) % 1000 - 500);
}
