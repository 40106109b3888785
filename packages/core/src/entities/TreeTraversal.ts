/**
 * Traversal orders over a tree topology.
 *
 * Everything here is a pure function of a {@link TreeTopology}; none of it
 * touches data slots.
 */

import type { NodeId } from '../schemas/tree.js';
import type { CipherConvention } from '../constants/defaults.js';

/**
 * Read-only structure of a tree. Neighbour lists are sorted ascending.
 */
export interface TreeTopology {
  readonly root: NodeId;
  readonly nodeIds: readonly NodeId[];
  readonly neighbours: ReadonlyMap<NodeId, readonly NodeId[]>;
}

/** Identifiers sorted ascending */
export function idOrder(topology: TreeTopology): NodeId[] {
  return [...topology.nodeIds].sort((a, b) => a - b);
}

/**
 * Breadth-first walk from the root. Neighbours of a node are enqueued in
 * ascending identifier order.
 */
export function walkBreadthFirst(
  topology: TreeTopology,
  visitor: (nodeId: NodeId, depth: number) => void
): void {
  const visited = new Set<NodeId>([topology.root]);
  const queue: Array<{ nodeId: NodeId; depth: number }> = [{ nodeId: topology.root, depth: 0 }];

  // Index-based dequeue keeps the walk linear
  for (let head = 0; head < queue.length; head++) {
    const item = queue[head];
    if (!item) break;
    visitor(item.nodeId, item.depth);

    for (const neighbour of topology.neighbours.get(item.nodeId) ?? []) {
      if (!visited.has(neighbour)) {
        visited.add(neighbour);
        queue.push({ nodeId: neighbour, depth: item.depth + 1 });
      }
    }
  }
}

export function bfsOrder(topology: TreeTopology): NodeId[] {
  const order: NodeId[] = [];
  walkBreadthFirst(topology, (nodeId) => order.push(nodeId));
  return order;
}

/**
 * The order values are written in during encryption and the order ciphertext is
 * read back in. Decryption uses the same pair the other way round.
 */
export function traversalOrders(
  topology: TreeTopology,
  convention: CipherConvention
): { write: NodeId[]; read: NodeId[] } {
  const byId = idOrder(topology);
  const byBfs = bfsOrder(topology);
  return convention === 'id-to-bfs' ? { write: byId, read: byBfs } : { write: byBfs, read: byId };
}

/**
 * Permutation π with `π[writePosition] = readPosition`: plaintext position i
 * ends up at ciphertext position π[i].
 */
export function computePermutation(topology: TreeTopology, convention: CipherConvention): number[] {
  const { write, read } = traversalOrders(topology, convention);
  const readPosition = new Map<NodeId, number>();
  read.forEach((nodeId, position) => readPosition.set(nodeId, position));
  return write.map((nodeId) => readPosition.get(nodeId) ?? -1);
}

export function invertPermutation(permutation: readonly number[]): number[] {
  const inverse = new Array<number>(permutation.length).fill(-1);
  permutation.forEach((target, source) => {
    inverse[target] = source;
  });
  return inverse;
}

/**
 * Whether the array is a permutation of `0 … length-1`
 */
export function isPermutation(values: readonly number[]): boolean {
  const seen = new Set<number>();
  for (const value of values) {
    if (!Number.isInteger(value) || value < 0 || value >= values.length || seen.has(value)) {
      return false;
    }
    seen.add(value);
  }
  return true;
}
