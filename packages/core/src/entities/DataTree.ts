import { InvalidArgumentError, InvalidTreeError, NodeNotFoundError } from '../errors/index.js';
import type { NodeId, SerializedTree } from '../schemas/tree.js';
import type { SlotValue } from '../schemas/ciphertext.js';
import { slotValue } from '../schemas/ciphertext.js';
import {
  analyzeSerializedTree,
  analyzeTopology,
  type TopologyAnalysis,
} from '../validation/tree-validation.js';
import { bfsOrder, idOrder, walkBreadthFirst, type TreeTopology } from './TreeTraversal.js';

/**
 * Graph node holding its identifier, its neighbours and one data slot
 */
export interface DataNode {
  readonly identifier: NodeId;
  readonly neighbours: readonly NodeId[];
  data: SlotValue;
}

/**
 * Undirected tree whose nodes carry one integer data slot each.
 *
 * Topology is fixed at construction: there is no API to add or remove nodes or
 * edges. The data slots are the only mutable state and are rewritten by every
 * encrypt/decrypt.
 *
 * @example
 * ```typescript
 * //     .-7-.
 * //    /  |  \
 * //    1  5  3
 * //    |  |
 * //    6  4
 * const tree = DataTree.fromAdjacency({
 *   root: 7,
 *   adjacency: { 7: [1, 5, 3], 1: [6], 5: [4], 3: [], 6: [], 4: [] },
 * });
 * tree.getBfsIds(); // [7, 1, 3, 5, 6, 4]
 * ```
 */
export class DataTree {
  private readonly _root: NodeId;
  private readonly _nodes: Map<NodeId, DataNode>;
  private readonly _topology: TreeTopology;

  private constructor(analysis: TopologyAnalysis) {
    this._root = analysis.root;
    this._nodes = new Map();

    for (const id of analysis.nodeIds) {
      const neighbours = Object.freeze([...(analysis.neighbours.get(id) ?? [])]);
      this._nodes.set(id, { identifier: id, neighbours, data: null });
    }

    const adjacency = new Map<NodeId, readonly NodeId[]>();
    for (const node of this._nodes.values()) {
      adjacency.set(node.identifier, node.neighbours);
    }

    this._topology = Object.freeze({
      root: this._root,
      nodeIds: Object.freeze([...analysis.nodeIds]),
      neighbours: adjacency,
    });
  }

  /**
   * Build a tree from the serialized adjacency format. Edges listed from one side
   * only are made symmetric.
   *
   * @throws InvalidTreeError when the input is not a single connected tree
   */
  static fromAdjacency(data: unknown): DataTree {
    return DataTree.fromAnalysis(analyzeSerializedTree(data));
  }

  /**
   * Build a tree from in-memory neighbour lists, keeping the map's iteration
   * order as the node order.
   */
  static fromNeighbours(root: NodeId, neighbours: ReadonlyMap<NodeId, readonly NodeId[]>): DataTree {
    return DataTree.fromAnalysis(analyzeTopology(root, [...neighbours]));
  }

  private static fromAnalysis(analysis: TopologyAnalysis): DataTree {
    if (analysis.errors.length > 0) {
      throw new InvalidTreeError(
        `Invalid tree: ${analysis.errors[0]?.message}`,
        analysis.errors.map((error) => error.message)
      );
    }
    return new DataTree(analysis);
  }

  get root(): NodeId {
    return this._root;
  }

  get size(): number {
    return this._nodes.size;
  }

  get edgeCount(): number {
    let degreeSum = 0;
    for (const node of this._nodes.values()) {
      degreeSum += node.neighbours.length;
    }
    return degreeSum / 2;
  }

  /**
   * Frozen view of the structure that the traversal orders are computed from
   */
  get topology(): TreeTopology {
    return this._topology;
  }

  has(identifier: NodeId): boolean {
    return this._nodes.has(identifier);
  }

  getNode(identifier: NodeId): DataNode {
    const node = this._nodes.get(identifier);
    if (!node) {
      throw new NodeNotFoundError(identifier, 'getNode');
    }
    return node;
  }

  /** Identifiers in node order */
  getIds(): NodeId[] {
    return [...this._topology.nodeIds];
  }

  getSortedIds(): NodeId[] {
    return idOrder(this._topology);
  }

  getBfsIds(): NodeId[] {
    return bfsOrder(this._topology);
  }

  walkBreadthFirst(visitor: (node: DataNode, depth: number) => void): void {
    walkBreadthFirst(this._topology, (id, depth) => visitor(this.getNode(id), depth));
  }

  /** Data slots in BFS order */
  getData(): SlotValue[] {
    return this.getBfsIds().map((id) => this.getNode(id).data);
  }

  /**
   * Write one value per node in BFS order
   */
  writeData(values: readonly SlotValue[]): void {
    if (values.length !== this.size) {
      throw new InvalidArgumentError(
        `Expected ${this.size} values, got ${values.length}`,
        'values',
        'writeData'
      );
    }
    const invalid = values.findIndex((value) => !slotValue.safeParse(value).success);
    if (invalid !== -1) {
      throw new InvalidArgumentError(
        `Value at position ${invalid} is not a safe integer or null`,
        'values',
        'writeData',
        { position: invalid }
      );
    }

    this.getBfsIds().forEach((id, position) => {
      this.getNode(id).data = values[position] ?? null;
    });
  }

  clearData(): void {
    for (const node of this._nodes.values()) {
      node.data = null;
    }
  }

  /**
   * Serialize the topology: identifier → neighbour identifiers ascending.
   * Data slots are not included.
   */
  toAdjacency(): SerializedTree {
    const adjacency: Record<string, NodeId[]> = {};
    for (const node of this._nodes.values()) {
      adjacency[String(node.identifier)] = [...node.neighbours];
    }
    return { root: this._root, adjacency };
  }
}
