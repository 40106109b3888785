import { nodeIdKey, serializedTreeSchema } from '../schemas/tree.js';

/**
 * Structural validation for serialized trees
 *
 * A serialized tree is valid when it parses, its root is one of its nodes, every
 * neighbour it names is a node, and the undirected graph it describes is
 * connected with exactly `nodes - 1` edges.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  type:
    | 'malformed_tree'
    | 'invalid_key'
    | 'missing_root'
    | 'unknown_neighbour'
    | 'self_loop'
    | 'cycle'
    | 'disconnected';
  nodeId?: number;
  message: string;
}

/**
 * Result of analysing a topology: the errors found and, when there are none,
 * the symmetric neighbour lists sorted ascending.
 */
export interface TopologyAnalysis {
  errors: ValidationError[];
  root: number;
  nodeIds: number[];
  neighbours: Map<number, number[]>;
}

/**
 * Check a root and a neighbour listing for tree structure. Listings may name an
 * edge from one side only; every listed edge is made symmetric.
 */
export function analyzeTopology(
  root: number,
  entries: ReadonlyArray<readonly [number, readonly number[]]>
): TopologyAnalysis {
  const errors: ValidationError[] = [];
  const nodeIds: number[] = [];
  const linked = new Map<number, Set<number>>();

  for (const [id] of entries) {
    nodeIds.push(id);
    linked.set(id, new Set());
  }

  let edgeCount = 0;
  for (const [id, neighbourIds] of entries) {
    for (const neighbourId of neighbourIds) {
      if (neighbourId === id) {
        errors.push({ type: 'self_loop', nodeId: id, message: `Node ${id} lists itself as a neighbour` });
        continue;
      }
      const other = linked.get(neighbourId);
      if (!other) {
        errors.push({
          type: 'unknown_neighbour',
          nodeId: id,
          message: `Node ${id} lists unknown neighbour ${neighbourId}`,
        });
        continue;
      }
      const own = linked.get(id);
      if (!own || own.has(neighbourId)) continue;
      own.add(neighbourId);
      other.add(id);
      edgeCount++;
    }
  }

  if (!linked.has(root)) {
    errors.push({ type: 'missing_root', nodeId: root, message: `Root ${root} is not a node of the tree` });
  }

  if (nodeIds.length > 0 && edgeCount > nodeIds.length - 1) {
    errors.push({
      type: 'cycle',
      message: `Tree with ${nodeIds.length} nodes has ${edgeCount} edges; a tree has exactly ${nodeIds.length - 1}`,
    });
  }

  if (linked.has(root)) {
    const reached = new Set<number>([root]);
    const queue: number[] = [root];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of linked.get(current) ?? []) {
        if (!reached.has(next)) {
          reached.add(next);
          queue.push(next);
        }
      }
    }
    if (reached.size !== nodeIds.length) {
      errors.push({
        type: 'disconnected',
        message: `Only ${reached.size} of ${nodeIds.length} nodes are reachable from root ${root}`,
      });
    }
  }

  const neighbours = new Map<number, number[]>();
  for (const [id, set] of linked) {
    neighbours.set(id, [...set].sort((a, b) => a - b));
  }

  return { errors, root, nodeIds, neighbours };
}

/**
 * Parse a serialized tree and analyse its structure
 */
export function analyzeSerializedTree(data: unknown): TopologyAnalysis {
  const parsed = serializedTreeSchema.safeParse(data);
  if (!parsed.success) {
    return {
      errors: parsed.error.issues.map((issue) => ({
        type: 'malformed_tree' as const,
        message: `${issue.path.join('.') || 'tree'}: ${issue.message}`,
      })),
      root: -1,
      nodeIds: [],
      neighbours: new Map(),
    };
  }

  const keyErrors: ValidationError[] = [];
  const entries: Array<readonly [number, readonly number[]]> = [];
  for (const [key, neighbourIds] of Object.entries(parsed.data.adjacency)) {
    const id = nodeIdKey.safeParse(key);
    if (!id.success) {
      keyErrors.push({ type: 'invalid_key', message: `Adjacency key "${key}" is not a node identifier` });
      continue;
    }
    entries.push([id.data, neighbourIds]);
  }

  if (keyErrors.length > 0) {
    return { errors: keyErrors, root: parsed.data.root, nodeIds: [], neighbours: new Map() };
  }

  return analyzeTopology(parsed.data.root, entries);
}

/**
 * Validate a serialized tree without throwing
 */
export function validateTreeStructure(data: unknown): ValidationResult {
  const { errors } = analyzeSerializedTree(data);
  return { isValid: errors.length === 0, errors };
}
