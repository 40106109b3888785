import { DEFAULT_CONFIG } from '../constants/defaults.js';
import { DataTree } from '../entities/DataTree.js';
import { InvalidArgumentError } from '../errors/index.js';
import { nodeId, type NodeId } from '../schemas/tree.js';
import { logError, createModuleLogger, startTimer } from '../utils/logger.js';
import { createRandomSource, type RandomSource, type Seed } from '../utils/random.js';

const logger = createModuleLogger('TreeGenerator');

// Identifiers are drawn from [0, 2^ID_BITS); more nodes than that cannot be unique
const ID_SPACE = 2 ** DEFAULT_CONFIG.ID_BITS;

export interface GenerateOptions {
  /** Seed for reproducible trees; ignored when `random` is given */
  seed?: Seed;
  /** Injected random source */
  random?: RandomSource;
  /** Identifier forced onto the root, i.e. a caller-chosen key */
  rootId?: NodeId;
}

export interface GeneratedTree {
  tree: DataTree;
  /** The root identifier; the shared secret */
  key: NodeId;
}

/**
 * Random recursive tree growth: every new node is attached to an existing node
 * chosen uniformly, so the result is connected and acyclic by construction.
 */
export class TreeGenerator {
  generate(nodeCount: number, options: GenerateOptions = {}): GeneratedTree {
    this.validate(nodeCount, options);
    const endTimer = startTimer(logger, 'generateTree');

    const random = options.random ?? createRandomSource(options.seed);
    const root = options.rootId ?? random.nextUint32();

    const used: NodeId[] = [root];
    const usedSet = new Set<NodeId>(used);
    const neighbours = new Map<NodeId, NodeId[]>([[root, []]]);

    for (let created = 1; created < nodeCount; created++) {
      let id = random.nextUint32();
      while (usedSet.has(id)) {
        id = random.nextUint32();
      }

      const ancestor = used[random.nextInt(used.length)] ?? root;
      neighbours.get(ancestor)?.push(id);
      neighbours.set(id, [ancestor]);
      used.push(id);
      usedSet.add(id);
    }

    // Growth order would otherwise show through the node order
    const shuffled = new Map<NodeId, NodeId[]>();
    for (const id of random.shuffle([...used])) {
      shuffled.set(id, neighbours.get(id) ?? []);
    }

    const tree = DataTree.fromNeighbours(root, shuffled);
    endTimer({ nodeCount, edgeCount: tree.edgeCount });
    return { tree, key: root };
  }

  private validate(nodeCount: number, options: GenerateOptions): void {
    let error: InvalidArgumentError | null = null;

    if (!Number.isInteger(nodeCount) || nodeCount < 1) {
      error = new InvalidArgumentError(
        `nodeCount must be a positive integer, got ${nodeCount}`,
        'nodeCount',
        'generate',
        { nodeCount }
      );
    } else if (nodeCount > ID_SPACE) {
      error = new InvalidArgumentError(
        `nodeCount must not exceed ${ID_SPACE}, got ${nodeCount}`,
        'nodeCount',
        'generate',
        { nodeCount }
      );
    } else if (options.rootId !== undefined && !nodeId.safeParse(options.rootId).success) {
      error = new InvalidArgumentError(
        'rootId must be a non-negative safe integer',
        'rootId',
        'generate'
      );
    }

    if (error) {
      logError(logger, error, { operation: 'generate' });
      throw error;
    }
  }
}

/**
 * Generate a random tree of `nodeCount` nodes and return it with its key
 */
export function generateTree(nodeCount: number, options: GenerateOptions = {}): GeneratedTree {
  return new TreeGenerator().generate(nodeCount, options);
}
