import { z } from 'zod';
import type { CipherConvention } from './constants/defaults.js';
import { ciphertextFromSequence, ciphertextToSequence } from './entities/Ciphertext.js';
import { DataTree } from './entities/DataTree.js';
import { isTreeCipherError, KeyMismatchError, MalformedCiphertextError } from './errors/index.js';
import { ciphertextSequenceSchema, type CiphertextSequence, type SlotValue } from './schemas/ciphertext.js';
import type { NodeId, SerializedTree } from './schemas/tree.js';
import { CipherEngine } from './services/CipherEngine.js';
import { generateTree } from './services/TreeGenerator.js';
import { cfg } from './utils/config.js';
import { createModuleLogger, logError } from './utils/logger.js';
import type { RandomSource, Seed } from './utils/random.js';

const logger = createModuleLogger('TreeSubCipher');

const blocksSchema = z.array(ciphertextSequenceSchema);

export interface TreeSubCipherOptions {
  convention?: CipherConvention;
}

export interface RandomTreeSubCipherOptions extends TreeSubCipherOptions {
  /** Nodes in the block tree; defaults to `CIPHER_BLOCK_SIZE` */
  blockSize?: number;
  /** Seed for the block tree; defaults to the key itself */
  seed?: Seed;
  random?: RandomSource;
}

/**
 * One block tree bound to its key.
 *
 * Messages of any length are split into blocks of the tree's size; each block
 * is encrypted on its own and the last may be short.
 *
 * @example
 * ```typescript
 * const cipher = TreeSubCipher.random(42);
 * const blocks = cipher.encrypt([3, 1, 4, 1, 5]);
 *
 * const peer = TreeSubCipher.fromAdjacency(cipher.getAdjacency(), 42);
 * peer.decrypt(blocks); // [3, 1, 4, 1, 5]
 * ```
 */
export class TreeSubCipher {
  private readonly engine: CipherEngine;

  private constructor(
    private readonly blockTree: DataTree,
    readonly key: NodeId,
    options: TreeSubCipherOptions
  ) {
    if (blockTree.root !== key) {
      const error = new KeyMismatchError(key, 'bind');
      logError(logger, error, { operation: 'bind' });
      throw error;
    }
    this.engine = new CipherEngine({ convention: options.convention });
  }

  /**
   * Random block tree rooted at `key`
   */
  static random(key: NodeId, options: RandomTreeSubCipherOptions = {}): TreeSubCipher {
    const { tree } = generateTree(options.blockSize ?? cfg.CIPHER_BLOCK_SIZE, {
      rootId: key,
      seed: options.seed ?? key,
      random: options.random,
    });
    return new TreeSubCipher(tree, key, options);
  }

  static fromAdjacency(
    data: unknown,
    key: NodeId,
    options: TreeSubCipherOptions = {}
  ): TreeSubCipher {
    return new TreeSubCipher(DataTree.fromAdjacency(data), key, options);
  }

  static fromTree(tree: DataTree, key: NodeId, options: TreeSubCipherOptions = {}): TreeSubCipher {
    return new TreeSubCipher(tree, key, options);
  }

  get blockSize(): number {
    return this.blockTree.size;
  }

  get convention(): CipherConvention {
    return this.engine.convention;
  }

  getAdjacency(): SerializedTree {
    return this.blockTree.toAdjacency();
  }

  getTree(): DataTree {
    return this.blockTree;
  }

  /** Current data slots in BFS order */
  getData(): SlotValue[] {
    return this.blockTree.getData();
  }

  /**
   * Encrypt a message block by block. The whole message is checked before the
   * first block is written.
   */
  encrypt(message: readonly number[]): CiphertextSequence[] {
    this.engine.validatePlaintext(message);

    const blocks: CiphertextSequence[] = [];
    for (let start = 0; start < message.length; start += this.blockSize) {
      const block = message.slice(start, start + this.blockSize);
      blocks.push(ciphertextToSequence(this.engine.encrypt(this.blockTree, this.key, block)));
    }
    logger.debug({ blocks: blocks.length, messageLength: message.length }, 'Message encrypted');
    return blocks;
  }

  /**
   * Decrypt serialized blocks. Every block but the last must decode to a full
   * block, and the last must not be empty. All blocks are checked before any
   * slot is written; errors from a block carry its index as `context.block`.
   */
  decrypt(blocks: unknown): number[] {
    const parsed = blocksSchema.safeParse(blocks);
    if (!parsed.success) {
      this.fail(new MalformedCiphertextError('Ciphertext blocks are malformed', 'decryptBlocks'));
    }

    const sequences = parsed.data;
    const ciphertexts = sequences.map((sequence, index) =>
      this.inBlock(index, () => {
        const ciphertext = ciphertextFromSequence(sequence);
        const length = this.engine.inspect(this.blockTree, this.key, ciphertext);
        const isLast = index === sequences.length - 1;

        if (!isLast && length !== this.blockSize) {
          this.fail(
            new MalformedCiphertextError(`Block ${index} is short but is not the last block`, 'decryptBlocks')
          );
        }
        if (isLast && length === 0) {
          this.fail(new MalformedCiphertextError(`Block ${index} is empty`, 'decryptBlocks'));
        }
        return ciphertext;
      })
    );

    const message: number[] = [];
    for (const ciphertext of ciphertexts) {
      message.push(...this.engine.decrypt(this.blockTree, this.key, ciphertext));
    }
    return message;
  }

  private inBlock<T>(index: number, run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (isTreeCipherError(error)) {
        throw error.withContext({ block: index });
      }
      throw error;
    }
  }

  private fail(error: MalformedCiphertextError): never {
    logError(logger, error, { operation: error.operation });
    throw error;
  }
}
