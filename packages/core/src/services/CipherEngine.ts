import { type CipherConvention } from '../constants/defaults.js';
import type { DataTree } from '../entities/DataTree.js';
import { traversalOrders } from '../entities/TreeTraversal.js';
import {
  InvalidArgumentError,
  KeyMismatchError,
  MalformedCiphertextError,
  PlaintextTooLargeError,
  type TreeCipherError,
} from '../errors/index.js';
import { plaintextSchema, slotValue, type Ciphertext, type SlotValue } from '../schemas/ciphertext.js';
import type { NodeId } from '../schemas/tree.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, logError, startTimer } from '../utils/logger.js';

const logger = createModuleLogger('CipherEngine');

interface DecryptPlan {
  write: NodeId[];
  read: NodeId[];
  valueById: ReadonlyMap<NodeId, SlotValue>;
  length: number;
}

export interface CipherEngineOptions {
  /**
   * `id-to-bfs` writes plaintext in ascending-identifier order and reads the
   * ciphertext in BFS order; `bfs-to-id` swaps the two.
   * Defaults to `CIPHER_CONVENTION` from configuration.
   */
  convention?: CipherConvention;
}

/**
 * Encrypts and decrypts by moving values between two node orders of a tree.
 *
 * Both operations overwrite every data slot of the tree they are given, so a
 * tree must not be shared by overlapping calls. All input checks run before any
 * slot is written.
 */
export class CipherEngine {
  readonly convention: CipherConvention;

  constructor(options: CipherEngineOptions = {}) {
    this.convention = options.convention ?? cfg.CIPHER_CONVENTION;
  }

  encrypt(tree: DataTree, key: NodeId, plaintext: readonly number[]): Ciphertext {
    this.assertKey(tree, key, 'encrypt');
    this.validatePlaintext(plaintext);
    if (plaintext.length > tree.size) {
      this.fail(new PlaintextTooLargeError(plaintext.length, tree.size, 'encrypt'));
    }

    const endTimer = startTimer(logger, 'encrypt');
    const { write, read } = traversalOrders(tree.topology, this.convention);

    tree.clearData();
    plaintext.forEach((value, position) => {
      const id = write[position];
      if (id !== undefined) tree.getNode(id).data = value;
    });

    const ciphertext: Ciphertext = new Map();
    read.forEach((id, position) => ciphertext.set(position, tree.getNode(id).data));

    endTimer({ nodeCount: tree.size, plaintextLength: plaintext.length, convention: this.convention });
    return ciphertext;
  }

  /**
   * Check that every value is a safe integer, without touching any tree
   */
  validatePlaintext(plaintext: readonly number[]): void {
    const parsed = plaintextSchema.safeParse(plaintext);
    if (!parsed.success) {
      const position = parsed.error.issues[0]?.path[0];
      this.fail(
        new InvalidArgumentError(
          `Plaintext value at position ${String(position)} is not a safe integer`,
          'plaintext',
          'encrypt',
          { position }
        )
      );
    }
  }

  /**
   * Run every check `decrypt` runs and return the plaintext length, leaving the
   * data slots as they are.
   */
  inspect(tree: DataTree, key: NodeId, ciphertext: ReadonlyMap<number, SlotValue>): number {
    return this.planDecrypt(tree, key, ciphertext, 'inspect').length;
  }

  /**
   * Recover the plaintext. Its length is the number of leading non-null slots
   * in write order.
   */
  decrypt(tree: DataTree, key: NodeId, ciphertext: ReadonlyMap<number, SlotValue>): number[] {
    const { write, read, valueById, length } = this.planDecrypt(tree, key, ciphertext, 'decrypt');

    const endTimer = startTimer(logger, 'decrypt');
    read.forEach((id) => {
      tree.getNode(id).data = valueById.get(id) ?? null;
    });

    const plaintext: number[] = [];
    for (const id of write.slice(0, length)) {
      const value = tree.getNode(id).data;
      if (value !== null) plaintext.push(value);
    }

    endTimer({ nodeCount: tree.size, plaintextLength: plaintext.length, convention: this.convention });
    return plaintext;
  }

  private planDecrypt(
    tree: DataTree,
    key: NodeId,
    ciphertext: ReadonlyMap<number, SlotValue>,
    operation: string
  ): DecryptPlan {
    this.assertKey(tree, key, operation);

    if (ciphertext.size !== tree.size) {
      this.fail(
        new MalformedCiphertextError(
          `Ciphertext has ${ciphertext.size} entries but the tree has ${tree.size} nodes`,
          operation,
          { ciphertextSize: ciphertext.size, treeSize: tree.size }
        )
      );
    }

    const { write, read } = traversalOrders(tree.topology, this.convention);
    const valueById = new Map<NodeId, SlotValue>();

    read.forEach((id, position) => {
      const value = ciphertext.get(position);
      if (value === undefined) {
        this.fail(
          new MalformedCiphertextError(`Ciphertext has no value at position ${position}`, operation, {
            position,
          })
        );
      }
      if (!slotValue.safeParse(value).success) {
        this.fail(
          new MalformedCiphertextError(
            `Ciphertext value at position ${position} is not a safe integer or null`,
            operation,
            { position }
          )
        );
      }
      valueById.set(id, value);
    });

    // Assigned slots must form a prefix of the write order
    let length = 0;
    while (length < write.length && valueById.get(write[length]) !== null) {
      length++;
    }
    for (let position = length; position < write.length; position++) {
      if (valueById.get(write[position]) !== null) {
        this.fail(
          new MalformedCiphertextError(
            'Ciphertext has an assigned value after an unassigned slot',
            operation,
            { position }
          )
        );
      }
    }

    return { write, read, valueById, length };
  }

  private assertKey(tree: DataTree, key: NodeId, operation: string): void {
    if (key !== tree.root) {
      this.fail(new KeyMismatchError(key, operation));
    }
  }

  private fail(error: TreeCipherError): never {
    logError(logger, error, { operation: error.operation });
    throw error;
  }
}
