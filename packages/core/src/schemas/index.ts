/**
 * Schema exports - Single source of truth for all Zod schemas and types
 */

export {
  nodeId,
  nodeIdKey,
  serializedTreeSchema,
  type NodeId,
  type SerializedTree,
} from './tree.js';

export {
  slotValue,
  plaintextSchema,
  ciphertextSequenceSchema,
  type SlotValue,
  type Plaintext,
  type CiphertextSequence,
  type Ciphertext,
} from './ciphertext.js';
