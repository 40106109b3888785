/**
 * Tree substitution cipher
 *
 * A random tree and its root identifier (the key) define a permutation between
 * ascending-identifier order and breadth-first order; encryption moves a
 * plaintext through that permutation and decryption moves it back.
 *
 * This is a teaching toy, not a secure cipher.
 */

// Facade
export {
  TreeSubCipher,
  type TreeSubCipherOptions,
  type RandomTreeSubCipherOptions,
} from './TreeSubCipher.js';

// Services
export { CipherEngine, type CipherEngineOptions } from './services/CipherEngine.js';
export {
  TreeGenerator,
  generateTree,
  type GenerateOptions,
  type GeneratedTree,
} from './services/TreeGenerator.js';

// Tree model
export { DataTree, type DataNode } from './entities/DataTree.js';
export {
  idOrder,
  bfsOrder,
  walkBreadthFirst,
  traversalOrders,
  computePermutation,
  invertPermutation,
  isPermutation,
  type TreeTopology,
} from './entities/TreeTraversal.js';
export { ciphertextToSequence, ciphertextFromSequence } from './entities/Ciphertext.js';

// Validation
export {
  validateTreeStructure,
  type ValidationResult,
  type ValidationError,
} from './validation/tree-validation.js';

// Schemas
export {
  nodeId,
  serializedTreeSchema,
  plaintextSchema,
  ciphertextSequenceSchema,
  type NodeId,
  type SerializedTree,
  type SlotValue,
  type Plaintext,
  type Ciphertext,
  type CiphertextSequence,
} from './schemas/index.js';

// Randomness
export {
  SeededRandom,
  createRandomSource,
  hashSeed,
  type RandomSource,
  type Seed,
} from './utils/random.js';

// Configuration and logging
export { DEFAULT_CONFIG, CIPHER_CONVENTIONS, type CipherConvention } from './constants/defaults.js';
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export { logger, createModuleLogger, createLoggerFactory, LoggerFactory } from './utils/logger.js';

// Errors
export {
  TreeCipherError,
  isTreeCipherError,
  InvalidArgumentError,
  KeyMismatchError,
  MalformedCiphertextError,
  PlaintextTooLargeError,
  InvalidTreeError,
  NodeNotFoundError,
} from './errors/index.js';
