/**
 * Centralized error handling for the tree cipher
 */

export { TreeCipherError, isTreeCipherError } from './base.js';

export {
  InvalidArgumentError,
  KeyMismatchError,
  MalformedCiphertextError,
  PlaintextTooLargeError,
  InvalidTreeError,
  NodeNotFoundError,
} from './cipher.js';
