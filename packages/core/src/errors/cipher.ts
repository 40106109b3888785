/**
 * Cipher and tree error classes
 */

import { TreeCipherError } from './base.js';

/**
 * Bad parameters for tree generation or for a value written into the tree
 */
export class InvalidArgumentError extends TreeCipherError {
  constructor(
    message: string,
    public readonly argument: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'arguments', operation, { ...context, argument });
  }
}

/**
 * The key supplied does not identify the tree's root
 */
export class KeyMismatchError extends TreeCipherError {
  constructor(
    public readonly suppliedKey: number,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    // The actual root never goes into the message or context
    super(`Key ${suppliedKey} does not match the tree root`, 'cipher', operation, context);
  }
}

export class MalformedCiphertextError extends TreeCipherError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'cipher', operation, context);
  }
}

export class PlaintextTooLargeError extends TreeCipherError {
  constructor(
    public readonly plaintextLength: number,
    public readonly capacity: number,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Plaintext of length ${plaintextLength} exceeds tree capacity of ${capacity}`,
      'cipher',
      operation,
      { ...context, plaintextLength, capacity }
    );
  }
}

/**
 * A serialized tree that fails schema or structural validation
 */
export class InvalidTreeError extends TreeCipherError {
  constructor(
    message: string,
    public readonly errors: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'tree', 'validation', { ...context, errors });
  }
}

export class NodeNotFoundError extends TreeCipherError {
  constructor(
    public readonly nodeId: number,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Node ${nodeId} not found`, 'tree', operation, { ...context, nodeId });
  }
}
