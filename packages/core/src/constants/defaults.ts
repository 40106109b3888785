/**
 * Default configuration constants for the tree cipher
 */

export const DEFAULT_CONFIG = {
  /** Nodes per block tree */
  BLOCK_SIZE: 16,

  /** Which order writes and which order reads during encryption */
  CONVENTION: 'id-to-bfs',

  /** Identifiers are drawn as unsigned integers of this width */
  ID_BITS: 32,
} as const;

export const CIPHER_CONVENTIONS = ['id-to-bfs', 'bfs-to-id'] as const;

export type CipherConvention = (typeof CIPHER_CONVENTIONS)[number];
